import type { ArtifactName } from './config.js';

/** Base class for every failure the pipeline reports by name. */
export class DocLinksError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocLinksError';
  }
}

const PRODUCING_COMMAND: Record<ArtifactName, string> = {
  symbols: 'build',
  refs: 'build',
  links: 'build',
  fixReport: 'fix',
};

/** A later stage ran before the stage that produces its input. */
export class MissingArtifactError extends DocLinksError {
  readonly artifact: ArtifactName;
  readonly path: string;

  constructor(artifact: ArtifactName, path: string) {
    super(
      `Required artifact not found: ${path}. Run 'doclinks ${PRODUCING_COMMAND[artifact]}' first.`,
    );
    this.name = 'MissingArtifactError';
    this.artifact = artifact;
    this.path = path;
  }
}

/** An artifact exists but is not valid JSON or does not match its schema. */
export class ArtifactCorruptError extends DocLinksError {
  readonly path: string;

  constructor(path: string, detail: string, cause?: unknown) {
    super(`Artifact is corrupt: ${path} (${detail}). Rebuild it with 'doclinks build'.`, { cause });
    this.name = 'ArtifactCorruptError';
    this.path = path;
  }
}

/** The output location could not be created or written. */
export class ArtifactWriteError extends DocLinksError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Could not write artifact ${path}: ${detail}`, { cause });
    this.name = 'ArtifactWriteError';
    this.path = path;
  }
}

/** The tree-sitter runtime or the Python grammar failed to load. */
export class ParserInitError extends DocLinksError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to initialize the Python parser: ${detail}`, { cause });
    this.name = 'ParserInitError';
  }
}
