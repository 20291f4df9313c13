import { resolve } from 'node:path';

/**
 * Settings shared by every pipeline stage. All directories except `root` are
 * root-relative.
 */
export interface DocLinksConfig {
  root: string;
  /** Directories scanned for Python sources. */
  sourceDirs: string[];
  /** Directories scanned for Markdown docs. */
  docDirs: string[];
  /** Where the JSON artifacts are written. */
  indexDir: string;
  /** Directory names never descended into. Hidden directories are always skipped. */
  skipDirs: string[];
  /** Path prefixes that mark a backticked file path as internal. */
  internalRoots: string[];
  /** Top-level package names that mark a dotted name or import as internal. */
  internalPackages: string[];
}

export const DEFAULT_SOURCE_DIRS = ['app', 'scripts'];
export const DEFAULT_DOC_DIRS = ['docs'];
export const DEFAULT_INDEX_DIR = 'docs/indexes';

export const DEFAULT_SKIP_DIRS = [
  '__pycache__',
  'node_modules',
  '.venv',
  'venv',
  '.tox',
  'build',
  'dist',
  'site-packages',
  '.git',
];

export const DEFAULT_INTERNAL_ROOTS = ['app/', 'scripts/', 'tests/', 'docs/', 'modules/'];
export const DEFAULT_INTERNAL_PACKAGES = ['app', 'scripts', 'tests', 'modules'];

export const SOURCE_EXTENSION = '.py';
export const PACKAGE_INDEX_FILE = '__init__.py';

export const ARTIFACT_FILES = {
  symbols: 'symbols.json',
  refs: 'extracted_refs.json',
  links: 'links.json',
  fixReport: 'fix_report.json',
} as const;

export type ArtifactName = keyof typeof ARTIFACT_FILES;

/**
 * Fill in defaults for everything the caller left out. `root` defaults to the
 * current working directory and is made absolute.
 */
export function resolveConfig(partial: Partial<DocLinksConfig> = {}): DocLinksConfig {
  return {
    root: resolve(partial.root ?? process.cwd()),
    sourceDirs: partial.sourceDirs ?? [...DEFAULT_SOURCE_DIRS],
    docDirs: partial.docDirs ?? [...DEFAULT_DOC_DIRS],
    indexDir: stripTrailingSlash(partial.indexDir ?? DEFAULT_INDEX_DIR),
    skipDirs: partial.skipDirs ?? [...DEFAULT_SKIP_DIRS],
    internalRoots: partial.internalRoots ?? [...DEFAULT_INTERNAL_ROOTS],
    internalPackages: partial.internalPackages ?? [...DEFAULT_INTERNAL_PACKAGES],
  };
}

/** Absolute path of one of the persisted artifacts. */
export function artifactPath(config: DocLinksConfig, name: ArtifactName): string {
  return resolve(config.root, config.indexDir, ARTIFACT_FILES[name]);
}

/** fast-glob ignore patterns for the configured skip directories. */
export function skipDirGlobs(skipDirs: string[]): string[] {
  return skipDirs.map((dir) => `**/${dir}/**`);
}

function stripTrailingSlash(path: string): string {
  return path.replace(/[\\/]+$/, '');
}
