import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { z } from 'zod';
import { artifactPath, type ArtifactName, type DocLinksConfig } from '../config.js';
import { ArtifactCorruptError, ArtifactWriteError, MissingArtifactError } from '../errors.js';
import type { ExtractedRefs, FixReport, LinksIndex, SymbolIndex } from '../types.js';
import {
  extractedRefsSchema,
  fixReportSchema,
  linksIndexSchema,
  symbolIndexSchema,
} from './schemas.js';

/** Artifact name to the document stored under it. */
export interface ArtifactTypes {
  symbols: SymbolIndex;
  refs: ExtractedRefs;
  links: LinksIndex;
  fixReport: FixReport;
}

const SCHEMAS: { [K in ArtifactName]: z.ZodType<ArtifactTypes[K]> } = {
  symbols: symbolIndexSchema,
  refs: extractedRefsSchema,
  links: linksIndexSchema,
  fixReport: fixReportSchema,
};

/**
 * Write `data` as pretty-printed JSON. The file is written beside the target
 * and renamed over it, so readers never observe a partial document.
 */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
  const tmpPath = `${path}.${process.pid}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmpPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw new ArtifactWriteError(path, error);
  }
}

/**
 * Read and validate a JSON document. Missing files load as null; anything
 * that is not valid JSON or does not match `schema` raises ArtifactCorruptError.
 */
export async function readJsonArtifact<T>(path: string, schema: z.ZodType<T>): Promise<T | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw new ArtifactCorruptError(path, 'unreadable', error);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ArtifactCorruptError(path, 'invalid JSON', error);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'schema mismatch';
    throw new ArtifactCorruptError(path, detail, parsed.error);
  }
  return parsed.data;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ── Named artifacts ──

export async function saveArtifact<K extends ArtifactName>(
  config: DocLinksConfig,
  name: K,
  data: ArtifactTypes[K],
): Promise<string> {
  const path = artifactPath(config, name);
  await writeJsonAtomic(path, data);
  return path;
}

export function loadArtifact<K extends ArtifactName>(
  config: DocLinksConfig,
  name: K,
): Promise<ArtifactTypes[K] | null> {
  return readJsonArtifact(artifactPath(config, name), SCHEMAS[name]);
}

/** Like `loadArtifact`, but a missing file raises MissingArtifactError. */
export async function requireArtifact<K extends ArtifactName>(
  config: DocLinksConfig,
  name: K,
): Promise<ArtifactTypes[K]> {
  const data = await loadArtifact(config, name);
  if (data === null) {
    throw new MissingArtifactError(name, artifactPath(config, name));
  }
  return data;
}
