import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  DEFAULT_INTERNAL_PACKAGES,
  DEFAULT_INTERNAL_ROOTS,
  DEFAULT_SKIP_DIRS,
} from '../config.js';
import { discoverFiles } from '../discovery/files.js';
import { decodeUtf8 } from '../fingerprint/hash.js';
import { createNullLogger, type Logger } from '../logger.js';
import type { ExtractedRef, ExtractedRefs, RefKind } from '../types.js';
import { scanMarkdown } from './markdown.js';

const COMPONENT = 'reference-extractor';

export const INLINE_CODE_RE = /`([^`]+)`/g;
export const FILE_PATH_RE = /^[\w./-]+\.(py|md|json|yaml|yml|sh|sql|toml|txt|cfg|ini)$/;
export const SYMBOL_RE = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)?(?:\(\))?$/;
export const IMPORT_LINE_RE = /^(?:from\s+([\w.]+)\s+import|import\s+([\w.]+))/;

/** What counts as "ours" when classifying a reference. */
export interface InternalScope {
  internalRoots: string[];
  internalPackages: string[];
}

const DEFAULT_SCOPE: InternalScope = {
  internalRoots: DEFAULT_INTERNAL_ROOTS,
  internalPackages: DEFAULT_INTERNAL_PACKAGES,
};

/** True when `path` starts with one of the internal roots, e.g. `app/`. */
export function isInternalPath(path: string, scope: InternalScope = DEFAULT_SCOPE): boolean {
  return scope.internalRoots.some((root) => path.startsWith(root));
}

/**
 * True when a dotted module name belongs to this codebase: its leading
 * package is internal, or its last component is a known symbol.
 */
export function isInternalModule(
  module: string,
  knownSymbols: Set<string>,
  scope: InternalScope = DEFAULT_SCOPE,
): boolean {
  const parts = module.split('.');
  const first = parts[0] ?? '';
  const last = parts[parts.length - 1] ?? '';
  return scope.internalPackages.includes(first) || knownSymbols.has(last);
}

/** Kind of an inline code span, or null when it is not an internal reference. */
export function classifyInlineCode(
  text: string,
  knownSymbols: Set<string>,
  scope: InternalScope = DEFAULT_SCOPE,
): Exclude<RefKind, 'import'> | null {
  if (FILE_PATH_RE.test(text)) {
    return isInternalPath(text, scope) ? 'file' : null;
  }

  if (SYMBOL_RE.test(text)) {
    const bare = text.replace(/\(\)$/, '');
    if (knownSymbols.has(bare) || bare.split('.').some((part) => knownSymbols.has(part))) {
      return 'symbol';
    }
  }

  if (text.includes('.')) {
    const first = text.split('.')[0] ?? '';
    if (scope.internalPackages.includes(first)) {
      return 'symbol';
    }
  }

  return null;
}

/**
 * Every internal code reference in one Markdown document: inline code spans
 * outside fences, and internal import lines inside Python fences.
 * Deduplicated by (text, line) and ordered by line.
 */
export function extractReferences(
  content: string,
  knownSymbols: Set<string>,
  scope: InternalScope = DEFAULT_SCOPE,
): ExtractedRef[] {
  const refs: ExtractedRef[] = [];
  const seen = new Set<string>();

  const add = (text: string, kind: RefKind, line: number): void => {
    const key = `${line}\u0000${text}`;
    if (!seen.has(key)) {
      seen.add(key);
      refs.push({ text, kind, line });
    }
  };

  for (const { line, text, context } of scanMarkdown(content)) {
    switch (context) {
      case 'prose':
        for (const match of text.matchAll(INLINE_CODE_RE)) {
          const span = (match[1] ?? '').trim();
          const kind = classifyInlineCode(span, knownSymbols, scope);
          if (kind) add(span, kind, line);
        }
        break;
      case 'python': {
        const statement = text.trim();
        const match = IMPORT_LINE_RE.exec(statement);
        const module = match?.[1] ?? match?.[2];
        if (module && isInternalModule(module, knownSymbols, scope)) {
          add(statement, 'import', line);
        }
        break;
      }
      case 'fence':
      case 'code':
        break;
    }
  }

  // Lines are visited in order, so refs are already sorted by line.
  return refs;
}

export interface ExtractAllOptions {
  root: string;
  docDirs: string[];
  knownSymbols: Set<string>;
  /** Root-relative directory of the generated artifacts; never scanned. */
  indexDir?: string;
  skipDirs?: string[];
  scope?: InternalScope;
  logger?: Logger;
}

/** Extract references from every Markdown file under the doc directories. */
export async function extractAllReferences(options: ExtractAllOptions): Promise<ExtractedRefs> {
  const logger = options.logger ?? createNullLogger();
  const files = await discoverFiles({
    root: options.root,
    dirs: options.docDirs,
    extension: '.md',
    skipDirs: options.skipDirs ?? DEFAULT_SKIP_DIRS,
    excludeDirs: options.indexDir ? [options.indexDir] : [],
  });

  const docs: Record<string, ExtractedRef[]> = {};
  let refCount = 0;

  for (const file of files) {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(resolve(options.root, file));
    } catch (error) {
      logger.warn(COMPONENT, `Skipping unreadable doc ${file}`, {
        reason: error instanceof Error ? error.message : String(error),
      });
      continue;
    }
    const content = decodeUtf8(bytes);
    if (content === null) {
      logger.warn(COMPONENT, `Skipping ${file}: not valid UTF-8`);
      continue;
    }

    const refs = extractReferences(content, options.knownSymbols, options.scope);
    if (refs.length > 0) {
      docs[file] = refs;
      refCount += refs.length;
    }
  }

  logger.info(COMPONENT, 'References extracted', {
    docs: Object.keys(docs).length,
    refs: refCount,
  });

  return {
    generated: new Date().toISOString(),
    doc_count: Object.keys(docs).length,
    ref_count: refCount,
    docs,
  };
}
