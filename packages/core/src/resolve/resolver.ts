import { statSync } from 'node:fs';
import { isAbsolute, relative, resolve } from 'node:path';
import { hashSymbol } from '../fingerprint/fingerprint.js';
import { hashFile } from '../fingerprint/hash.js';
import { createNullLogger, type Logger } from '../logger.js';
import { loadPythonParser, type PythonParser } from '../parser/python-parser.js';
import type {
  DocLinks,
  ExtractedRef,
  ExtractedRefs,
  LinksIndex,
  Resolution,
  SymbolEntry,
  SymbolIndex,
} from '../types.js';
import { resolveModulePath } from './module-path.js';

const COMPONENT = 'resolver';

export const IMPORT_STATEMENT_RE = /^(?:from\s+([\w.]+)\s+import\s+([\w,\s]+)|import\s+([\w.]+))/;

export interface ResolveContext {
  root: string;
  symbols: SymbolIndex;
  parser: PythonParser;
}

/**
 * Absolute path of a root-relative path, or null when it would leave the root.
 */
export function withinRoot(root: string, relPath: string): string | null {
  const absPath = resolve(root, relPath);
  const rel = relative(root, absPath);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return null;
  }
  return absPath;
}

export function isRegularFile(absPath: string): boolean {
  try {
    return statSync(absPath).isFile();
  } catch {
    return false;
  }
}

/** Map one extracted reference to exactly one outcome. */
export async function resolveReference(
  ref: ExtractedRef,
  context: ResolveContext,
): Promise<Resolution> {
  switch (ref.kind) {
    case 'file':
      return resolveFileRef(ref, context.root);
    case 'import':
      return resolveImportRef(ref, context.root);
    case 'symbol':
      return resolveSymbolRef(ref, context);
  }
}

function broken(ref: ExtractedRef, reason: string): Resolution {
  return { outcome: 'broken', broken: { ref: ref.text, line: ref.line, reason } };
}

async function resolveFileRef(ref: ExtractedRef, root: string): Promise<Resolution> {
  const absPath = withinRoot(root, ref.text);
  if (!absPath || !isRegularFile(absPath)) {
    return broken(ref, 'file not found');
  }

  const hash = await hashFile(absPath);
  if (hash === null) {
    return broken(ref, 'could not hash file');
  }

  return {
    outcome: 'resolved',
    link: { ref: ref.text, target: ref.text, kind: 'file', hash, line: ref.line },
  };
}

async function resolveImportRef(ref: ExtractedRef, root: string): Promise<Resolution> {
  const match = IMPORT_STATEMENT_RE.exec(ref.text.trim());
  const module = match?.[1] ?? match?.[3];
  if (!module) {
    return broken(ref, 'could not parse import');
  }

  const target = resolveModulePath(module, (relPath) => {
    const absPath = withinRoot(root, relPath);
    return absPath !== null && isRegularFile(absPath);
  });
  if (target === null) {
    return broken(ref, `module not found: ${module}`);
  }

  const hash = await hashFile(resolve(root, target));
  if (hash === null) {
    return broken(ref, 'could not hash module');
  }

  return {
    outcome: 'resolved',
    link: { ref: ref.text, target, kind: 'file', hash, line: ref.line },
  };
}

async function resolveSymbolRef(ref: ExtractedRef, context: ResolveContext): Promise<Resolution> {
  const name = ref.text.replace(/[()]+$/, '');
  const index = context.symbols.symbols;

  // Exact keys win, including `Class.method` keys.
  const exact = lookupEntries(index, name);
  if (exact) {
    if (exact.length > 1) {
      return {
        outcome: 'ambiguous',
        ambiguous: {
          ref: ref.text,
          line: ref.line,
          reason: `ambiguous: found in ${exact.length} locations`,
          candidates: exact.map(formatCandidate),
        },
      };
    }
    const [entry] = exact;
    if (entry) {
      return linkSymbol(ref, name, entry, context);
    }
  }

  if (!name.includes('.')) {
    return broken(ref, 'symbol not found');
  }

  return resolveQualifiedSymbol(ref, name, context);
}

/** Own entries only: names such as `constructor` must not hit `Object.prototype`. */
function lookupEntries(
  index: Record<string, SymbolEntry[]>,
  name: string,
): SymbolEntry[] | undefined {
  return Object.hasOwn(index, name) ? index[name] : undefined;
}

/**
 * `pkg.module.func` or `pkg.module.Class.method`: look the trailing name up,
 * then keep the definitions whose file path contains the module prefix. The
 * bare name is tried first, then the `Class.method` key under a shorter prefix.
 */
async function resolveQualifiedSymbol(
  ref: ExtractedRef,
  qualified: string,
  context: ResolveContext,
): Promise<Resolution> {
  const parts = qualified.split('.');
  const index = context.symbols.symbols;

  const attempts = [{ symbolName: parts.slice(-1).join('.'), prefix: parts.slice(0, -1) }];
  if (parts.length > 2) {
    attempts.push({ symbolName: parts.slice(-2).join('.'), prefix: parts.slice(0, -2) });
  }

  let missedModule: string | null = null;
  for (const { symbolName, prefix } of attempts) {
    const entries = lookupEntries(index, symbolName);
    if (!entries) continue;

    // Plain substring match: `app/models` also matches `myapp/models_old.py`.
    const modulePath = prefix.join('/');
    const matching = entries.filter((entry) => entry.file.includes(modulePath));

    if (matching.length === 0) {
      if (missedModule === null) {
        missedModule = modulePath;
      }
      continue;
    }
    if (matching.length > 1) {
      return {
        outcome: 'ambiguous',
        ambiguous: {
          ref: ref.text,
          line: ref.line,
          reason: 'still ambiguous after qualification',
          candidates: matching.map(formatCandidate),
        },
      };
    }

    const [entry] = matching;
    if (entry) {
      return linkSymbol(ref, symbolName, entry, context);
    }
  }

  return missedModule === null
    ? broken(ref, 'symbol not found')
    : broken(ref, `symbol not found in module ${missedModule}`);
}

async function linkSymbol(
  ref: ExtractedRef,
  name: string,
  entry: SymbolEntry,
  context: ResolveContext,
): Promise<Resolution> {
  const hash = await hashSymbol(resolve(context.root, entry.file), name, context.parser);
  if (hash === null) {
    return broken(ref, 'could not hash symbol');
  }

  return {
    outcome: 'resolved',
    link: {
      ref: ref.text,
      target: `${entry.file}::${name}`,
      kind: entry.kind,
      hash,
      line: ref.line,
    },
  };
}

function formatCandidate(entry: SymbolEntry): string {
  return `${entry.file}:${entry.line}`;
}

// ── Whole-catalog resolution ──

export interface ResolveAllOptions {
  root: string;
  symbols: SymbolIndex;
  refs: ExtractedRefs;
  parser?: PythonParser;
  logger?: Logger;
}

/** Resolve every extracted reference, grouped per document in extraction order. */
export async function resolveAllReferences(options: ResolveAllOptions): Promise<LinksIndex> {
  const logger = options.logger ?? createNullLogger();
  const context: ResolveContext = {
    root: options.root,
    symbols: options.symbols,
    parser: options.parser ?? (await loadPythonParser()),
  };

  const docs: Record<string, DocLinks> = {};
  let totalLinks = 0;
  let totalBroken = 0;
  let totalErrors = 0;

  for (const [docPath, refs] of Object.entries(options.refs.docs)) {
    const docLinks: DocLinks = { links: [], broken: [], errors: [] };

    for (const ref of refs) {
      const resolution = await resolveReference(ref, context);
      switch (resolution.outcome) {
        case 'resolved':
          docLinks.links.push(resolution.link);
          totalLinks++;
          break;
        case 'broken':
          docLinks.broken.push(resolution.broken);
          totalBroken++;
          logger.debug(COMPONENT, `Broken reference in ${docPath}`, resolution.broken);
          break;
        case 'ambiguous':
          docLinks.errors.push(resolution.ambiguous);
          totalErrors++;
          break;
      }
    }

    docs[docPath] = docLinks;
  }

  logger.info(COMPONENT, 'References resolved', {
    links: totalLinks,
    broken: totalBroken,
    errors: totalErrors,
  });

  return {
    generated: new Date().toISOString(),
    total_links: totalLinks,
    total_broken: totalBroken,
    total_errors: totalErrors,
    docs,
  };
}
