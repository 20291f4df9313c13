import { readFile } from 'node:fs/promises';
import { basename, extname, resolve } from 'node:path';
import { DEFAULT_SKIP_DIRS, SOURCE_EXTENSION } from '../config.js';
import { parseTarget, getBrokenRefs, getErrorRefs, getStaleLinks } from '../check/staleness-checker.js';
import { discoverFiles } from '../discovery/files.js';
import { readSourceText } from '../fingerprint/hash.js';
import { createNullLogger, type Logger } from '../logger.js';
import { loadPythonParser, type PythonParser } from '../parser/python-parser.js';
import { classifyModule, findDefinition } from '../parser/syntax.js';
import { findDocSection } from '../refs/markdown.js';
import { IMPORT_STATEMENT_RE, withinRoot } from '../resolve/resolver.js';
import type { FixContext, FixReport, LinksIndex, SymbolIndex } from '../types.js';
import { generateFixPrompt } from './fix-prompt.js';

const COMPONENT = 'fix-context';

export const MAX_CANDIDATES = 5;

/**
 * Exact source lines of `name` in `content`, from its `def`/`class` line
 * through its last line. Decorators are not included.
 */
export function symbolSource(content: string, name: string, parser: PythonParser): string | null {
  const range = parser.withModule(content, (module) => {
    const site = findDefinition(classifyModule(module), name);
    return site ? { start: site.node.startPosition.row, end: site.node.endPosition.row } : null;
  });
  if (!range) {
    return null;
  }
  return content.split(/\r?\n/).slice(range.start, range.end + 1).join('\n');
}

export interface SearchSimilarOptions {
  /** Root-relative source files to search by name. */
  sourceFiles: string[];
  symbols: SymbolIndex | null;
}

/**
 * Up to five plausible new targets for a broken reference. Paths and
 * imports are matched against source file names, symbols against index names.
 */
export function searchSimilar(ref: string, options: SearchSimilarOptions): string[] {
  const importMatch = IMPORT_STATEMENT_RE.exec(ref.trim());
  const module = importMatch?.[1] ?? importMatch?.[3];

  if (ref.includes('/') || module) {
    const stem = module
      ? (module.split('.').pop() ?? module)
      : basename(ref, extname(ref));
    const needle = stem.toLowerCase();
    return options.sourceFiles
      .filter((file) => basename(file, extname(file)).toLowerCase().includes(needle))
      .sort()
      .slice(0, MAX_CANDIDATES);
  }

  if (!options.symbols) {
    return [];
  }
  const bare = ref.replace(/[()]+$/, '');
  const needle = (bare.split('.').pop() ?? bare).toLowerCase();
  const candidates: string[] = [];
  for (const [name, entries] of Object.entries(options.symbols.symbols)) {
    if (name.toLowerCase().includes(needle)) {
      for (const entry of entries) {
        candidates.push(`${entry.file}::${name}`);
      }
    }
  }
  return candidates.slice(0, MAX_CANDIDATES);
}

export interface GatherFixContextOptions {
  root: string;
  links: LinksIndex;
  symbols: SymbolIndex | null;
  sourceDirs: string[];
  skipDirs?: string[];
  parser?: PythonParser;
  logger?: Logger;
}

/**
 * One FixContext per STALE link, broken reference and ambiguous reference,
 * in that order. Expects an index that has been through `checkLinks`.
 */
export async function gatherFixContext(options: GatherFixContextOptions): Promise<FixReport> {
  const logger = options.logger ?? createNullLogger();
  const parser = options.parser ?? (await loadPythonParser());

  const docCache = new Map<string, string | null>();
  const sectionFor = async (docPath: string, line: number): Promise<string | null> => {
    if (!docCache.has(docPath)) {
      const absPath = withinRoot(options.root, docPath);
      let content: string | null = null;
      if (absPath) {
        try {
          content = await readFile(absPath, 'utf-8');
        } catch {
          logger.warn(COMPONENT, `Could not read ${docPath} for section lookup`);
        }
      }
      docCache.set(docPath, content);
    }
    const content = docCache.get(docPath);
    return content ? findDocSection(content, line) : null;
  };

  const issues: FixContext[] = [];
  const push = (context: Omit<FixContext, 'prompt'>): void => {
    issues.push({ ...context, prompt: generateFixPrompt(context) });
  };

  // ---- 1. Stale links ----
  for (const [docPath, links] of Object.entries(getStaleLinks(options.links))) {
    for (const link of links) {
      let currentCode: string | null = null;
      const { file, symbol } = parseTarget(link.target);
      const absPath = withinRoot(options.root, file);
      if (symbol !== null && absPath) {
        const content = await readSourceText(absPath);
        currentCode = content === null ? null : symbolSource(content, symbol, parser);
      }
      push({
        doc_path: docPath,
        ref: link.ref,
        line: link.line,
        issue_type: 'stale',
        reason: 'Code has changed since documentation was written',
        doc_section: await sectionFor(docPath, link.line),
        current_code: currentCode,
        candidates: null,
      });
    }
  }

  // ---- 2. Broken references ----
  const brokenRefs = getBrokenRefs(options.links);
  const sourceFiles =
    Object.keys(brokenRefs).length > 0
      ? await discoverFiles({
          root: options.root,
          dirs: options.sourceDirs,
          extension: SOURCE_EXTENSION,
          skipDirs: options.skipDirs ?? DEFAULT_SKIP_DIRS,
        })
      : [];
  for (const [docPath, refs] of Object.entries(brokenRefs)) {
    for (const ref of refs) {
      push({
        doc_path: docPath,
        ref: ref.ref,
        line: ref.line,
        issue_type: 'broken',
        reason: ref.reason,
        doc_section: await sectionFor(docPath, ref.line),
        current_code: null,
        candidates: searchSimilar(ref.ref, { sourceFiles, symbols: options.symbols }),
      });
    }
  }

  // ---- 3. Ambiguous references ----
  for (const [docPath, refs] of Object.entries(getErrorRefs(options.links))) {
    for (const ref of refs) {
      push({
        doc_path: docPath,
        ref: ref.ref,
        line: ref.line,
        issue_type: 'ambiguous',
        reason: ref.reason,
        doc_section: await sectionFor(docPath, ref.line),
        current_code: null,
        candidates: [...ref.candidates],
      });
    }
  }

  const count = (type: FixContext['issue_type']): number =>
    issues.filter((issue) => issue.issue_type === type).length;

  return {
    generated: new Date().toISOString(),
    total_issues: issues.length,
    stale: count('stale'),
    broken: count('broken'),
    errors: count('ambiguous'),
    issues,
  };
}
