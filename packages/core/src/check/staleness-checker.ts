import { hashSymbol } from '../fingerprint/fingerprint.js';
import { hashFile } from '../fingerprint/hash.js';
import { createNullLogger, type Logger } from '../logger.js';
import { loadPythonParser, type PythonParser } from '../parser/python-parser.js';
import { withinRoot } from '../resolve/resolver.js';
import type {
  AmbiguousRef,
  BrokenRef,
  CheckReport,
  CheckResult,
  DocLinks,
  LinksIndex,
  ResolvedLink,
} from '../types.js';

const COMPONENT = 'staleness-checker';

/** Split a symbol target `path::name`; plain paths have no symbol part. */
export function parseTarget(target: string): { file: string; symbol: string | null } {
  const sep = target.indexOf('::');
  if (sep === -1) {
    return { file: target, symbol: null };
  }
  return { file: target.slice(0, sep), symbol: target.slice(sep + 2) };
}

/**
 * Hash a link's target the same way the resolver did. Null when the target
 * is gone or cannot be hashed.
 */
export async function computeCurrentHash(
  root: string,
  link: ResolvedLink,
  parser: PythonParser,
): Promise<string | null> {
  const { file, symbol } = parseTarget(link.target);
  const absPath = withinRoot(root, file);
  if (!absPath) {
    return null;
  }
  if (link.kind === 'file' || symbol === null) {
    return hashFile(absPath);
  }
  return hashSymbol(absPath, symbol, parser);
}

export interface CheckLinksOptions {
  root: string;
  links: LinksIndex;
  parser?: PythonParser;
  logger?: Logger;
}

export interface CheckLinksResult {
  /** A copy of the input with `status` on every link and `checked` set. */
  links: LinksIndex;
  report: CheckReport;
}

/**
 * Re-hash every resolved link and mark it CURRENT or STALE. The input index
 * is left untouched; callers persist the returned copy.
 */
export async function checkLinks(options: CheckLinksOptions): Promise<CheckLinksResult> {
  const logger = options.logger ?? createNullLogger();
  const parser = options.parser ?? (await loadPythonParser());
  const checked = new Date().toISOString();

  const docs: Record<string, DocLinks> = {};
  const reportDocs: Record<string, CheckResult[]> = {};
  let current = 0;
  let stale = 0;

  for (const [docPath, docLinks] of Object.entries(options.links.docs)) {
    const links: ResolvedLink[] = [];
    const results: CheckResult[] = [];

    for (const link of docLinks.links) {
      const currentHash = await computeCurrentHash(options.root, link, parser);
      const status = currentHash !== null && currentHash === link.hash ? 'CURRENT' : 'STALE';
      if (status === 'CURRENT') {
        current++;
      } else {
        stale++;
        logger.debug(COMPONENT, `Stale link in ${docPath}`, { ref: link.ref, target: link.target });
      }

      links.push({ ...link, status });
      results.push({
        ref: link.ref,
        target: link.target,
        line: link.line,
        status,
        stored_hash: link.hash,
        current_hash: currentHash,
      });
    }

    docs[docPath] = {
      links,
      broken: docLinks.broken.map((ref) => ({ ...ref })),
      errors: docLinks.errors.map((ref) => ({ ...ref, candidates: [...ref.candidates] })),
    };
    if (results.length > 0) {
      reportDocs[docPath] = results;
    }
  }

  logger.info(COMPONENT, 'Links checked', { current, stale });

  return {
    links: { ...options.links, docs, checked },
    report: {
      checked,
      total_checked: current + stale,
      current,
      stale,
      docs: reportDocs,
    },
  };
}

// ── Selectors over a checked index ──

function collectPerDoc<T>(
  index: LinksIndex,
  pick: (doc: DocLinks) => T[],
): Record<string, T[]> {
  const result: Record<string, T[]> = {};
  for (const [docPath, doc] of Object.entries(index.docs)) {
    const items = pick(doc);
    if (items.length > 0) {
      result[docPath] = items;
    }
  }
  return result;
}

export function getStaleLinks(index: LinksIndex): Record<string, ResolvedLink[]> {
  return collectPerDoc(index, (doc) => doc.links.filter((link) => link.status === 'STALE'));
}

export function getBrokenRefs(index: LinksIndex): Record<string, BrokenRef[]> {
  return collectPerDoc(index, (doc) => doc.broken);
}

export function getErrorRefs(index: LinksIndex): Record<string, AmbiguousRef[]> {
  return collectPerDoc(index, (doc) => doc.errors);
}
