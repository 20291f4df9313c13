import { resolveConfig, type DocLinksConfig } from './config.js';
import { checkLinks, getStaleLinks } from './check/staleness-checker.js';
import { gatherFixContext } from './fix/fix-context.js';
import { createNullLogger, type Logger } from './logger.js';
import { loadPythonParser } from './parser/python-parser.js';
import { extractAllReferences } from './refs/reference-extractor.js';
import { resolveAllReferences } from './resolve/resolver.js';
import { loadArtifact, requireArtifact, saveArtifact } from './storage/artifacts.js';
import { buildSymbolIndex, getKnownSymbols } from './symbols/symbol-indexer.js';
import type { CheckReport, FixReport, LinksIndex } from './types.js';

export interface PipelineOptions extends Partial<DocLinksConfig> {
  logger?: Logger;
}

export interface BuildSummary {
  symbols: { count: number; files: number; path: string };
  refs: { count: number; docs: number; path: string };
  links: { resolved: number; broken: number; ambiguous: number; path: string };
}

/**
 * Rebuild the whole catalog from scratch.
 *
 * Steps:
 *   1. Index symbols in the source directories
 *   2. Extract references from the docs, using the fresh symbol set
 *   3. Resolve every reference and hash its target
 *   4. Persist all three artifacts
 */
export async function buildCatalog(options: PipelineOptions = {}): Promise<BuildSummary> {
  const config = resolveConfig(options);
  const logger = options.logger ?? createNullLogger();
  const parser = await loadPythonParser();

  // ---- 1. Symbols ----
  const symbols = await buildSymbolIndex({
    root: config.root,
    sourceDirs: config.sourceDirs,
    skipDirs: config.skipDirs,
    parser,
    logger,
  });
  const symbolsPath = await saveArtifact(config, 'symbols', symbols);

  // ---- 2. References ----
  const refs = await extractAllReferences({
    root: config.root,
    docDirs: config.docDirs,
    knownSymbols: getKnownSymbols(symbols),
    indexDir: config.indexDir,
    skipDirs: config.skipDirs,
    scope: config,
    logger,
  });
  const refsPath = await saveArtifact(config, 'refs', refs);

  // ---- 3. Links ----
  const links = await resolveAllReferences({ root: config.root, symbols, refs, parser, logger });
  const linksPath = await saveArtifact(config, 'links', links);

  return {
    symbols: { count: symbols.symbol_count, files: symbols.file_count, path: symbolsPath },
    refs: { count: refs.ref_count, docs: refs.doc_count, path: refsPath },
    links: {
      resolved: links.total_links,
      broken: links.total_broken,
      ambiguous: links.total_errors,
      path: linksPath,
    },
  };
}

export interface CheckSummary {
  report: CheckReport;
  links: LinksIndex;
}

/** Re-check every stored link and persist the updated `links.json`. */
export async function checkCatalog(options: PipelineOptions = {}): Promise<CheckSummary> {
  const config = resolveConfig(options);
  const logger = options.logger ?? createNullLogger();

  const stored = await requireArtifact(config, 'links');
  const { links, report } = await checkLinks({ root: config.root, links: stored, logger });
  await saveArtifact(config, 'links', links);

  return { report, links };
}

export type CatalogHealth = 'missing' | 'issues' | 'healthy';

export interface CatalogStatus {
  symbols: { generated: string; count: number; files: number } | null;
  refs: { generated: string; count: number; docs: number } | null;
  links: {
    generated: string;
    resolved: number;
    broken: number;
    ambiguous: number;
    checked: string | null;
    /** Null until a check pass has run. */
    stale: number | null;
  } | null;
  health: CatalogHealth;
}

/** Summarize the persisted artifacts without touching any source file. */
export async function readCatalogStatus(options: PipelineOptions = {}): Promise<CatalogStatus> {
  const config = resolveConfig(options);

  const symbols = await loadArtifact(config, 'symbols');
  const refs = await loadArtifact(config, 'refs');
  const links = await loadArtifact(config, 'links');

  let linkStatus: CatalogStatus['links'] = null;
  let health: CatalogHealth = 'missing';
  if (links) {
    const stale = links.checked
      ? Object.values(getStaleLinks(links)).reduce((sum, list) => sum + list.length, 0)
      : null;
    linkStatus = {
      generated: links.generated,
      resolved: links.total_links,
      broken: links.total_broken,
      ambiguous: links.total_errors,
      checked: links.checked ?? null,
      stale,
    };
    const problems = links.total_broken + links.total_errors + (stale ?? 0);
    health = problems > 0 ? 'issues' : 'healthy';
  }

  return {
    symbols: symbols
      ? { generated: symbols.generated, count: symbols.symbol_count, files: symbols.file_count }
      : null,
    refs: refs ? { generated: refs.generated, count: refs.ref_count, docs: refs.doc_count } : null,
    links: linkStatus,
    health,
  };
}

export interface FixSummary {
  report: FixReport;
  path: string;
}

/** Check links, then gather repair context for every issue and persist it. */
export async function fixCatalog(options: PipelineOptions = {}): Promise<FixSummary> {
  const config = resolveConfig(options);
  const logger = options.logger ?? createNullLogger();

  const { links } = await checkCatalog(options);
  const symbols = await loadArtifact(config, 'symbols');

  const report = await gatherFixContext({
    root: config.root,
    links,
    symbols,
    sourceDirs: config.sourceDirs,
    skipDirs: config.skipDirs,
    logger,
  });
  const path = await saveArtifact(config, 'fixReport', report);

  return { report, path };
}
