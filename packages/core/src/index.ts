export type {
  SymbolKind,
  SymbolEntry,
  SymbolIndex,
  RefKind,
  ExtractedRef,
  ExtractedRefs,
  LinkKind,
  LinkStatus,
  ResolvedLink,
  BrokenRef,
  AmbiguousRef,
  Resolution,
  DocLinks,
  LinksIndex,
  CheckResult,
  CheckReport,
  IssueType,
  FixContext,
  FixReport,
  HealthStatus,
  IndexMetrics,
  IndexHealthEntry,
  IndexHealthReport,
} from './types.js';

export type { DocLinksConfig, ArtifactName } from './config.js';
export {
  resolveConfig,
  artifactPath,
  ARTIFACT_FILES,
  DEFAULT_SOURCE_DIRS,
  DEFAULT_DOC_DIRS,
  DEFAULT_INDEX_DIR,
  DEFAULT_SKIP_DIRS,
} from './config.js';
export type { Logger, LogLevel } from './logger.js';
export { createConsoleLogger, createNullLogger } from './logger.js';
export {
  DocLinksError,
  MissingArtifactError,
  ArtifactCorruptError,
  ArtifactWriteError,
  ParserInitError,
} from './errors.js';

export { loadPythonParser, PythonParser } from './parser/python-parser.js';
export { canonicalize, fingerprintSymbol, hashSymbol } from './fingerprint/fingerprint.js';
export { hashFile } from './fingerprint/hash.js';
export { buildSymbolIndex, getKnownSymbols, indexModule } from './symbols/symbol-indexer.js';
export { extractReferences, extractAllReferences } from './refs/reference-extractor.js';
export { findDocSection } from './refs/markdown.js';
export { resolveModulePath } from './resolve/module-path.js';
export { resolveReference, resolveAllReferences } from './resolve/resolver.js';
export {
  checkLinks,
  computeCurrentHash,
  getStaleLinks,
  getBrokenRefs,
  getErrorRefs,
} from './check/staleness-checker.js';
export { gatherFixContext, searchSimilar, symbolSource } from './fix/fix-context.js';
export { generateFixPrompt } from './fix/fix-prompt.js';
export { loadArtifact, requireArtifact, saveArtifact, writeJsonAtomic } from './storage/artifacts.js';
export { checkIndexHealth, formatHealthReport } from './monitor/index-health.js';

export type {
  PipelineOptions,
  BuildSummary,
  CheckSummary,
  CatalogStatus,
  CatalogHealth,
  FixSummary,
} from './pipeline.js';
export { buildCatalog, checkCatalog, readCatalogStatus, fixCatalog } from './pipeline.js';
