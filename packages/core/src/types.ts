// ── Symbol index layer ──
export type SymbolKind = 'function' | 'class' | 'method' | 'constant';

export interface SymbolEntry {
  /** Root-relative path, always `/`-separated. */
  file: string;
  /** 1-based line of the definition (the `def`/`class` line, not its decorators). */
  line: number;
  kind: SymbolKind;
  signature: string;
}

export interface SymbolIndex {
  generated: string;
  symbol_count: number;
  file_count: number;
  symbols: Record<string, SymbolEntry[]>;
}

// ── Reference extraction layer ──
export type RefKind = 'file' | 'symbol' | 'import';

export interface ExtractedRef {
  text: string;
  kind: RefKind;
  line: number;
}

export interface ExtractedRefs {
  generated: string;
  doc_count: number;
  ref_count: number;
  docs: Record<string, ExtractedRef[]>;
}

// ── Resolution layer ──
export type LinkKind = 'file' | SymbolKind;

export type LinkStatus = 'CURRENT' | 'STALE';

export interface ResolvedLink {
  ref: string;
  /** A file path, or `path::symbol_name` for symbol targets. */
  target: string;
  kind: LinkKind;
  hash: string;
  line: number;
  /** Present only after a staleness check pass. */
  status?: LinkStatus;
}

export interface BrokenRef {
  ref: string;
  line: number;
  reason: string;
}

export interface AmbiguousRef {
  ref: string;
  line: number;
  reason: string;
  /** `file:line` of every remaining definition; always two or more. */
  candidates: string[];
}

export type Resolution =
  | { outcome: 'resolved'; link: ResolvedLink }
  | { outcome: 'broken'; broken: BrokenRef }
  | { outcome: 'ambiguous'; ambiguous: AmbiguousRef };

export interface DocLinks {
  links: ResolvedLink[];
  broken: BrokenRef[];
  errors: AmbiguousRef[];
}

export interface LinksIndex {
  generated: string;
  total_links: number;
  total_broken: number;
  total_errors: number;
  docs: Record<string, DocLinks>;
  /** Set once a staleness check has run against this index. */
  checked?: string;
}

// ── Staleness layer ──
export interface CheckResult {
  ref: string;
  target: string;
  line: number;
  status: LinkStatus;
  stored_hash: string;
  current_hash: string | null;
}

export interface CheckReport {
  checked: string;
  total_checked: number;
  current: number;
  stale: number;
  docs: Record<string, CheckResult[]>;
}

// ── Fix context layer ──
export type IssueType = 'stale' | 'broken' | 'ambiguous';

export interface FixContext {
  doc_path: string;
  ref: string;
  line: number;
  issue_type: IssueType;
  reason: string;
  doc_section: string | null;
  current_code: string | null;
  candidates: string[] | null;
  prompt: string;
}

export interface FixReport {
  generated: string;
  total_issues: number;
  stale: number;
  broken: number;
  errors: number;
  issues: FixContext[];
}

// ── Index health layer ──
export type HealthStatus = 'ok' | 'warning' | 'error' | 'critical';

export interface IndexMetrics {
  path: string;
  sizeBytes: number;
  sizeMb: number;
  entryCount: number;
  avgEntrySize: number;
  loadTimeMs: number;
  approxTokens: number;
}

export interface IndexHealthEntry {
  file: string;
  status: HealthStatus | 'missing';
  warnings: string[];
  metrics: IndexMetrics | null;
}

export interface IndexHealthReport {
  overallStatus: HealthStatus;
  indexes: IndexHealthEntry[];
}
