import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { performance } from 'node:perf_hooks';
import { ARTIFACT_FILES } from '../config.js';
import type { HealthStatus, IndexHealthEntry, IndexHealthReport, IndexMetrics } from '../types.js';

// ── Thresholds ──

export const WARNING_SIZE_MB = 10;
export const ERROR_SIZE_MB = 50;
export const CRITICAL_SIZE_MB = 100;

export const WARNING_LOAD_TIME_MS = 500;
export const CRITICAL_LOAD_TIME_MS = 2000;

/** Roughly four bytes of JSON per token. */
export const BYTES_PER_TOKEN = 4;
export const WARNING_TOKENS = 50_000;
export const ERROR_TOKENS = 200_000;

const SEVERITY: HealthStatus[] = ['ok', 'warning', 'error', 'critical'];

export function worstStatus(a: HealthStatus, b: HealthStatus): HealthStatus {
  return SEVERITY.indexOf(a) >= SEVERITY.indexOf(b) ? a : b;
}

/** Number of records an artifact holds, by its top-level shape. */
export function countEntries(data: unknown): number {
  if (typeof data !== 'object' || data === null) {
    return 0;
  }
  if (Array.isArray(data)) {
    return data.length;
  }
  if ('symbols' in data && isRecord(data.symbols)) {
    return Object.values(data.symbols).reduce<number>(
      (sum, value) => sum + (Array.isArray(value) ? value.length : 1),
      0,
    );
  }
  if ('issues' in data && Array.isArray(data.issues)) {
    return data.issues.length;
  }
  if ('docs' in data && isRecord(data.docs)) {
    let total = 0;
    for (const doc of Object.values(data.docs)) {
      if (Array.isArray(doc)) {
        total += doc.length;
      } else if (isRecord(doc)) {
        for (const group of Object.values(doc)) {
          if (Array.isArray(group)) total += group.length;
        }
      }
    }
    return total;
  }
  return Object.keys(data).length;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Size, entry count and parse time of one artifact. Throws when unreadable. */
export async function measureIndex(path: string): Promise<IndexMetrics> {
  const { size } = await stat(path);

  const start = performance.now();
  const data: unknown = JSON.parse(await readFile(path, 'utf-8'));
  const loadTimeMs = performance.now() - start;

  const entryCount = countEntries(data);
  return {
    path,
    sizeBytes: size,
    sizeMb: round2(size / (1024 * 1024)),
    entryCount,
    avgEntrySize: entryCount > 0 ? Math.floor(size / entryCount) : 0,
    loadTimeMs: round2(loadTimeMs),
    approxTokens: Math.floor(size / BYTES_PER_TOKEN),
  };
}

/** Classify measured metrics against the thresholds. */
export function evaluateMetrics(metrics: IndexMetrics): {
  status: HealthStatus;
  warnings: string[];
} {
  let status: HealthStatus = 'ok';
  const warnings: string[] = [];

  if (metrics.sizeMb >= CRITICAL_SIZE_MB) {
    status = worstStatus(status, 'critical');
    warnings.push(`Index size ${metrics.sizeMb}MB exceeds ${CRITICAL_SIZE_MB}MB`);
  } else if (metrics.sizeMb >= ERROR_SIZE_MB) {
    status = worstStatus(status, 'error');
    warnings.push(`Index size ${metrics.sizeMb}MB exceeds ${ERROR_SIZE_MB}MB`);
  } else if (metrics.sizeMb >= WARNING_SIZE_MB) {
    status = worstStatus(status, 'warning');
    warnings.push(`Index size ${metrics.sizeMb}MB is approaching the limit`);
  }

  if (metrics.loadTimeMs >= CRITICAL_LOAD_TIME_MS) {
    status = worstStatus(status, 'critical');
    warnings.push(`Load time ${metrics.loadTimeMs}ms exceeds ${CRITICAL_LOAD_TIME_MS}ms`);
  } else if (metrics.loadTimeMs >= WARNING_LOAD_TIME_MS) {
    status = worstStatus(status, 'warning');
    warnings.push(`Load time ${metrics.loadTimeMs}ms is slow`);
  }

  if (metrics.approxTokens >= ERROR_TOKENS) {
    status = worstStatus(status, 'error');
    warnings.push(`Index may consume ~${metrics.approxTokens} tokens if loaded whole`);
  } else if (metrics.approxTokens >= WARNING_TOKENS) {
    status = worstStatus(status, 'warning');
    warnings.push(`Index may consume ~${metrics.approxTokens} tokens if loaded whole`);
  }

  return { status, warnings };
}

/**
 * Measure every artifact in `indexDir`. Missing artifacts are reported as
 * `missing` and do not affect the overall status; unreadable ones are errors.
 */
export async function checkIndexHealth(indexDir: string): Promise<IndexHealthReport> {
  const indexes: IndexHealthEntry[] = [];
  let overallStatus: HealthStatus = 'ok';

  for (const file of Object.values(ARTIFACT_FILES)) {
    const path = join(indexDir, file);
    const exists = await stat(path).then(
      (info) => info.isFile(),
      () => false,
    );
    if (!exists) {
      indexes.push({ file, status: 'missing', warnings: [], metrics: null });
      continue;
    }

    let entry: IndexHealthEntry;
    try {
      const metrics = await measureIndex(path);
      entry = { file, metrics, ...evaluateMetrics(metrics) };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      entry = { file, status: 'error', warnings: [`Failed to read index: ${detail}`], metrics: null };
    }

    if (entry.status !== 'missing') {
      overallStatus = worstStatus(overallStatus, entry.status);
    }
    indexes.push(entry);
  }

  return { overallStatus, indexes };
}

export function formatHealthReport(report: IndexHealthReport): string {
  const lines = ['INDEX HEALTH REPORT', '', `Overall status: ${report.overallStatus.toUpperCase()}`, ''];

  for (const entry of report.indexes) {
    lines.push(`${entry.file}: ${entry.status.toUpperCase()}`);
    if (entry.metrics) {
      const m = entry.metrics;
      lines.push(
        `  size: ${m.sizeMb}MB (${m.sizeBytes} bytes), entries: ${m.entryCount}, ` +
          `load: ${m.loadTimeMs}ms, ~${m.approxTokens} tokens`,
      );
    }
    for (const warning of entry.warnings) {
      lines.push(`  - ${warning}`);
    }
  }

  return lines.join('\n');
}
