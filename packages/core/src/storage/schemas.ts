import { z } from 'zod';
import type {
  ExtractedRefs,
  FixReport,
  LinksIndex,
  SymbolIndex,
} from '../types.js';

// ── Symbol index ──

const symbolEntrySchema = z.object({
  file: z.string(),
  line: z.number().int().positive(),
  kind: z.enum(['function', 'class', 'method', 'constant']),
  signature: z.string(),
});

export const symbolIndexSchema: z.ZodType<SymbolIndex> = z.object({
  generated: z.string(),
  symbol_count: z.number().int().nonnegative(),
  file_count: z.number().int().nonnegative(),
  symbols: z.record(z.string(), z.array(symbolEntrySchema)),
});

// ── Extracted references ──

const extractedRefSchema = z.object({
  text: z.string(),
  kind: z.enum(['file', 'symbol', 'import']),
  line: z.number().int().positive(),
});

export const extractedRefsSchema: z.ZodType<ExtractedRefs> = z.object({
  generated: z.string(),
  doc_count: z.number().int().nonnegative(),
  ref_count: z.number().int().nonnegative(),
  docs: z.record(z.string(), z.array(extractedRefSchema)),
});

// ── Links ──

const resolvedLinkSchema = z.object({
  ref: z.string(),
  target: z.string(),
  kind: z.enum(['file', 'function', 'class', 'method', 'constant']),
  hash: z.string(),
  line: z.number().int().positive(),
  status: z.enum(['CURRENT', 'STALE']).optional(),
});

const brokenRefSchema = z.object({
  ref: z.string(),
  line: z.number().int().positive(),
  reason: z.string(),
});

const ambiguousRefSchema = brokenRefSchema.extend({
  candidates: z.array(z.string()).min(2),
});

export const linksIndexSchema: z.ZodType<LinksIndex> = z.object({
  generated: z.string(),
  total_links: z.number().int().nonnegative(),
  total_broken: z.number().int().nonnegative(),
  total_errors: z.number().int().nonnegative(),
  docs: z.record(
    z.string(),
    z.object({
      links: z.array(resolvedLinkSchema),
      broken: z.array(brokenRefSchema),
      errors: z.array(ambiguousRefSchema),
    }),
  ),
  checked: z.string().optional(),
});

// ── Fix report ──

const fixContextSchema = z.object({
  doc_path: z.string(),
  ref: z.string(),
  line: z.number().int().positive(),
  issue_type: z.enum(['stale', 'broken', 'ambiguous']),
  reason: z.string(),
  doc_section: z.string().nullable(),
  current_code: z.string().nullable(),
  candidates: z.array(z.string()).nullable(),
  prompt: z.string(),
});

export const fixReportSchema: z.ZodType<FixReport> = z.object({
  generated: z.string(),
  total_issues: z.number().int().nonnegative(),
  stale: z.number().int().nonnegative(),
  broken: z.number().int().nonnegative(),
  errors: z.number().int().nonnegative(),
  issues: z.array(fixContextSchema),
});
