import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Command } from 'commander';
import { registerFixCommand } from '../../src/commands/fix.js';
import { MissingArtifactError } from '@doclinks/core';
import type { FixContext, FixReport } from '@doclinks/core';

// ── Mock @doclinks/core ──
const mockFixCatalog = vi.fn();
vi.mock('@doclinks/core', () => ({
  fixCatalog: (...args: unknown[]) => mockFixCatalog(...args),
  createConsoleLogger: () => ({ debug() {}, info() {}, warn() {}, error() {} }),
  MissingArtifactError: class MissingArtifactError extends Error {
    constructor(_artifact: string, path: string) {
      super(`Required artifact not found: ${path}`);
    }
  },
}));

// ── Mock ora ──
const mockStop = vi.fn();
const mockFail = vi.fn();
vi.mock('ora', () => ({
  default: () => ({
    start: () => ({ stop: mockStop, fail: mockFail }),
  }),
}));

// ── Mock chalk (passthrough) ──
vi.mock('chalk', () => {
  const passthrough = (s: string) => s;
  const fn = Object.assign(passthrough, {
    bold: passthrough,
    dim: passthrough,
    red: passthrough,
    green: passthrough,
    yellow: passthrough,
  });
  return { default: fn };
});

// ── Helpers ──
function makeIssue(overrides: Partial<FixContext> = {}): FixContext {
  return {
    doc_path: 'docs/guide.md',
    ref: 'app/billing.py',
    line: 10,
    issue_type: 'broken',
    reason: 'file not found',
    doc_section: 'Legacy',
    current_code: null,
    candidates: ['app/services/billing.py'],
    prompt: 'Fix the following broken reference in `docs/guide.md`:',
    ...overrides,
  };
}

function makeReport(issues: FixContext[]): FixReport {
  return {
    generated: '2026-01-01T00:00:00.000Z',
    total_issues: issues.length,
    stale: issues.filter((i) => i.issue_type === 'stale').length,
    broken: issues.filter((i) => i.issue_type === 'broken').length,
    errors: issues.filter((i) => i.issue_type === 'ambiguous').length,
    issues,
  };
}

const REPORT_PATH = '/repo/docs/indexes/fix_report.json';

function createProgram(): Command {
  const program = new Command();
  program.exitOverride();
  registerFixCommand(program);
  return program;
}

describe('fix command', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockFixCatalog.mockResolvedValue({ report: makeReport([]), path: REPORT_PATH });
  });

  it('reports a clean catalog without exiting', async () => {
    const program = createProgram();
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    await program.parseAsync(['node', 'doclinks', 'fix']);

    expect(exitSpy).not.toHaveBeenCalled();
    expect(consoleSpy).toHaveBeenCalledWith('No issues found. Documentation links are up to date.');
    expect(consoleErrorSpy).toHaveBeenCalledWith(`Fix report written to ${REPORT_PATH}`);

    consoleSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    exitSpy.mockRestore();
  });

  it('prints one prompt per issue and exits with code 1', async () => {
    mockFixCatalog.mockResolvedValue({
      report: makeReport([
        makeIssue({ issue_type: 'stale', ref: 'charge', line: 5, prompt: 'stale prompt' }),
        makeIssue({ prompt: 'broken prompt' }),
      ]),
      path: REPORT_PATH,
    });

    const program = createProgram();
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    await expect(program.parseAsync(['node', 'doclinks', 'fix'])).rejects.toThrow('process.exit');

    expect(exitSpy).toHaveBeenCalledWith(1);
    const separator = '-'.repeat(60);
    expect((consoleSpy.mock.calls[0][0] as string).split('\n')).toEqual([
      'Found 2 issue(s)',
      '  Stale: 1  Broken: 1  Ambiguous: 0',
      '',
      separator,
      '[1/2] docs/guide.md:5',
      '',
      'stale prompt',
      '',
      separator,
      '[2/2] docs/guide.md:10',
      '',
      'broken prompt',
    ]);

    consoleSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    exitSpy.mockRestore();
  });

  it('prints the report as JSON when --format json is specified', async () => {
    const report = makeReport([makeIssue()]);
    mockFixCatalog.mockResolvedValue({ report, path: REPORT_PATH });

    const program = createProgram();
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    await expect(
      program.parseAsync(['node', 'doclinks', 'fix', '--format', 'json']),
    ).rejects.toThrow('process.exit');

    expect(JSON.parse(consoleSpy.mock.calls[0][0] as string)).toEqual(report);
    expect(exitSpy).toHaveBeenCalledWith(1);

    consoleSpy.mockRestore();
    exitSpy.mockRestore();
  });

  it('exits with code 1 when links.json has not been built', async () => {
    mockFixCatalog.mockRejectedValue(new MissingArtifactError('links', '/repo/docs/indexes/links.json'));

    const program = createProgram();
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    await expect(program.parseAsync(['node', 'doclinks', 'fix'])).rejects.toThrow('process.exit');

    expect(mockFail).toHaveBeenCalledWith('Fix context failed');
    expect(exitSpy).toHaveBeenCalledWith(1);

    consoleErrorSpy.mockRestore();
    exitSpy.mockRestore();
  });

  it('exits with code 2 on any other error', async () => {
    mockFixCatalog.mockRejectedValue(new Error('could not write'));

    const program = createProgram();
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    await expect(program.parseAsync(['node', 'doclinks', 'fix'])).rejects.toThrow('process.exit');

    expect(consoleErrorSpy).toHaveBeenCalledWith('could not write');
    expect(exitSpy).toHaveBeenCalledWith(2);

    consoleErrorSpy.mockRestore();
    exitSpy.mockRestore();
  });
});
