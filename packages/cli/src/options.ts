import type { Command } from 'commander';
import { resolve } from 'path';
import { createConsoleLogger, type PipelineOptions } from '@doclinks/core';

/** Options every command accepts, as commander parses them. */
export interface CommonOptions {
  root: string;
  format: string;
  sourceDirs?: string[];
  docDirs?: string[];
  indexDir?: string;
  verbose?: boolean;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('--root <path>', 'Repository root', process.cwd())
    .option('--format <type>', 'Output format: text | json', 'text')
    .option('--source-dirs <dirs...>', 'Directories scanned for Python sources')
    .option('--doc-dirs <dirs...>', 'Directories scanned for Markdown docs')
    .option('--index-dir <path>', 'Directory the artifacts are written to')
    .option('--verbose', 'Log progress to stderr');
}

export function toPipelineOptions(opts: CommonOptions): PipelineOptions {
  return {
    root: resolve(opts.root),
    sourceDirs: opts.sourceDirs,
    docDirs: opts.docDirs,
    indexDir: opts.indexDir,
    logger: createConsoleLogger(opts.verbose ? 'info' : 'warn'),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
