import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { fixCatalog, MissingArtifactError } from '@doclinks/core';
import type { FixReport } from '@doclinks/core';
import { addCommonOptions, errorMessage, toPipelineOptions, type CommonOptions } from '../options.js';

const SEPARATOR = '-'.repeat(60);

export function formatFixReport(report: FixReport): string {
  if (report.total_issues === 0) {
    return chalk.green('No issues found. Documentation links are up to date.');
  }

  const lines: string[] = [];
  lines.push(chalk.bold(`Found ${report.total_issues} issue(s)`));
  lines.push(`  Stale: ${report.stale}  Broken: ${report.broken}  Ambiguous: ${report.errors}`);

  report.issues.forEach((issue, i) => {
    lines.push('');
    lines.push(SEPARATOR);
    lines.push(chalk.bold(`[${i + 1}/${report.total_issues}] ${issue.doc_path}:${issue.line}`));
    lines.push('');
    lines.push(issue.prompt);
  });

  return lines.join('\n');
}

export function registerFixCommand(program: Command): void {
  addCommonOptions(
    program
      .command('fix')
      .description('Check links and gather repair context for every stale, broken or ambiguous reference'),
  ).action(async (opts: CommonOptions) => {
    const spinner = ora({ text: 'Gathering fix context...', stream: process.stderr }).start();
    let exitCode = 0;
    try {
      const { report, path } = await fixCatalog(toPipelineOptions(opts));
      spinner.stop();

      if (opts.format === 'json') {
        console.log(JSON.stringify(report, null, 2));
      } else {
        console.log(formatFixReport(report));
        console.error(chalk.dim(`Fix report written to ${path}`));
      }

      if (report.total_issues > 0) {
        exitCode = 1;
      }
    } catch (err) {
      spinner.fail('Fix context failed');
      console.error(chalk.red(errorMessage(err)));
      exitCode = err instanceof MissingArtifactError ? 1 : 2;
    }

    if (exitCode !== 0) {
      process.exit(exitCode);
    }
  });
}
