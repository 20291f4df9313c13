import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { checkCatalog, MissingArtifactError } from '@doclinks/core';
import type { CheckReport } from '@doclinks/core';
import { addCommonOptions, errorMessage, toPipelineOptions, type CommonOptions } from '../options.js';

export function formatCheckReport(report: CheckReport): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Staleness Check'));
  lines.push('');
  lines.push(
    `  Checked: ${report.total_checked}  Current: ${report.current}  ` +
      `Stale: ${report.stale > 0 ? chalk.red(String(report.stale)) : '0'}`,
  );

  for (const [doc, results] of Object.entries(report.docs)) {
    const stale = results.filter((r) => r.status === 'STALE');
    if (stale.length === 0) continue;

    lines.push('');
    lines.push(chalk.bold(doc));
    for (const result of stale) {
      const hint = result.current_hash === null ? chalk.dim(' (target missing)') : '';
      lines.push(`  line ${result.line}: ${result.ref} -> ${result.target}${hint}`);
    }
  }

  if (report.stale === 0) {
    lines.push('');
    lines.push(chalk.green('All links are current.'));
  }

  return lines.join('\n');
}

export function registerCheckCommand(program: Command): void {
  addCommonOptions(
    program
      .command('check')
      .description('Re-hash every link target and report stale documentation'),
  ).action(async (opts: CommonOptions) => {
    const spinner = ora({ text: 'Checking links...', stream: process.stderr }).start();
    let exitCode = 0;
    try {
      const { report } = await checkCatalog(toPipelineOptions(opts));
      spinner.stop();

      if (opts.format === 'json') {
        console.log(JSON.stringify(report, null, 2));
      } else {
        console.log(formatCheckReport(report));
      }

      // Stale links fail the check
      if (report.stale > 0) {
        exitCode = 1;
      }
    } catch (err) {
      spinner.fail('Check failed');
      console.error(chalk.red(errorMessage(err)));
      exitCode = err instanceof MissingArtifactError ? 1 : 2;
    }

    if (exitCode !== 0) {
      process.exit(exitCode);
    }
  });
}
