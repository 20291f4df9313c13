import type { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'path';
import { checkIndexHealth, formatHealthReport, resolveConfig } from '@doclinks/core';
import type { HealthStatus } from '@doclinks/core';
import { addCommonOptions, errorMessage, toPipelineOptions, type CommonOptions } from '../options.js';

const EXIT_CODES: Record<HealthStatus, number> = {
  ok: 0,
  warning: 0,
  error: 1,
  critical: 2,
};

function statusColor(status: HealthStatus): (text: string) => string {
  switch (status) {
    case 'ok':
      return chalk.green;
    case 'warning':
      return chalk.yellow;
    case 'error':
      return chalk.red;
    case 'critical':
      return chalk.red.bold;
  }
}

export function registerHealthCommand(program: Command): void {
  addCommonOptions(
    program
      .command('health')
      .description('Measure artifact size, load time and token footprint'),
  ).action(async (opts: CommonOptions) => {
    let exitCode = 0;
    try {
      const config = resolveConfig(toPipelineOptions(opts));
      const report = await checkIndexHealth(resolve(config.root, config.indexDir));

      if (opts.format === 'json') {
        console.log(JSON.stringify(report, null, 2));
      } else {
        console.log(statusColor(report.overallStatus)(formatHealthReport(report)));
      }

      exitCode = EXIT_CODES[report.overallStatus];
    } catch (err) {
      console.error(chalk.red(errorMessage(err)));
      exitCode = 2;
    }

    if (exitCode !== 0) {
      process.exit(exitCode);
    }
  });
}
