import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { buildCatalog } from '@doclinks/core';
import type { BuildSummary } from '@doclinks/core';
import { addCommonOptions, errorMessage, toPipelineOptions, type CommonOptions } from '../options.js';

export function formatBuildSummary(summary: BuildSummary): string {
  const { symbols, refs, links } = summary;
  const lines: string[] = [];

  lines.push(chalk.bold('Catalog built'));
  lines.push('');
  lines.push(`  Symbols:    ${symbols.count} in ${symbols.files} files`);
  lines.push(`  References: ${refs.count} in ${refs.docs} docs`);
  lines.push(
    `  Links:      ${chalk.green(`${links.resolved} resolved`)}, ` +
      `${links.broken > 0 ? chalk.red(`${links.broken} broken`) : `${links.broken} broken`}, ` +
      `${links.ambiguous > 0 ? chalk.yellow(`${links.ambiguous} ambiguous`) : `${links.ambiguous} ambiguous`}`,
  );
  lines.push('');
  lines.push(chalk.dim(`  ${links.path}`));

  return lines.join('\n');
}

export function registerBuildCommand(program: Command): void {
  addCommonOptions(
    program
      .command('build')
      .alias('rebuild')
      .description('Index symbols, extract doc references and resolve them into links.json'),
  ).action(async (opts: CommonOptions) => {
    const spinner = ora({ text: 'Building catalog...', stream: process.stderr }).start();
    let exitCode = 0;
    try {
      const summary = await buildCatalog(toPipelineOptions(opts));
      spinner.stop();

      if (opts.format === 'json') {
        console.log(JSON.stringify(summary, null, 2));
      } else {
        console.log(formatBuildSummary(summary));
      }
    } catch (err) {
      spinner.fail('Build failed');
      console.error(chalk.red(errorMessage(err)));
      exitCode = 2;
    }

    if (exitCode !== 0) {
      process.exit(exitCode);
    }
  });
}
