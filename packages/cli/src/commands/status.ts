import type { Command } from 'commander';
import chalk from 'chalk';
import { readCatalogStatus } from '@doclinks/core';
import type { CatalogStatus } from '@doclinks/core';
import { addCommonOptions, errorMessage, toPipelineOptions, type CommonOptions } from '../options.js';

function healthLabel(health: CatalogStatus['health']): string {
  switch (health) {
    case 'healthy':
      return chalk.green('HEALTHY');
    case 'issues':
      return chalk.yellow('ISSUES FOUND');
    case 'missing':
      return chalk.red('NOT BUILT');
  }
}

export function formatStatus(status: CatalogStatus): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Catalog Status'));
  lines.push('');

  if (status.symbols) {
    lines.push(`  Symbols:    ${status.symbols.count} in ${status.symbols.files} files (${status.symbols.generated})`);
  } else {
    lines.push(`  Symbols:    ${chalk.dim('not built')}`);
  }

  if (status.refs) {
    lines.push(`  References: ${status.refs.count} in ${status.refs.docs} docs (${status.refs.generated})`);
  } else {
    lines.push(`  References: ${chalk.dim('not built')}`);
  }

  if (status.links) {
    const { resolved, broken, ambiguous, checked, stale } = status.links;
    lines.push(`  Links:      ${resolved} resolved, ${broken} broken, ${ambiguous} ambiguous`);
    lines.push(
      checked
        ? `  Checked:    ${checked}, ${stale ?? 0} stale`
        : `  Checked:    ${chalk.dim('never')}`,
    );
  } else {
    lines.push(`  Links:      ${chalk.dim('not built')}`);
  }

  lines.push('');
  lines.push(`  Health: ${healthLabel(status.health)}`);

  return lines.join('\n');
}

export function registerStatusCommand(program: Command): void {
  addCommonOptions(
    program
      .command('status')
      .description('Summarize the persisted artifacts without re-scanning'),
  ).action(async (opts: CommonOptions) => {
    try {
      const status = await readCatalogStatus(toPipelineOptions(opts));

      if (opts.format === 'json') {
        console.log(JSON.stringify(status, null, 2));
      } else {
        console.log(formatStatus(status));
      }
    } catch (err) {
      console.error(chalk.red(errorMessage(err)));
      process.exit(2);
    }
  });
}
