#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'module';
import { registerBuildCommand } from './commands/build.js';
import { registerCheckCommand } from './commands/check.js';
import { registerStatusCommand } from './commands/status.js';
import { registerFixCommand } from './commands/fix.js';
import { registerHealthCommand } from './commands/health.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const program = new Command();
program
  .name('doclinks')
  .description('Keep Markdown docs linked to the Python code they describe')
  .version(version);

registerBuildCommand(program);
registerCheckCommand(program);
registerStatusCommand(program);
registerFixCommand(program);
registerHealthCommand(program);

await program.parseAsync();
