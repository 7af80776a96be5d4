#!/usr/bin/env node

import { Command } from 'commander';
import { registerInitCommand } from './init.js';
import { registerConfigCommand } from './config-cmd.js';
import { registerHooksCommand } from './hooks-cmd.js';
import { registerSimulateCommand } from './simulate.js';
import { registerHistoryCommand } from './history.js';

const program = new Command();

program
  .name('tba-hooks')
  .description('tba-hooks — execution hooks for token-bound accounts')
  .version('0.1.0');

registerInitCommand(program);
registerHooksCommand(program);
registerSimulateCommand(program);
registerHistoryCommand(program);
registerConfigCommand(program);

program.parseAsync().catch((e: unknown) => {
  console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
});
