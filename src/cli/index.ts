#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { registerSSHCommands } from './commands/ssh';
import { registerExecCommands } from './commands/exec';
import { registerFileCommands } from './commands/file';
import { registerGroupCommands } from './commands/group';
import chalk from 'chalk';

const program = new Command();

program
  .name('rhx')
  .description(
    'Remote Host Executor - run commands and read remote files over reusable SSH connections'
  );

registerSSHCommands(program);
registerExecCommands(program);
registerFileCommands(program);
registerGroupCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error(
    chalk.red(`✗ Error: ${error instanceof Error ? error.message : error}`)
  );
  process.exit(1);
});
