#!/usr/bin/env tsx

import { Command } from 'commander';
import chalk from 'chalk';
import { HOSTWATCH_VERSION } from '@hostwatch/shared';
import { runCommand } from './commands/run.js';
import { checkCommand } from './commands/check.js';
import { doctorCommand } from './commands/doctor.js';
import { configCommand } from './commands/config.js';

const program = new Command();

program
  .name('hostwatch')
  .version(HOSTWATCH_VERSION, '-v, --version')
  .description(chalk.bold('hostwatch') + ': host metrics sampling with threshold alerts')
  .addCommand(runCommand, { isDefault: true })
  .addCommand(checkCommand)
  .addCommand(doctorCommand)
  .addCommand(configCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(msg));
  process.exitCode = 1;
});
