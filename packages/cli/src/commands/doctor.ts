import { Command } from 'commander';
import chalk from 'chalk';
import { accessSync, constants, existsSync } from 'node:fs';
import { networkInterfaces } from 'node:os';
import { dirname } from 'node:path';
import { requiredTools } from '@hostwatch/core';
import type { ConfigFlags } from '../utils/options.js';
import { addConfigOptions, loadConfig } from '../utils/options.js';
import { checkLine } from '../utils/format.js';
import { findExecutable } from '../utils/which.js';

function isWritable(path: string): boolean {
  try {
    accessSync(path, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

export const doctorCommand = addConfigOptions(
  new Command('doctor').description('Check that this host has what the monitor needs'),
).action((flags: ConfigFlags) => {
  console.log(chalk.bold('\n  hostwatch doctor\n'));

  const config = loadConfig(flags);
  if (!config) return;

  let issues = 0;

  // Check Node.js version
  const nodeVersion = process.versions.node;
  const major = parseInt(nodeVersion.split('.')[0], 10);
  const nodeOk = major >= 20;
  console.log(checkLine(nodeOk, `Node.js version: ${nodeVersion}${nodeOk ? '' : ' (requires >= 20)'}`));
  if (!nodeOk) issues++;

  // External tools for the configured source family
  for (const tool of requiredTools(config.sources)) {
    const path = findExecutable(tool);
    console.log(checkLine(path !== null, path ? `${tool}: ${path}` : `${tool}: not found on PATH`));
    if (!path) issues++;
  }

  if (config.sources === 'native' && !existsSync('/proc/net/dev')) {
    console.log(checkLine(false, '/proc/net/dev not available (native sources need Linux)'));
    issues++;
  }

  // Network interface
  const interfaces = Object.keys(networkInterfaces());
  const ifaceOk = interfaces.includes(config.interface);
  console.log(
    checkLine(
      ifaceOk,
      ifaceOk
        ? `Interface: ${config.interface}`
        : `Interface ${config.interface} not found (available: ${interfaces.join(', ') || 'none'})`,
    ),
  );
  if (!ifaceOk) issues++;

  // Log directory
  if (existsSync(config.logs.dir)) {
    const writable = isWritable(config.logs.dir);
    console.log(checkLine(writable, `Log directory${writable ? '' : ' not writable'}: ${config.logs.dir}`));
    if (!writable) issues++;
  } else if (isWritable(dirname(config.logs.dir))) {
    console.log(chalk.yellow(`  ⚠ Log directory will be created: ${config.logs.dir}`));
  } else {
    console.log(checkLine(false, `Log directory cannot be created: ${config.logs.dir}`));
    issues++;
  }

  console.log('');

  if (issues > 0) {
    console.log(chalk.red(`  Found ${issues} issue(s) to fix.\n`));
    process.exitCode = 1;
  } else {
    console.log(chalk.green(`  No issues found. Ready to monitor.\n`));
  }
});
