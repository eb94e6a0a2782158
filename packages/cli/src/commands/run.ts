import { Command } from 'commander';
import chalk from 'chalk';
import { join } from 'node:path';
import { ALERT_LABELS, HostMonitor } from '@hostwatch/core';
import type { ConfigFlags } from '../utils/options.js';
import { addConfigOptions, loadConfig } from '../utils/options.js';
import { formatDuration } from '../utils/format.js';

export const runCommand = addConfigOptions(
  new Command('run').description('Run the monitor in the foreground until interrupted'),
).action(async (flags: ConfigFlags) => {
  const config = loadConfig(flags);
  if (!config) return;

  const monitor = new HostMonitor(config);
  const bus = monitor.getEventBus();
  bus.on('alert:raised', (alert) => {
    console.log(chalk.red(`  ! ${ALERT_LABELS[alert.kind]}: ${alert.message}`));
  });
  bus.on('sink:error', (err) => {
    console.error(chalk.yellow(`  ⚠ ${err.message}`));
  });

  console.log(chalk.bold('\n  hostwatch'));
  console.log(`  Interval:  every ${formatDuration(config.interval)}`);
  console.log(`  Interface: ${config.interface}`);
  console.log(`  Hosts:     ${config.hosts.join(', ')}`);
  console.log(`  Sources:   ${config.sources}`);
  console.log(`  Metrics:   ${join(config.logs.dir, config.logs.metricsFile)}`);
  console.log(`  Alerts:    ${join(config.logs.dir, config.logs.alertFile)}`);
  console.log(chalk.gray('  Press Ctrl+C to stop.\n'));

  await monitor.run();
});
