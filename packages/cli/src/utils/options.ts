import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import type { MonitorConfig, RawLayer } from '@hostwatch/shared';
import { ConfigValidationError, HOSTWATCH_CONFIG_FILE, getLogger, resolveConfig, splitList } from '@hostwatch/shared';

/** Flags shared by every command that needs a resolved configuration. */
export interface ConfigFlags {
  config?: string;
  interval?: string;
  interface?: string;
  hosts?: string;
  cpu?: number;
  disk?: number;
  mem?: number;
  net?: number;
  logDir?: string;
  sources?: string;
  cooldown?: string;
  logLevel?: string;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function addConfigOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', `Config file (default: ./${HOSTWATCH_CONFIG_FILE} when present)`)
    .option('--interval <duration>', 'Pause between cycles (e.g. 60s, 5m)')
    .option('--interface <name>', 'Network interface to measure')
    .option('--hosts <list>', 'Comma-separated hosts for the connectivity probe')
    .option('--cpu <pct>', 'CPU usage threshold (%)', parseInteger)
    .option('--disk <pct>', 'Root filesystem usage threshold (%)', parseInteger)
    .option('--mem <pct>', 'Memory usage threshold (%)', parseInteger)
    .option('--net <kbps>', 'Network throughput threshold (KB/s)', parseInteger)
    .option('--log-dir <dir>', 'Directory for the metrics, alert and diagnostic logs')
    .option('--sources <family>', 'Metric source family (sysstat|native)')
    .option('--cooldown <duration>', 'Suppress repeated alerts of one kind within this window')
    .option('--log-level <level>', 'Operational log level (trace|debug|info|warn|error|fatal)');
}

/**
 * Map flags onto the config file's shape. Unset flags are left out so lower
 * layers show through.
 */
export function flagsToOverrides(flags: ConfigFlags): RawLayer {
  const overrides: RawLayer = {};
  const thresholds: RawLayer = {};

  if (flags.interval !== undefined) overrides.interval = flags.interval;
  if (flags.interface !== undefined) overrides.interface = flags.interface;
  if (flags.hosts !== undefined) overrides.hosts = splitList(flags.hosts);
  if (flags.sources !== undefined) overrides.sources = flags.sources;
  if (flags.cooldown !== undefined) overrides.alert_cooldown = flags.cooldown;
  if (flags.logLevel !== undefined) overrides.log_level = flags.logLevel;
  if (flags.logDir !== undefined) overrides.logs = { dir: flags.logDir };

  if (flags.cpu !== undefined) thresholds.cpu_pct = flags.cpu;
  if (flags.disk !== undefined) thresholds.disk_pct = flags.disk;
  if (flags.mem !== undefined) thresholds.mem_pct = flags.mem;
  if (flags.net !== undefined) thresholds.net_kbps = flags.net;
  if (Object.keys(thresholds).length > 0) overrides.thresholds = thresholds;

  return overrides;
}

/**
 * Resolve the configuration for a command and apply its log level, or print
 * why it is invalid, set exit code 1 and return null.
 */
export function loadConfig(flags: ConfigFlags): MonitorConfig | null {
  try {
    const config = resolveConfig({ file: flags.config, overrides: flagsToOverrides(flags) });
    getLogger().level = config.logLevel;
    return config;
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      console.error(chalk.red('Invalid configuration:'));
      for (const message of err.errors) {
        console.error(chalk.red(`  - ${message}`));
      }
    } else {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Failed to load configuration: ${msg}`));
    }
    process.exitCode = 1;
    return null;
  }
}
