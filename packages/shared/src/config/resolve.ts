import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { HOSTWATCH_CONFIG_FILE, HOSTWATCH_ENV_PREFIX } from '../constants.js';
import { monitorConfigSchema } from '../schemas/config.schema.js';
import type { ValidatedMonitorConfig } from '../schemas/config.schema.js';
import type { MonitorConfig } from '../types/config.js';
import { ConfigValidationError } from '../utils/errors.js';

export type RawLayer = Record<string, unknown>;

export interface ResolveConfigOptions {
  /** Explicit config file. Must exist when given. */
  file?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /**
   * Highest-precedence values in the config file's shape, typically from CLI
   * flags. Validated like every other layer.
   */
  overrides?: RawLayer;
}

const SECTIONS = ['thresholds', 'probe', 'logs'] as const;

/**
 * Build the immutable runtime configuration.
 *
 * Precedence, lowest first: schema defaults, config file, `HOSTWATCH_*`
 * environment variables, explicit overrides. Any invalid value fails the
 * whole resolution with a {@link ConfigValidationError}.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): MonitorConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const layers: RawLayer[] = [
    loadConfigFile(options.file, cwd),
    readEnv(env),
    { ...options.overrides },
  ];
  const merged = layers.reduce<RawLayer>((acc, layer) => mergeLayers(acc, layer), {});

  const result = monitorConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    );
  }

  return toMonitorConfig(result.data, cwd);
}

export function loadConfigFile(file: string | undefined, cwd: string): RawLayer {
  const path = file ? resolve(cwd, file) : resolve(cwd, HOSTWATCH_CONFIG_FILE);

  if (!existsSync(path)) {
    if (file) {
      throw new ConfigValidationError([`config file not found: ${path}`]);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError([`${path}: ${reason}`]);
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigValidationError([`${path}: expected a JSON object`]);
  }
  return parsed;
}

/**
 * Map `HOSTWATCH_*` variables onto the raw config shape. Numeric variables
 * that do not parse are passed through as NaN so validation reports them.
 */
export function readEnv(env: NodeJS.ProcessEnv): RawLayer {
  const get = (name: string): string | undefined => {
    const value = env[`${HOSTWATCH_ENV_PREFIX}${name}`];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };

  const layer: RawLayer = {};
  const thresholds: RawLayer = {};
  const logs: RawLayer = {};

  const interval = get('INTERVAL');
  if (interval !== undefined) layer.interval = interval;

  const iface = get('INTERFACE');
  if (iface !== undefined) layer.interface = iface;

  const hosts = get('HOSTS');
  if (hosts !== undefined) layer.hosts = splitList(hosts);

  const sources = get('SOURCES');
  if (sources !== undefined) layer.sources = sources;

  const cooldown = get('ALERT_COOLDOWN');
  if (cooldown !== undefined) layer.alert_cooldown = cooldown;

  const logLevel = get('LOG_LEVEL');
  if (logLevel !== undefined) layer.log_level = logLevel;

  const numeric: [string, string][] = [
    ['CPU_THRESHOLD', 'cpu_pct'],
    ['DISK_THRESHOLD', 'disk_pct'],
    ['MEM_THRESHOLD', 'mem_pct'],
    ['NET_THRESHOLD', 'net_kbps'],
  ];
  for (const [name, key] of numeric) {
    const value = get(name);
    if (value !== undefined) thresholds[key] = Number(value);
  }

  const logDir = get('LOG_DIR');
  if (logDir !== undefined) logs.dir = logDir;

  if (Object.keys(thresholds).length > 0) layer.thresholds = thresholds;
  if (Object.keys(logs).length > 0) layer.logs = logs;
  return layer;
}

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function mergeLayers(base: RawLayer, layer: RawLayer): RawLayer {
  const merged: RawLayer = { ...base };
  for (const [key, value] of Object.entries(layer)) {
    if (value === undefined) continue;
    const previous = merged[key];
    if (isSection(key) && isPlainObject(previous) && isPlainObject(value)) {
      merged[key] = { ...previous, ...stripUndefined(value) };
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

function isSection(key: string): boolean {
  return SECTIONS.some((section) => section === key);
}

function stripUndefined(value: RawLayer): RawLayer {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

function isPlainObject(value: unknown): value is RawLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toMonitorConfig(data: ValidatedMonitorConfig, cwd: string): MonitorConfig {
  const config: MonitorConfig = {
    thresholds: {
      cpuPct: data.thresholds.cpu_pct,
      diskPct: data.thresholds.disk_pct,
      memPct: data.thresholds.mem_pct,
      netKbps: data.thresholds.net_kbps,
    },
    interval: data.interval,
    interface: data.interface,
    hosts: [...new Set(data.hosts)],
    probe: {
      count: data.probe.count,
      timeout: data.probe.timeout,
    },
    sampleWindow: data.sample_window,
    sources: data.sources,
    logs: {
      dir: resolve(cwd, data.logs.dir),
      metricsFile: data.logs.metrics_file,
      alertFile: data.logs.alert_file,
      diagnosticFile: data.logs.diagnostic_file,
    },
    alertCooldown: data.alert_cooldown,
    topProcesses: data.top_processes,
    logLevel: data.log_level,
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
