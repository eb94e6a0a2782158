import { cpus } from 'node:os';
import { setTimeout as delay } from 'node:timers/promises';
import { toBoundedInt } from '@hostwatch/shared';
import type { CommandRunner } from './command.js';
import { execFileRunner } from './command.js';
import type { CollectResult, MetricSource } from './types.js';
import { collected, fallback } from './types.js';

/** Usage reported when idle time cannot be read: 100% idle. */
export const CPU_DEFAULT_USAGE = 0;

/**
 * Extract %idle from `sar <window> 1`: the last column of the `Average:` row.
 * Returns null when the row is missing or the value is not a percentage.
 */
export function parseSarIdle(output: string): number | null {
  const row = output.split('\n').find((line) => line.startsWith('Average:'));
  if (!row) return null;

  const fields = row.trim().split(/\s+/);
  const idle = Number.parseFloat(fields[fields.length - 1]);
  if (!Number.isFinite(idle) || idle < 0 || idle > 100) return null;
  return idle;
}

export function usageFromIdle(idle: number): number {
  return toBoundedInt(100 - idle, 0, 100);
}

export function windowSeconds(windowMs: number): number {
  return Math.max(1, Math.round(windowMs / 1000));
}

export class SarCpuSource implements MetricSource {
  readonly name = 'cpu';
  private windowMs: number;
  private run: CommandRunner;

  constructor(windowMs: number, run: CommandRunner = execFileRunner) {
    this.windowMs = windowMs;
    this.run = run;
  }

  async collect(): Promise<CollectResult<number>> {
    const seconds = windowSeconds(this.windowMs);
    try {
      const { stdout } = await this.run('sar', [String(seconds), '1'], {
        timeout: seconds * 1000 + 10_000,
      });
      const idle = parseSarIdle(stdout);
      if (idle === null) {
        return fallback(CPU_DEFAULT_USAGE, 'no Average row with %idle in sar output');
      }
      return collected(usageFromIdle(idle));
    } catch (err) {
      return fallback(CPU_DEFAULT_USAGE, err);
    }
  }
}

export interface CpuTimes {
  idle: number;
  total: number;
}

export function readCpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus()) {
    idle += cpu.times.idle;
    total += Object.values(cpu.times).reduce((a, b) => a + b, 0);
  }
  return { idle, total };
}

/** Percentage of time idle between two readings, or null when no time passed. */
export function idleBetween(before: CpuTimes, after: CpuTimes): number | null {
  const totalDiff = after.total - before.total;
  if (totalDiff <= 0) return null;
  const idleDiff = after.idle - before.idle;
  return (idleDiff / totalDiff) * 100;
}

export interface OsCpuSourceOptions {
  readTimes?: () => CpuTimes;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Usage from the kernel's per-core tick counters, observed over the
 * sampling window.
 */
export class OsCpuSource implements MetricSource {
  readonly name = 'cpu';
  private windowMs: number;
  private readTimes: () => CpuTimes;
  private sleep: (ms: number) => Promise<void>;

  constructor(windowMs: number, options: OsCpuSourceOptions = {}) {
    this.windowMs = windowMs;
    this.readTimes = options.readTimes ?? readCpuTimes;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  async collect(): Promise<CollectResult<number>> {
    try {
      const before = this.readTimes();
      await this.sleep(this.windowMs);
      const after = this.readTimes();

      const idle = idleBetween(before, after);
      if (idle === null) {
        return fallback(CPU_DEFAULT_USAGE, 'cpu tick counters did not advance');
      }
      return collected(usageFromIdle(idle));
    } catch (err) {
      return fallback(CPU_DEFAULT_USAGE, err);
    }
  }
}
