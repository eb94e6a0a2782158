import { freemem, totalmem } from 'node:os';
import { toBoundedInt } from '@hostwatch/shared';
import type { CommandRunner } from './command.js';
import { execFileRunner } from './command.js';
import type { CollectResult, MetricSource } from './types.js';
import { collected, fallback } from './types.js';

export const MEM_DEFAULT_USAGE = 0;

export function usageFromTotals(used: number, total: number): number | null {
  if (!Number.isFinite(used) || !Number.isFinite(total) || total <= 0 || used < 0) return null;
  return toBoundedInt((used * 100) / total, 0, 100);
}

/**
 * `free -m`: used × 100 / total from the `Mem:` row.
 */
export function parseFreeUsage(output: string): number | null {
  const row = output.split('\n').find((line) => line.trimStart().startsWith('Mem:'));
  if (!row) return null;

  const [, total, used] = row.trim().split(/\s+/);
  return usageFromTotals(Number(used), Number(total));
}

export class FreeMemorySource implements MetricSource {
  readonly name = 'memory';
  private run: CommandRunner;

  constructor(run: CommandRunner = execFileRunner) {
    this.run = run;
  }

  async collect(): Promise<CollectResult<number>> {
    try {
      const { stdout } = await this.run('free', ['-m']);
      const pct = parseFreeUsage(stdout);
      if (pct === null) {
        return fallback(MEM_DEFAULT_USAGE, 'no Mem row in free output');
      }
      return collected(pct);
    } catch (err) {
      return fallback(MEM_DEFAULT_USAGE, err);
    }
  }
}

export interface MemoryTotals {
  total: number;
  free: number;
}

export class OsMemorySource implements MetricSource {
  readonly name = 'memory';
  private readTotals: () => MemoryTotals;

  constructor(readTotals: () => MemoryTotals = () => ({ total: totalmem(), free: freemem() })) {
    this.readTotals = readTotals;
  }

  async collect(): Promise<CollectResult<number>> {
    try {
      const { total, free } = this.readTotals();
      const pct = usageFromTotals(total - free, total);
      if (pct === null) {
        return fallback(MEM_DEFAULT_USAGE, 'memory totals unavailable');
      }
      return collected(pct);
    } catch (err) {
      return fallback(MEM_DEFAULT_USAGE, err);
    }
  }
}
