import { statfs } from 'node:fs/promises';
import { toBoundedInt } from '@hostwatch/shared';
import type { CommandRunner } from './command.js';
import { execFileRunner } from './command.js';
import type { CollectResult, MetricSource } from './types.js';
import { collected, fallback } from './types.js';

export const DISK_DEFAULT_USAGE = 0;

/**
 * Extract the use% of the first filesystem row of `df -P <mount>`.
 */
export function parseDfUsage(output: string): number | null {
  const rows = output.split('\n').filter((line) => line.trim().length > 0);
  if (rows.length < 2) return null;

  const match = rows[1].match(/\s(\d{1,3})%\s/);
  if (!match) return null;

  const pct = Number.parseInt(match[1], 10);
  return pct <= 100 ? pct : null;
}

export class DfDiskSource implements MetricSource {
  readonly name = 'disk';
  private mount: string;
  private run: CommandRunner;

  constructor(mount: string = '/', run: CommandRunner = execFileRunner) {
    this.mount = mount;
    this.run = run;
  }

  async collect(): Promise<CollectResult<number>> {
    try {
      const { stdout } = await this.run('df', ['-P', this.mount]);
      const pct = parseDfUsage(stdout);
      if (pct === null) {
        return fallback(DISK_DEFAULT_USAGE, 'no capacity column in df output');
      }
      return collected(pct);
    } catch (err) {
      return fallback(DISK_DEFAULT_USAGE, err);
    }
  }
}

export interface FsBlocks {
  blocks: number;
  bfree: number;
  bavail: number;
}

/**
 * Used share as df computes it: blocks reserved for root count as neither
 * used nor available, and the result rounds up.
 */
export function usageFromBlocks({ blocks, bfree, bavail }: FsBlocks): number | null {
  const used = blocks - bfree;
  const denominator = used + bavail;
  if (blocks <= 0 || denominator <= 0) return null;
  return toBoundedInt(Math.ceil((used * 100) / denominator), 0, 100);
}

export class StatfsDiskSource implements MetricSource {
  readonly name = 'disk';
  private mount: string;
  private readBlocks: (mount: string) => Promise<FsBlocks>;

  constructor(mount: string = '/', readBlocks: (mount: string) => Promise<FsBlocks> = (path) => statfs(path)) {
    this.mount = mount;
    this.readBlocks = readBlocks;
  }

  async collect(): Promise<CollectResult<number>> {
    try {
      const pct = usageFromBlocks(await this.readBlocks(this.mount));
      if (pct === null) {
        return fallback(DISK_DEFAULT_USAGE, `no block counts for ${this.mount}`);
      }
      return collected(pct);
    } catch (err) {
      return fallback(DISK_DEFAULT_USAGE, err);
    }
  }
}
