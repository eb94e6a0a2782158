import type { CommandRunner } from './command.js';
import { execFileRunner } from './command.js';
import type { CollectResult, MetricSource } from './types.js';
import { collected, fallback } from './types.js';

/**
 * Header plus the first `limit` rows of `ps aux --sort=-%cpu`.
 */
export function topProcessLines(output: string, limit: number): string[] {
  return output
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0)
    .slice(0, limit + 1);
}

/**
 * Snapshot of the busiest processes, taken when a CPU alert fires.
 */
export class ProcessSnapshotSource implements MetricSource<string[]> {
  readonly name = 'processes';
  private limit: number;
  private run: CommandRunner;

  constructor(limit: number, run: CommandRunner = execFileRunner) {
    this.limit = limit;
    this.run = run;
  }

  async collect(): Promise<CollectResult<string[]>> {
    try {
      const { stdout } = await this.run('ps', ['aux', '--sort=-%cpu']);
      const lines = topProcessLines(stdout, this.limit);
      if (lines.length === 0) {
        return fallback([], 'ps produced no output');
      }
      return collected(lines);
    } catch (err) {
      return fallback([], err);
    }
  }
}
