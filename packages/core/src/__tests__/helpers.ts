import { vi } from 'vitest';
import type { Sample } from '@hostwatch/shared';
import type { CommandRunner } from '../sources/command.js';
import type { CollectResult, MetricSource } from '../sources/types.js';

export function makeSample(overrides: Partial<Sample> = {}): Sample {
  return {
    timestamp: new Date(2024, 0, 15, 10, 30, 0),
    cpuUsagePct: 10,
    diskUsagePct: 20,
    memUsagePct: 30,
    netTotalKbps: 40,
    connectivity: 'OK',
    unreachableHosts: [],
    ...overrides,
  };
}

/** Runner that answers every command with `stdout`. */
export function runnerReturning(stdout: string): CommandRunner {
  return vi.fn(async () => ({ stdout, stderr: '' }));
}

export function failingRunner(error: Error): CommandRunner {
  return vi.fn(async () => {
    throw error;
  });
}

/** Source that yields `values` in turn, repeating the last one. */
export class StubSource<T = number> implements MetricSource<T> {
  readonly name: string;
  calls: number = 0;
  private results: CollectResult<T>[];

  constructor(name: string, ...results: CollectResult<T>[]) {
    this.name = name;
    this.results = results;
  }

  async collect(): Promise<CollectResult<T>> {
    const result = this.results[Math.min(this.calls, this.results.length - 1)];
    this.calls++;
    return result;
  }
}
