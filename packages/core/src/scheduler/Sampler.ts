import type { ConnectivityReport, Sample } from '@hostwatch/shared';
import { toBoundedInt } from '@hostwatch/shared';
import type { ConnectivityChecker } from '../connectivity/ConnectivityChecker.js';
import type { MetricSources } from '../sources/index.js';
import type { CollectResult, MetricSource } from '../sources/types.js';
import { fallback } from '../sources/types.js';

export interface SourceFailure {
  source: string;
  error: string;
}

export interface SampleResult {
  sample: Sample;
  connectivity: ConnectivityReport;
  failures: SourceFailure[];
}

export class Sampler {
  private sources: MetricSources;
  private connectivity: ConnectivityChecker;
  private now: () => Date;

  constructor(sources: MetricSources, connectivity: ConnectivityChecker, now: () => Date = () => new Date()) {
    this.sources = sources;
    this.connectivity = connectivity;
    this.now = now;
  }

  /**
   * Collect every dimension behind one barrier. The sample is only returned
   * once all sources have produced a value or their default.
   */
  async sample(): Promise<SampleResult> {
    const timestamp = this.now();

    const [cpu, disk, memory, network, connectivity] = await Promise.all([
      collectSafely(this.sources.cpu),
      collectSafely(this.sources.disk),
      collectSafely(this.sources.memory),
      collectSafely(this.sources.network),
      this.connectivity.check(),
    ]);

    const failures: SourceFailure[] = [];
    for (const [source, result] of [
      [this.sources.cpu.name, cpu],
      [this.sources.disk.name, disk],
      [this.sources.memory.name, memory],
      [this.sources.network.name, network],
    ] as const) {
      if (!result.ok) {
        failures.push({ source, error: result.error ?? 'unknown error' });
      }
    }

    const sample: Sample = {
      timestamp,
      cpuUsagePct: toBoundedInt(cpu.value, 0, 100),
      diskUsagePct: toBoundedInt(disk.value, 0, 100),
      memUsagePct: toBoundedInt(memory.value, 0, 100),
      netTotalKbps: toBoundedInt(network.value, 0),
      connectivity: connectivity.status,
      unreachableHosts: connectivity.results.filter((r) => !r.reachable).map((r) => r.host),
    };

    return { sample, connectivity, failures };
  }
}

// Sources report failures through `ok`; this covers one that rejects anyway.
async function collectSafely(source: MetricSource): Promise<CollectResult<number>> {
  try {
    return await source.collect();
  } catch (err) {
    return fallback(0, err);
  }
}
