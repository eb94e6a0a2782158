import type { MonitorConfig } from '@hostwatch/shared';
import type { CommandRunner } from './command.js';
import { execFileRunner } from './command.js';
import { OsCpuSource, SarCpuSource } from './cpu.js';
import { DfDiskSource, StatfsDiskSource } from './disk.js';
import { FreeMemorySource, OsMemorySource } from './memory.js';
import { ProcNetworkSource, SarNetworkSource } from './network.js';
import { ProcessSnapshotSource } from './processes.js';
import type { MetricSource } from './types.js';

export interface MetricSources {
  cpu: MetricSource;
  disk: MetricSource;
  memory: MetricSource;
  network: MetricSource;
}

export const ROOT_MOUNT = '/';

/**
 * Instantiate the source family the configuration selects. `sysstat` shells
 * out to sar, df and free; `native` reads the same figures from Node's os
 * module, statfs and /proc.
 */
export function createSources(
  config: Pick<MonitorConfig, 'sources' | 'interface' | 'sampleWindow'>,
  run: CommandRunner = execFileRunner,
): MetricSources {
  if (config.sources === 'native') {
    return {
      cpu: new OsCpuSource(config.sampleWindow),
      disk: new StatfsDiskSource(ROOT_MOUNT),
      memory: new OsMemorySource(),
      network: new ProcNetworkSource(config.interface, config.sampleWindow),
    };
  }

  return {
    cpu: new SarCpuSource(config.sampleWindow, run),
    disk: new DfDiskSource(ROOT_MOUNT, run),
    memory: new FreeMemorySource(run),
    network: new SarNetworkSource(config.interface, config.sampleWindow, run),
  };
}

export function createProcessSnapshotSource(
  limit: number,
  run: CommandRunner = execFileRunner,
): MetricSource<string[]> {
  return new ProcessSnapshotSource(limit, run);
}

/** External tools each source family depends on. */
export function requiredTools(family: MonitorConfig['sources']): string[] {
  return family === 'native' ? ['ping', 'ps'] : ['sar', 'df', 'free', 'ping', 'ps'];
}
