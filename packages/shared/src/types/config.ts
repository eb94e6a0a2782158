import type { LogLevel } from '../utils/logger.js';

export interface ThresholdConfig {
  readonly cpuPct: number;
  readonly diskPct: number;
  readonly memPct: number;
  readonly netKbps: number;
}

export type SourceFamily = 'sysstat' | 'native';

export interface ProbeConfig {
  readonly count: number;
  /** Milliseconds. */
  readonly timeout: number;
}

export interface LogFilesConfig {
  readonly dir: string;
  readonly metricsFile: string;
  readonly alertFile: string;
  readonly diagnosticFile: string;
}

export interface MonitorConfig {
  readonly thresholds: ThresholdConfig;
  /** Milliseconds between the end of one cycle and the start of the next. */
  readonly interval: number;
  readonly interface: string;
  readonly hosts: readonly string[];
  readonly probe: ProbeConfig;
  /** Milliseconds the CPU and network sources observe per reading. */
  readonly sampleWindow: number;
  readonly sources: SourceFamily;
  readonly logs: LogFilesConfig;
  /** Milliseconds; 0 disables the cool-down. */
  readonly alertCooldown: number;
  readonly topProcesses: number;
  readonly logLevel: LogLevel;
}
