// Events
export { EventBus } from './events/EventBus.js';
export type { EventName } from './events/EventBus.js';

// Sources
export { createSources, createProcessSnapshotSource, requiredTools, ROOT_MOUNT } from './sources/index.js';
export type { MetricSources } from './sources/index.js';
export { collected, fallback, describeError } from './sources/types.js';
export type { CollectResult, MetricSource } from './sources/types.js';
export { execFileRunner } from './sources/command.js';
export type { CommandRunner, CommandOutput, CommandOptions } from './sources/command.js';
export {
  SarCpuSource,
  OsCpuSource,
  parseSarIdle,
  usageFromIdle,
  readCpuTimes,
  idleBetween,
} from './sources/cpu.js';
export { DfDiskSource, StatfsDiskSource, parseDfUsage, usageFromBlocks } from './sources/disk.js';
export { FreeMemorySource, OsMemorySource, parseFreeUsage, usageFromTotals } from './sources/memory.js';
export {
  SarNetworkSource,
  ProcNetworkSource,
  parseSarNetwork,
  parseProcNetDev,
  throughputBetween,
  totalKbps,
} from './sources/network.js';
export { ProcessSnapshotSource, topProcessLines } from './sources/processes.js';

// Connectivity
export { ConnectivityChecker, pingProbe, pingArgs } from './connectivity/ConnectivityChecker.js';
export type { HostProbe } from './connectivity/ConnectivityChecker.js';

// Evaluation
export {
  ThresholdEvaluator,
  evaluateThresholds,
  connectivityAlerts,
} from './evaluator/ThresholdEvaluator.js';
export { AlertCooldown } from './evaluator/AlertCooldown.js';

// Sinks
export { AppendOnlyLog } from './sinks/AppendOnlyLog.js';
export type { StreamFactory } from './sinks/AppendOnlyLog.js';
export { SinkSet, RecordSink } from './sinks/SinkSet.js';
export type { SinkName, SinkStatus, SinkWriteReport } from './sinks/SinkSet.js';
export {
  ALERT_LABELS,
  formatMetricsLine,
  formatAlertLine,
  formatDiagnosticBlock,
  formatBanner,
} from './sinks/format.js';

// Scheduling
export { Sampler } from './scheduler/Sampler.js';
export type { SampleResult, SourceFailure } from './scheduler/Sampler.js';
export { Scheduler } from './scheduler/Scheduler.js';
export type { SchedulerState, CycleReport, SchedulerOptions } from './scheduler/Scheduler.js';
export { timerSleeper } from './scheduler/sleep.js';
export type { Sleeper } from './scheduler/sleep.js';

// Daemon
export { HostMonitor } from './daemon/HostMonitor.js';
export type { HostMonitorDeps } from './daemon/HostMonitor.js';
