// Types
export type {
  Sample,
  ConnectivityStatus,
  HostProbeResult,
  ConnectivityReport,
  DiagnosticSnapshot,
  Alert,
  AlertKind,
  AlertSeverity,
  ThresholdAlert,
  ThresholdAlertKind,
  ConnectivityAlert,
  MonitorConfig,
  ThresholdConfig,
  SourceFamily,
  ProbeConfig,
  LogFilesConfig,
  EventBusMessage,
} from './types/index.js';

// Constants
export {
  HOSTWATCH_VERSION,
  HOSTWATCH_CONFIG_FILE,
  HOSTWATCH_ENV_PREFIX,
  DEFAULT_INTERVAL,
  DEFAULT_INTERFACE,
  DEFAULT_HOSTS,
  DEFAULT_SAMPLE_WINDOW,
  DEFAULT_PROBE_COUNT,
  DEFAULT_PROBE_TIMEOUT,
  DEFAULT_TOP_PROCESSES,
  DEFAULT_CPU_THRESHOLD,
  DEFAULT_DISK_THRESHOLD,
  DEFAULT_MEM_THRESHOLD,
  DEFAULT_NET_THRESHOLD,
  DEFAULT_METRICS_FILE,
  DEFAULT_ALERT_FILE,
  DEFAULT_DIAGNOSTIC_FILE,
  TIMESTAMP_FORMAT,
  MAX_PENDING_RECORDS,
} from './constants.js';

// Schemas
export {
  monitorConfigSchema,
  thresholdsSchema,
  probeSchema,
  logFilesSchema,
  durationSchema,
} from './schemas/config.schema.js';

export type { RawMonitorConfig, ValidatedMonitorConfig } from './schemas/config.schema.js';

// Configuration
export { resolveConfig, loadConfigFile, readEnv, splitList } from './config/resolve.js';
export type { ResolveConfigOptions, RawLayer } from './config/resolve.js';

// Utilities
export { parseDuration, formatDuration, formatTimestamp, toBoundedInt } from './utils/parser.js';

export { createLogger, getLogger } from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  HostwatchError,
  ConfigValidationError,
  CommandFailedError,
  SinkWriteError,
} from './utils/errors.js';
