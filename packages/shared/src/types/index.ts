export type {
  Sample,
  ConnectivityStatus,
  HostProbeResult,
  ConnectivityReport,
  DiagnosticSnapshot,
} from './metrics.js';

export type {
  Alert,
  AlertKind,
  AlertSeverity,
  ThresholdAlert,
  ThresholdAlertKind,
  ConnectivityAlert,
} from './alerts.js';

export type {
  MonitorConfig,
  ThresholdConfig,
  SourceFamily,
  ProbeConfig,
  LogFilesConfig,
} from './config.js';

export type { EventBusMessage } from './events.js';
