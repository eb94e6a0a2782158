export const HOSTWATCH_VERSION = '0.1.0';

export const HOSTWATCH_CONFIG_FILE = 'hostwatch.config.json';
export const HOSTWATCH_ENV_PREFIX = 'HOSTWATCH_';

export const DEFAULT_INTERVAL = '60s';
export const DEFAULT_INTERFACE = 'eth0';
export const DEFAULT_HOSTS = ['8.8.8.8', '1.1.1.1', '1.0.0.1', '9.9.9.9'] as const;
export const DEFAULT_SAMPLE_WINDOW = '1s';
export const DEFAULT_PROBE_COUNT = 1;
export const DEFAULT_PROBE_TIMEOUT = '2s';
export const DEFAULT_TOP_PROCESSES = 5;

export const DEFAULT_CPU_THRESHOLD = 80;
export const DEFAULT_DISK_THRESHOLD = 60;
export const DEFAULT_MEM_THRESHOLD = 80;
// 100 MB/s
export const DEFAULT_NET_THRESHOLD = 102400;

export const DEFAULT_METRICS_FILE = 'system_load.log';
export const DEFAULT_ALERT_FILE = 'alerts.log';
export const DEFAULT_DIAGNOSTIC_FILE = 'cpu_spike_details.log';

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';
export const MAX_PENDING_RECORDS = 1000;
