import type { Alert, AlertKind, DiagnosticSnapshot, Sample } from '@hostwatch/shared';
import { formatTimestamp } from '@hostwatch/shared';

/**
 * Labels as they appear in the alert log. Downstream notifiers match on
 * these, so they must not change.
 */
export const ALERT_LABELS: Record<AlertKind, string> = {
  CPU: 'CPU',
  DISK: 'DISK',
  MEM: 'MEMORY',
  NET: 'NETWORK',
  CONNECTIVITY: 'CONNECTIVITY',
};

/**
 * `YYYY-MM-DD HH:MM:SS | CPU: N% | Disk: N% | Mem: N% | Net: N KB/s | Connectivity: OK|FAIL`
 */
export function formatMetricsLine(sample: Sample): string {
  return [
    formatTimestamp(sample.timestamp),
    `CPU: ${sample.cpuUsagePct}%`,
    `Disk: ${sample.diskUsagePct}%`,
    `Mem: ${sample.memUsagePct}%`,
    `Net: ${sample.netTotalKbps} KB/s`,
    `Connectivity: ${sample.connectivity}`,
  ].join(' | ');
}

/** `[YYYY-MM-DD HH:MM:SS] <LABEL> ALERT: <message>` */
export function formatAlertLine(alert: Alert): string {
  return `[${formatTimestamp(alert.timestamp)}] ${ALERT_LABELS[alert.kind]} ALERT: ${alert.message}`;
}

export function formatDiagnosticBlock(snapshot: DiagnosticSnapshot): string {
  const body = snapshot.lines.length > 0 ? snapshot.lines : ['(process list unavailable)'];
  return [
    `--- Top Processes during CPU spike at ${formatTimestamp(snapshot.timestamp)} (Usage: ${snapshot.cpuUsagePct}%) ---`,
    ...body,
    '--- End of list ---',
    '',
  ].join('\n');
}

export function formatBanner(date: Date): string {
  return `--- Monitor started at ${formatTimestamp(date)} ---`;
}
