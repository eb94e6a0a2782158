import type {
  Alert,
  ConnectivityAlert,
  DiagnosticSnapshot,
  Sample,
  ThresholdAlert,
  ThresholdAlertKind,
  ThresholdConfig,
} from '@hostwatch/shared';
import { getLogger } from '@hostwatch/shared';
import type { MetricSource } from '../sources/types.js';

const logger = getLogger();

interface ThresholdRule {
  kind: ThresholdAlertKind;
  unit: '%' | ' KB/s';
  value: (sample: Sample) => number;
  threshold: (thresholds: ThresholdConfig) => number;
}

// Evaluation order is the order alerts are written in.
const RULES: readonly ThresholdRule[] = [
  { kind: 'CPU', unit: '%', value: (s) => s.cpuUsagePct, threshold: (t) => t.cpuPct },
  { kind: 'DISK', unit: '%', value: (s) => s.diskUsagePct, threshold: (t) => t.diskPct },
  { kind: 'MEM', unit: '%', value: (s) => s.memUsagePct, threshold: (t) => t.memPct },
  { kind: 'NET', unit: ' KB/s', value: (s) => s.netTotalKbps, threshold: (t) => t.netKbps },
];

/**
 * Threshold breaches for one sample. Every comparison is strict greater-than,
 * so a value equal to its threshold does not alert.
 */
export function evaluateThresholds(sample: Sample, thresholds: ThresholdConfig): ThresholdAlert[] {
  const alerts: ThresholdAlert[] = [];

  for (const rule of RULES) {
    const value = rule.value(sample);
    const threshold = rule.threshold(thresholds);
    if (value > threshold) {
      alerts.push({
        timestamp: sample.timestamp,
        kind: rule.kind,
        severity: 'breach',
        value,
        threshold,
        message: `Usage is ${value}${rule.unit}, exceeding threshold of ${threshold}${rule.unit}.`,
      });
    }
  }

  return alerts;
}

/** One alert per host that failed its probe, in configured order. */
export function connectivityAlerts(sample: Sample): ConnectivityAlert[] {
  return sample.unreachableHosts.map((host): ConnectivityAlert => ({
    timestamp: sample.timestamp,
    kind: 'CONNECTIVITY',
    severity: 'breach',
    host,
    message: `Host ${host} is unreachable.`,
  }));
}

export class ThresholdEvaluator {
  private thresholds: ThresholdConfig;
  private processes: MetricSource<string[]> | null;

  constructor(thresholds: ThresholdConfig, processes: MetricSource<string[]> | null = null) {
    this.thresholds = thresholds;
    this.processes = processes;
  }

  /**
   * Connectivity alerts followed by threshold alerts. Holds no state between
   * calls: the same sample always yields the same list.
   */
  evaluate(sample: Sample): Alert[] {
    return [...connectivityAlerts(sample), ...evaluateThresholds(sample, this.thresholds)];
  }

  /**
   * Top-process snapshot for a CPU breach. Returns null when no CPU alert is
   * among `alerts` or no process source is configured.
   */
  async captureDiagnostics(sample: Sample, alerts: readonly Alert[]): Promise<DiagnosticSnapshot | null> {
    if (!this.processes || !alerts.some((alert) => alert.kind === 'CPU')) {
      return null;
    }

    const result = await this.processes.collect();
    if (!result.ok) {
      logger.warn({ error: result.error }, 'Process snapshot unavailable for CPU spike');
    }

    return {
      timestamp: sample.timestamp,
      cpuUsagePct: sample.cpuUsagePct,
      lines: result.value,
    };
  }
}
