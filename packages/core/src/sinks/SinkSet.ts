import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { Alert, DiagnosticSnapshot, LogFilesConfig, Sample } from '@hostwatch/shared';
import { SinkWriteError, getLogger } from '@hostwatch/shared';
import { AppendOnlyLog } from './AppendOnlyLog.js';
import type { StreamFactory } from './AppendOnlyLog.js';
import { formatAlertLine, formatBanner, formatDiagnosticBlock, formatMetricsLine } from './format.js';

const logger = getLogger();

export type SinkName = 'metrics' | 'alerts' | 'diagnostics';

/**
 * Formats one kind of record onto an append-only log.
 */
export class RecordSink<T> {
  readonly name: SinkName;
  readonly log: AppendOnlyLog;
  private format: (record: T) => string;

  constructor(name: SinkName, log: AppendOnlyLog, format: (record: T) => string) {
    this.name = name;
    this.log = log;
    this.format = format;
  }

  async write(record: T): Promise<void> {
    await this.log.append(this.format(record));
  }
}

export type SinkStatus = 'written' | 'failed' | 'skipped';

export interface SinkWriteReport {
  metrics: SinkStatus;
  alerts: SinkStatus;
  diagnostics: SinkStatus;
  errors: SinkWriteError[];
}

export class SinkSet {
  readonly metrics: RecordSink<Sample>;
  readonly alerts: RecordSink<Alert>;
  readonly diagnostics: RecordSink<DiagnosticSnapshot>;

  constructor(metrics: AppendOnlyLog, alerts: AppendOnlyLog, diagnostics: AppendOnlyLog) {
    this.metrics = new RecordSink('metrics', metrics, formatMetricsLine);
    this.alerts = new RecordSink('alerts', alerts, formatAlertLine);
    this.diagnostics = new RecordSink('diagnostics', diagnostics, formatDiagnosticBlock);
  }

  static fromConfig(logs: LogFilesConfig, open?: StreamFactory): SinkSet {
    try {
      mkdirSync(logs.dir, { recursive: true });
    } catch (err) {
      // Writes will fail and be retried each cycle until the directory is usable
      logger.error({ err, dir: logs.dir }, 'Could not create log directory');
    }

    return new SinkSet(
      new AppendOnlyLog(join(logs.dir, logs.metricsFile), { open }),
      new AppendOnlyLog(join(logs.dir, logs.alertFile), { open }),
      new AppendOnlyLog(join(logs.dir, logs.diagnosticFile), { open }),
    );
  }

  /**
   * Append one cycle's records. A failing sink never prevents the others
   * from being written, and failures are reported rather than thrown.
   */
  async persist(
    sample: Sample,
    alerts: readonly Alert[],
    diagnostic: DiagnosticSnapshot | null,
  ): Promise<SinkWriteReport> {
    const errors: SinkWriteError[] = [];

    const metrics = await this.attempt(errors, () => this.metrics.write(sample));

    let alertStatus: SinkStatus = 'skipped';
    for (const alert of alerts) {
      const status = await this.attempt(errors, () => this.alerts.write(alert));
      if (alertStatus !== 'failed') alertStatus = status;
    }

    const diagnostics = diagnostic
      ? await this.attempt(errors, () => this.diagnostics.write(diagnostic))
      : 'skipped';

    return { metrics, alerts: alertStatus, diagnostics, errors };
  }

  /** Start-of-run marker in the metrics and alert logs. */
  async writeBanner(date: Date): Promise<SinkWriteError[]> {
    const errors: SinkWriteError[] = [];
    const banner = formatBanner(date);
    await this.attempt(errors, () => this.metrics.log.append(banner));
    await this.attempt(errors, () => this.alerts.log.append(banner));
    return errors;
  }

  async close(): Promise<void> {
    await Promise.allSettled([
      this.metrics.log.close(),
      this.alerts.log.close(),
      this.diagnostics.log.close(),
    ]);
  }

  private async attempt(errors: SinkWriteError[], write: () => Promise<void>): Promise<SinkStatus> {
    try {
      await write();
      return 'written';
    } catch (err) {
      const error = err instanceof SinkWriteError ? err : new SinkWriteError('unknown', err);
      errors.push(error);
      logger.warn({ err: error, path: error.path }, 'Sink write failed');
      return 'failed';
    }
  }
}
