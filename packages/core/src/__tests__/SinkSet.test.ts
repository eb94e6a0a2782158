import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('@hostwatch/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@hostwatch/shared')>()),
  getLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import { createWriteStream, existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Alert, LogFilesConfig } from '@hostwatch/shared';
import { AppendOnlyLog } from '../sinks/AppendOnlyLog.js';
import { SinkSet } from '../sinks/SinkSet.js';
import { makeSample } from './helpers.js';

const AT = new Date(2024, 0, 15, 10, 30, 0);

const CPU_ALERT: Alert = {
  timestamp: AT,
  kind: 'CPU',
  severity: 'breach',
  value: 95,
  threshold: 80,
  message: 'Usage is 95%, exceeding threshold of 80%.',
};

const HOST_ALERT: Alert = {
  timestamp: AT,
  kind: 'CONNECTIVITY',
  severity: 'breach',
  host: 'host-b',
  message: 'Host host-b is unreachable.',
};

describe('SinkSet', () => {
  let dir: string;
  let logs: LogFilesConfig;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'hostwatch-sinks-'));
    logs = {
      dir: join(dir, 'logs'),
      metricsFile: 'system_load.log',
      alertFile: 'alerts.log',
      diagnosticFile: 'cpu_spike_details.log',
    };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const read = (file: string): string => readFileSync(join(logs.dir, file), 'utf-8');

  it('should create the log directory', () => {
    SinkSet.fromConfig(logs);
    expect(existsSync(logs.dir)).toBe(true);
  });

  it('should write one metrics line and nothing else for a quiet cycle', async () => {
    const sinks = SinkSet.fromConfig(logs);

    const report = await sinks.persist(makeSample(), [], null);
    await sinks.close();

    expect(report).toEqual({ metrics: 'written', alerts: 'skipped', diagnostics: 'skipped', errors: [] });
    expect(read('system_load.log')).toBe(
      '2024-01-15 10:30:00 | CPU: 10% | Disk: 20% | Mem: 30% | Net: 40 KB/s | Connectivity: OK\n',
    );
    expect(existsSync(join(logs.dir, 'alerts.log'))).toBe(false);
    expect(existsSync(join(logs.dir, 'cpu_spike_details.log'))).toBe(false);
  });

  it('should write alerts in order and the diagnostic block', async () => {
    const sinks = SinkSet.fromConfig(logs);

    await sinks.persist(makeSample({ cpuUsagePct: 95 }), [HOST_ALERT, CPU_ALERT], {
      timestamp: AT,
      cpuUsagePct: 95,
      lines: ['USER PID %CPU', 'app 4120 95.0'],
    });
    await sinks.close();

    expect(read('alerts.log')).toBe(
      [
        '[2024-01-15 10:30:00] CONNECTIVITY ALERT: Host host-b is unreachable.',
        '[2024-01-15 10:30:00] CPU ALERT: Usage is 95%, exceeding threshold of 80%.',
        '',
      ].join('\n'),
    );
    expect(read('cpu_spike_details.log')).toBe(
      [
        '--- Top Processes during CPU spike at 2024-01-15 10:30:00 (Usage: 95%) ---',
        'USER PID %CPU',
        'app 4120 95.0',
        '--- End of list ---',
        '',
        '',
      ].join('\n'),
    );
  });

  it('should keep writing the other sinks when one fails', async () => {
    const brokenAlerts = new AppendOnlyLog(join(dir, 'alerts.log'), {
      open: () => createWriteStream(join(dir, 'missing', 'alerts.log'), { flags: 'a' }),
    });
    const sinks = new SinkSet(
      new AppendOnlyLog(join(dir, 'system_load.log')),
      brokenAlerts,
      new AppendOnlyLog(join(dir, 'cpu_spike_details.log')),
    );

    const report = await sinks.persist(makeSample({ cpuUsagePct: 95 }), [CPU_ALERT], {
      timestamp: AT,
      cpuUsagePct: 95,
      lines: [],
    });
    await sinks.close();

    expect(report.metrics).toBe('written');
    expect(report.alerts).toBe('failed');
    expect(report.diagnostics).toBe('written');
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0].path).toBe(join(dir, 'alerts.log'));
    expect(readFileSync(join(dir, 'system_load.log'), 'utf-8')).toContain('CPU: 95%');
  });

  it('should write the start banner to the metrics and alert logs only', async () => {
    const sinks = SinkSet.fromConfig(logs);

    const errors = await sinks.writeBanner(AT);
    await sinks.close();

    expect(errors).toEqual([]);
    expect(read('system_load.log')).toBe('--- Monitor started at 2024-01-15 10:30:00 ---\n');
    expect(read('alerts.log')).toBe('--- Monitor started at 2024-01-15 10:30:00 ---\n');
    expect(existsSync(join(logs.dir, 'cpu_spike_details.log'))).toBe(false);
  });
});
