import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('@hostwatch/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@hostwatch/shared')>()),
  getLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveConfig } from '@hostwatch/shared';
import type { MonitorConfig } from '@hostwatch/shared';
import { ConnectivityChecker } from '../connectivity/ConnectivityChecker.js';
import { HostMonitor } from '../daemon/HostMonitor.js';
import type { HostMonitorDeps } from '../daemon/HostMonitor.js';
import type { Sleeper } from '../scheduler/sleep.js';
import { StubSource } from './helpers.js';

const AT = new Date(2024, 0, 15, 10, 30, 0);

// Waits until the monitor is stopped
const untilAborted: Sleeper = (_ms, signal) =>
  new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });

describe('HostMonitor', () => {
  let dir: string;
  let config: MonitorConfig;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'hostwatch-monitor-'));
    config = resolveConfig({
      cwd: dir,
      env: {},
      overrides: { interval: '5s', hosts: ['host-a'], thresholds: { cpu_pct: 50 } },
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const read = (file: string): string => readFileSync(join(dir, file), 'utf-8');

  function deps(overrides: HostMonitorDeps = {}): HostMonitorDeps {
    return {
      sources: {
        cpu: new StubSource('cpu', { value: 65, ok: true }),
        disk: new StubSource('disk', { value: 40, ok: true }),
        memory: new StubSource('memory', { value: 39, ok: true }),
        network: new StubSource('network', { value: 166, ok: true }),
      },
      processes: new StubSource<string[]>('processes', { value: ['USER PID %CPU'], ok: true }),
      connectivity: new ConnectivityChecker(config.hosts, config.probe, async () => true),
      sleeper: untilAborted,
      now: () => AT,
      handleSignals: false,
      ...overrides,
    };
  }

  it('should write the banner, then the first cycle, and stop cleanly', async () => {
    const monitor = new HostMonitor(config, deps());
    const events: string[] = [];
    monitor.getEventBus().on('monitor:start', () => events.push('start'));
    monitor.getEventBus().on('cycle:complete', () => events.push('cycle'));
    monitor.getEventBus().on('monitor:stop', () => events.push('stop'));

    const running = monitor.run();
    await vi.waitFor(() => expect(monitor.getState()).toBe('sleeping'));
    await monitor.stop();
    await running;

    expect(events).toEqual(['start', 'cycle', 'stop']);
    expect(monitor.getState()).toBe('stopped');
    expect(read('system_load.log')).toBe(
      [
        '--- Monitor started at 2024-01-15 10:30:00 ---',
        '2024-01-15 10:30:00 | CPU: 65% | Disk: 40% | Mem: 39% | Net: 166 KB/s | Connectivity: OK',
        '',
      ].join('\n'),
    );
    expect(read('alerts.log')).toBe(
      [
        '--- Monitor started at 2024-01-15 10:30:00 ---',
        '[2024-01-15 10:30:00] CPU ALERT: Usage is 65%, exceeding threshold of 50%.',
        '',
      ].join('\n'),
    );
    expect(read('cpu_spike_details.log')).toContain('USER PID %CPU');
  });

  it('should sleep the configured interval', async () => {
    const sleeper = vi.fn(untilAborted);
    const monitor = new HostMonitor(config, deps({ sleeper }));

    const running = monitor.run();
    await vi.waitFor(() => expect(sleeper).toHaveBeenCalled());
    await monitor.stop();
    await running;

    expect(sleeper.mock.calls[0][0]).toBe(5000);
  });

  it('should stop on SIGTERM and remove its handlers', async () => {
    const before = process.listenerCount('SIGTERM');
    const monitor = new HostMonitor(config, deps({ handleSignals: true }));

    const running = monitor.run();
    await vi.waitFor(() => expect(monitor.getState()).toBe('sleeping'));
    expect(process.listenerCount('SIGTERM')).toBe(before + 1);
    expect(process.listenerCount('SIGINT')).toBeGreaterThan(0);

    const handlers = process.listeners('SIGTERM');
    handlers[handlers.length - 1]('SIGTERM');
    await running;

    expect(monitor.getState()).toBe('stopped');
    expect(process.listenerCount('SIGTERM')).toBe(before);
  });

  it('should return the same run when started twice', async () => {
    const monitor = new HostMonitor(config, deps());

    const first = monitor.run();
    const second = monitor.run();
    await vi.waitFor(() => expect(monitor.getState()).toBe('sleeping'));
    await monitor.stop();

    expect(second).toBe(first);
    await first;
  });
});
