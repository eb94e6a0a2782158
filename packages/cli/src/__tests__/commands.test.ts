import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';

const mocks = vi.hoisted(() => {
  const monitorConfigs: unknown[] = [];
  return { monitorRun: vi.fn(), monitorConfigs };
});

// Mock chalk to return plain text
vi.mock('chalk', () => {
  const handler: ProxyHandler<(text: unknown) => string> = {
    get() {
      return chainable;
    },
    apply(_target, _thisArg, args) {
      return String(args[0]);
    },
  };

  const chainable = new Proxy((text: unknown) => String(text), handler);

  return { default: chainable };
});

// Mock ora to prevent spinner side effects
vi.mock('ora', () => {
  const spinner = {
    start: vi.fn().mockReturnThis(),
    stop: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    text: '',
  };
  return { default: vi.fn(() => spinner) };
});

vi.mock('@hostwatch/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@hostwatch/shared')>()),
  getLogger: () => ({ level: 'info', info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

// The monitor itself is exercised in core; here only its wiring matters
vi.mock('@hostwatch/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@hostwatch/core')>();
  class FakeHostMonitor {
    private bus = new actual.EventBus();
    constructor(config: unknown) {
      mocks.monitorConfigs.push(config);
    }
    getEventBus() {
      return this.bus;
    }
    run() {
      return mocks.monitorRun(this.bus);
    }
  }
  return { ...actual, HostMonitor: FakeHostMonitor };
});

import ora from 'ora';
import type { EventBus } from '@hostwatch/core';
import { runCommand } from '../commands/run.js';
import { checkCommand } from '../commands/check.js';
import { doctorCommand } from '../commands/doctor.js';
import { configCommand } from '../commands/config.js';

const CONFIG_FLAGS = [
  '--config',
  '--interval',
  '--interface',
  '--hosts',
  '--cpu',
  '--disk',
  '--mem',
  '--net',
  '--log-dir',
  '--sources',
  '--cooldown',
  '--log-level',
];

function getOptionLongNames(command: Command): string[] {
  return command.options.map((opt) => opt.long ?? '').filter(Boolean);
}

describe('CLI Command Definitions', () => {
  const commands: [string, Command][] = [
    ['run', runCommand],
    ['check', checkCommand],
    ['doctor', doctorCommand],
    ['config', configCommand],
  ];

  for (const [name, command] of commands) {
    describe(`${name}Command`, () => {
      it('should be a Commander Command instance', () => {
        expect(command).toBeInstanceOf(Command);
      });

      it(`should have the name "${name}"`, () => {
        expect(command.name()).toBe(name);
      });

      it('should have a description', () => {
        expect(command.description()).toBeTruthy();
      });

      it('should accept every configuration flag', () => {
        expect(getOptionLongNames(command)).toEqual(expect.arrayContaining(CONFIG_FLAGS));
      });
    });
  }

  it('should give check a --json option', () => {
    expect(getOptionLongNames(checkCommand)).toContain('--json');
  });

  it('should give -c as short alias for --config', () => {
    expect(runCommand.options.find((o) => o.long === '--config')?.short).toBe('-c');
  });
});

describe('CLI Command Actions', () => {
  let output: string[];

  beforeEach(() => {
    output = [];
    mocks.monitorConfigs.length = 0;
    mocks.monitorRun.mockReset().mockResolvedValue(undefined);
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      output.push(String(line));
    });
    vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
      output.push(String(line));
    });
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('config should print the resolved configuration', async () => {
    await configCommand.parseAsync(['--cpu', '90', '--hosts', 'host-a,host-b', '--log-dir', '/srv/hostwatch'], {
      from: 'user',
    });

    const printed = JSON.parse(output.join('\n'));
    expect(printed.thresholds).toEqual({ cpuPct: 90, diskPct: 60, memPct: 80, netKbps: 102400 });
    expect(printed.hosts).toEqual(['host-a', 'host-b']);
    expect(printed.logs.dir).toBe('/srv/hostwatch');
  });

  it('run should start the monitor with the flag values', async () => {
    await runCommand.parseAsync(['--mem', '70', '--interval', '30s', '--log-dir', '/srv/hostwatch'], {
      from: 'user',
    });

    expect(mocks.monitorConfigs).toHaveLength(1);
    expect(mocks.monitorConfigs[0]).toMatchObject({ interval: 30_000, thresholds: { memPct: 70 } });
    expect(mocks.monitorRun).toHaveBeenCalledOnce();
    expect(output).toContain('  Interval:  every 30s');
  });

  it('run should echo alerts with the same labels as the alert log', async () => {
    mocks.monitorRun.mockImplementation(async (bus: EventBus) => {
      bus.emit('alert:raised', {
        kind: 'MEM',
        severity: 'breach',
        timestamp: new Date(2024, 0, 15, 10, 30, 0),
        message: 'Memory usage is 91% (threshold 80%)',
        value: 91,
        threshold: 80,
      });
    });

    await runCommand.parseAsync(['--log-dir', '/srv/hostwatch'], { from: 'user' });

    expect(output).toContain('  ! MEMORY: Memory usage is 91% (threshold 80%)');
  });

  it('check should refuse an invalid configuration without sampling', async () => {
    await checkCommand.parseAsync(['--sources', 'bogus'], { from: 'user' });

    expect(process.exitCode).toBe(1);
    expect(output[0]).toBe('Invalid configuration:');
    expect(ora).not.toHaveBeenCalled();
  });
});
