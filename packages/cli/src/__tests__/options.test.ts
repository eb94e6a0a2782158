import { describe, it, expect, vi, afterEach } from 'vitest';

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

const logger = vi.hoisted(() => ({ level: 'info', info: () => undefined, warn: () => undefined }));

vi.mock('@hostwatch/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@hostwatch/shared')>()),
  getLogger: () => logger,
}));

import { Command } from 'commander';
import { addConfigOptions, flagsToOverrides, loadConfig } from '../utils/options.js';

describe('flagsToOverrides', () => {
  it('should leave out flags that were not given', () => {
    expect(flagsToOverrides({})).toEqual({});
  });

  it('should map flags onto the config file shape', () => {
    expect(
      flagsToOverrides({
        interval: '30s',
        interface: 'ens3',
        hosts: '10.0.0.1, 10.0.0.2,',
        cpu: 90,
        net: 5000,
        logDir: '/var/log/hostwatch',
        sources: 'native',
        cooldown: '10m',
        logLevel: 'debug',
      }),
    ).toEqual({
      interval: '30s',
      interface: 'ens3',
      hosts: ['10.0.0.1', '10.0.0.2'],
      sources: 'native',
      alert_cooldown: '10m',
      log_level: 'debug',
      logs: { dir: '/var/log/hostwatch' },
      thresholds: { cpu_pct: 90, net_kbps: 5000 },
    });
  });
});

describe('addConfigOptions', () => {
  it('should parse numeric thresholds as integers', () => {
    const command = addConfigOptions(new Command('probe')).exitOverride();
    command.parse(['--cpu', '75', '--disk', '50'], { from: 'user' });

    expect(command.opts()).toMatchObject({ cpu: 75, disk: 50 });
  });

  it('should reject a non-integer threshold', () => {
    const command = addConfigOptions(new Command('probe'))
      .exitOverride()
      .configureOutput({ writeErr: () => undefined });

    expect(() => command.parse(['--mem', 'lots'], { from: 'user' })).toThrow(/Not an integer/);
  });
});

describe('loadConfig', () => {
  afterEach(() => {
    logger.level = 'info';
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('should apply flags over the defaults', () => {
    const config = loadConfig({ cpu: 95, interval: '2m', hosts: 'host-a' });

    expect(config?.thresholds.cpuPct).toBe(95);
    expect(config?.thresholds.diskPct).toBe(60);
    expect(config?.interval).toBe(120_000);
    expect(config?.hosts).toEqual(['host-a']);
  });

  it('should apply the resolved log level to the shared logger', () => {
    loadConfig({ logLevel: 'debug' });
    expect(logger.level).toBe('debug');
  });

  it('should leave the log level alone when the configuration is invalid', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    loadConfig({ logLevel: 'debug', cpu: 150 });
    expect(logger.level).toBe('info');
  });

  it('should read a bare --interval and --cooldown as seconds', () => {
    const config = loadConfig({ interval: '60', cooldown: '300' });

    expect(config?.interval).toBe(60_000);
    expect(config?.alertCooldown).toBe(300_000);
  });

  it('should print every validation message and set exit code 1', () => {
    const errors: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
      errors.push(String(line));
    });

    const config = loadConfig({ cpu: 150, sources: 'bogus' });

    expect(config).toBeNull();
    expect(process.exitCode).toBe(1);
    expect(errors[0]).toBe('Invalid configuration:');
    expect(errors).toContain('  - thresholds.cpu_pct: Number must be less than or equal to 100');
    expect(errors.some((line) => line.startsWith('  - sources: '))).toBe(true);
  });

  it('should report a missing config file', () => {
    const errors: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
      errors.push(String(line));
    });

    expect(loadConfig({ config: 'does-not-exist.json' })).toBeNull();
    expect(errors[1]).toMatch(/^ {2}- config file not found: .*does-not-exist\.json$/);
  });
});
