import { readFile } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';
import { toBoundedInt } from '@hostwatch/shared';
import type { CommandRunner } from './command.js';
import { execFileRunner } from './command.js';
import { windowSeconds } from './cpu.js';
import type { CollectResult, MetricSource } from './types.js';
import { collected, fallback } from './types.js';

export const NET_DEFAULT_KBPS = 0;

export interface Throughput {
  rxKbps: number;
  txKbps: number;
}

export function totalKbps({ rxKbps, txKbps }: Throughput): number {
  return toBoundedInt(rxKbps + txKbps, 0);
}

/**
 * Receive and transmit KB/s for one interface from the `Average:` rows of
 * `sar -n DEV`. Column positions come from the header row when present.
 */
export function parseSarNetwork(output: string, iface: string): Throughput | null {
  const rows = output
    .split('\n')
    .filter((line) => line.startsWith('Average:'))
    .map((line) => line.trim().split(/\s+/));

  const header = rows.find((fields) => fields[1] === 'IFACE');
  const rxIndex = header ? header.indexOf('rxkB/s') : 4;
  const txIndex = header ? header.indexOf('txkB/s') : 5;
  if (rxIndex < 0 || txIndex < 0) return null;

  const row = rows.find((fields) => fields[1] === iface);
  if (!row) return null;

  const rxKbps = Number.parseFloat(row[rxIndex]);
  const txKbps = Number.parseFloat(row[txIndex]);
  if (!Number.isFinite(rxKbps) || !Number.isFinite(txKbps)) return null;
  return { rxKbps, txKbps };
}

export class SarNetworkSource implements MetricSource {
  readonly name = 'network';
  private iface: string;
  private windowMs: number;
  private run: CommandRunner;

  constructor(iface: string, windowMs: number, run: CommandRunner = execFileRunner) {
    this.iface = iface;
    this.windowMs = windowMs;
    this.run = run;
  }

  async collect(): Promise<CollectResult<number>> {
    const seconds = windowSeconds(this.windowMs);
    try {
      const { stdout } = await this.run('sar', ['-n', 'DEV', String(seconds), '1'], {
        timeout: seconds * 1000 + 10_000,
      });
      const throughput = parseSarNetwork(stdout, this.iface);
      if (!throughput) {
        return fallback(NET_DEFAULT_KBPS, `interface ${this.iface} not found in sar output`);
      }
      return collected(totalKbps(throughput));
    } catch (err) {
      return fallback(NET_DEFAULT_KBPS, err);
    }
  }
}

export interface InterfaceCounters {
  rxBytes: number;
  txBytes: number;
}

/**
 * Byte counters for one interface from `/proc/net/dev`.
 */
export function parseProcNetDev(content: string, iface: string): InterfaceCounters | null {
  for (const line of content.split('\n')) {
    const separator = line.indexOf(':');
    if (separator < 0) continue;
    if (line.slice(0, separator).trim() !== iface) continue;

    const values = line
      .slice(separator + 1)
      .trim()
      .split(/\s+/)
      .map(Number);
    if (values.length < 9) return null;

    const [rxBytes] = values;
    const txBytes = values[8];
    if (!Number.isFinite(rxBytes) || !Number.isFinite(txBytes)) return null;
    return { rxBytes, txBytes };
  }
  return null;
}

export function throughputBetween(
  before: InterfaceCounters,
  after: InterfaceCounters,
  elapsedMs: number,
): Throughput {
  const seconds = elapsedMs / 1000;
  if (seconds <= 0) return { rxKbps: 0, txKbps: 0 };
  // Counters reset when the interface is re-created; report zero, not a negative rate
  const rx = Math.max(0, after.rxBytes - before.rxBytes);
  const tx = Math.max(0, after.txBytes - before.txBytes);
  return { rxKbps: rx / 1024 / seconds, txKbps: tx / 1024 / seconds };
}

export interface ProcNetworkSourceOptions {
  path?: string;
  read?: (path: string) => Promise<string>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export class ProcNetworkSource implements MetricSource {
  readonly name = 'network';
  private iface: string;
  private windowMs: number;
  private path: string;
  private read: (path: string) => Promise<string>;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(iface: string, windowMs: number, options: ProcNetworkSourceOptions = {}) {
    this.iface = iface;
    this.windowMs = windowMs;
    this.path = options.path ?? '/proc/net/dev';
    this.read = options.read ?? ((path) => readFile(path, 'utf-8'));
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? Date.now;
  }

  async collect(): Promise<CollectResult<number>> {
    try {
      const before = await this.readCounters();
      const startedAt = this.now();
      await this.sleep(this.windowMs);
      const after = await this.readCounters();
      const elapsed = this.now() - startedAt;

      if (!before || !after) {
        return fallback(NET_DEFAULT_KBPS, `interface ${this.iface} not found in ${this.path}`);
      }
      return collected(totalKbps(throughputBetween(before, after, elapsed)));
    } catch (err) {
      return fallback(NET_DEFAULT_KBPS, err);
    }
  }

  private async readCounters(): Promise<InterfaceCounters | null> {
    return parseProcNetDev(await this.read(this.path), this.iface);
  }
}
