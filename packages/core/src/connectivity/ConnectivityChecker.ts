import { spawn } from 'node:child_process';
import type { ConnectivityReport, HostProbeResult, ProbeConfig } from '@hostwatch/shared';
import { getLogger } from '@hostwatch/shared';
import { describeError } from '../sources/types.js';

const logger = getLogger();

/** Resolves true when the host answered within the probe's bounds. */
export type HostProbe = (host: string, options: ProbeConfig) => Promise<boolean>;

// Time ping gets beyond its own -W deadline before it is killed.
const PROBE_GRACE_MS = 1000;

export function pingArgs(host: string, { count, timeout }: ProbeConfig): string[] {
  const seconds = Math.max(1, Math.ceil(timeout / 1000));
  return ['-c', String(count), '-W', String(seconds), host];
}

/**
 * Single bounded ICMP probe through the system `ping`. Spawn errors and
 * non-zero exits both count as unreachable.
 */
export const pingProbe: HostProbe = (host, options) => {
  return new Promise((resolve) => {
    const child = spawn('ping', pingArgs(host, options), {
      stdio: 'ignore',
      timeout: options.count * options.timeout + PROBE_GRACE_MS,
    });

    child.on('exit', (code: number | null) => {
      resolve(code === 0);
    });

    child.on('error', (err: Error) => {
      logger.debug({ err, host }, 'ping could not be started');
      resolve(false);
    });
  });
};

export class ConnectivityChecker {
  private hosts: readonly string[];
  private options: ProbeConfig;
  private probe: HostProbe;
  private now: () => number;

  constructor(
    hosts: readonly string[],
    options: ProbeConfig,
    probe: HostProbe = pingProbe,
    now: () => number = Date.now,
  ) {
    this.hosts = hosts;
    this.options = options;
    this.probe = probe;
    this.now = now;
  }

  /**
   * Probe every host once. Probes are independent and run concurrently;
   * results keep the configured host order.
   */
  async check(): Promise<ConnectivityReport> {
    const results = await Promise.all(this.hosts.map((host) => this.probeHost(host)));
    const status = results.every((result) => result.reachable) ? 'OK' : 'FAIL';
    return { status, results };
  }

  private async probeHost(host: string): Promise<HostProbeResult> {
    const startedAt = this.now();
    try {
      const reachable = await this.probe(host, this.options);
      return { host, reachable, durationMs: this.now() - startedAt };
    } catch (err) {
      return { host, reachable: false, durationMs: this.now() - startedAt, error: describeError(err) };
    }
  }
}
