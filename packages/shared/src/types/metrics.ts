export type ConnectivityStatus = 'OK' | 'FAIL';

/**
 * One cycle's full set of readings. Every field is populated: a failed
 * probe contributes its default value instead of being omitted.
 */
export interface Sample {
  timestamp: Date;
  /** Integer 0-100, `100 - idle%` truncated. */
  cpuUsagePct: number;
  /** Integer 0-100, root filesystem. */
  diskUsagePct: number;
  /** Integer 0-100. */
  memUsagePct: number;
  /** Receive + transmit on the configured interface, truncated. */
  netTotalKbps: number;
  connectivity: ConnectivityStatus;
  /** Hosts that failed their probe this cycle, in configured order. */
  unreachableHosts: string[];
}

export interface HostProbeResult {
  host: string;
  reachable: boolean;
  durationMs: number;
  error?: string;
}

export interface ConnectivityReport {
  status: ConnectivityStatus;
  results: HostProbeResult[];
}

export interface DiagnosticSnapshot {
  timestamp: Date;
  cpuUsagePct: number;
  /** Raw process table lines, header first. */
  lines: string[];
}
