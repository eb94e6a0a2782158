import type { Alert } from '@hostwatch/shared';

export interface CooldownResult {
  passed: Alert[];
  suppressed: Alert[];
}

function alertKey(alert: Alert): string {
  return alert.kind === 'CONNECTIVITY' ? `${alert.kind}:${alert.host}` : alert.kind;
}

/**
 * Optional suppression of repeated alerts. This departs from the default
 * behaviour, where every breaching cycle writes a fresh alert; it is only
 * active when constructed with a positive window.
 *
 * An alert is suppressed when another alert with the same key passed less
 * than `windowMs` earlier, measured by alert timestamps.
 */
export class AlertCooldown {
  private windowMs: number;
  private lastPassed: Map<string, number> = new Map();

  constructor(windowMs: number) {
    this.windowMs = windowMs;
  }

  isEnabled(): boolean {
    return this.windowMs > 0;
  }

  filter(alerts: readonly Alert[]): CooldownResult {
    if (!this.isEnabled()) {
      return { passed: [...alerts], suppressed: [] };
    }

    const passed: Alert[] = [];
    const suppressed: Alert[] = [];

    for (const alert of alerts) {
      const key = alertKey(alert);
      const at = alert.timestamp.getTime();
      const last = this.lastPassed.get(key);

      if (last !== undefined && at - last < this.windowMs) {
        suppressed.push(alert);
        continue;
      }

      this.lastPassed.set(key, at);
      passed.push(alert);
    }

    return { passed, suppressed };
  }

  reset(): void {
    this.lastPassed.clear();
  }
}
