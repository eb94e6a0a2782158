import msLib from 'ms';
import { format } from 'date-fns';
import { TIMESTAMP_FORMAT } from '../constants.js';

/**
 * Parse a duration string to milliseconds.
 * Supports: '30s', '5m', '1h', '2d', '100ms', etc.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value;

  const result: number | undefined = msLib(value);
  if (result === undefined || !Number.isFinite(result)) {
    throw new Error(`Invalid duration string: "${value}"`);
  }
  return result;
}

/**
 * Format milliseconds to a human-readable duration string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${Math.round(ms / 1000)}s`;
  if (ms < 3_600_000) return `${Math.round(ms / 60_000)}m`;
  if (ms < 86_400_000) return `${Math.round(ms / 3_600_000)}h`;
  return `${Math.round(ms / 86_400_000)}d`;
}

/**
 * Local wall-clock time as written to every log line: `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
  return format(date, TIMESTAMP_FORMAT);
}

/**
 * Truncate toward zero and clamp into `[min, max]`. NaN maps to `min`.
 */
export function toBoundedInt(value: number, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
  if (Number.isNaN(value)) return min;
  const truncated = Math.trunc(value);
  return Math.min(max, Math.max(min, truncated));
}
