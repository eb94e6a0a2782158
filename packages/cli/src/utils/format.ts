import chalk from 'chalk';
import type { ConnectivityStatus } from '@hostwatch/shared';

export { formatDuration, formatTimestamp } from '@hostwatch/shared';

/** Red above the threshold, yellow within 10 points (or 10%) of it. */
export function colorUsage(value: number, threshold: number, unit: '%' | ' KB/s'): string {
  const text = `${value}${unit}`;
  if (value > threshold) return chalk.red(text);
  const margin = unit === '%' ? 10 : threshold * 0.1;
  if (value > threshold - margin) return chalk.yellow(text);
  return chalk.green(text);
}

export function colorConnectivity(status: ConnectivityStatus): string {
  return status === 'OK' ? chalk.green(status) : chalk.red(status);
}

export function statusIcon(breached: boolean): string {
  return breached ? chalk.red('●') : chalk.green('●');
}

export function checkLine(ok: boolean, message: string): string {
  return ok ? chalk.green(`  ✓ ${message}`) : chalk.red(`  ✗ ${message}`);
}
