import Table from 'cli-table3';
import chalk from 'chalk';
import type { ConnectivityReport, Sample, ThresholdConfig } from '@hostwatch/shared';
import { colorConnectivity, colorUsage, formatTimestamp, statusIcon } from '../utils/format.js';

export function renderSampleTable(sample: Sample, thresholds: ThresholdConfig): string {
  const table = new Table({
    head: [chalk.bold(''), chalk.bold('metric'), chalk.bold('value'), chalk.bold('threshold')],
    style: {
      head: [],
      border: ['gray'],
    },
    colWidths: [3, 14, 16, 14],
  });

  const rows: [string, number, number, '%' | ' KB/s'][] = [
    ['cpu', sample.cpuUsagePct, thresholds.cpuPct, '%'],
    ['disk', sample.diskUsagePct, thresholds.diskPct, '%'],
    ['memory', sample.memUsagePct, thresholds.memPct, '%'],
    ['network', sample.netTotalKbps, thresholds.netKbps, ' KB/s'],
  ];

  for (const [metric, value, threshold, unit] of rows) {
    table.push([statusIcon(value > threshold), metric, colorUsage(value, threshold, unit), `${threshold}${unit}`]);
  }
  table.push([
    statusIcon(sample.connectivity === 'FAIL'),
    'connectivity',
    colorConnectivity(sample.connectivity),
    chalk.gray('-'),
  ]);

  return [chalk.bold(`\n  Sample at ${formatTimestamp(sample.timestamp)}`), table.toString()].join('\n');
}

export function renderConnectivity(report: ConnectivityReport): string {
  const lines = report.results.map((result) => {
    const state = result.reachable ? chalk.green('reachable') : chalk.red('unreachable');
    return `  ${result.host.padEnd(20)} ${state} ${chalk.gray(`(${result.durationMs}ms)`)}`;
  });
  return [chalk.bold('  Hosts'), ...lines].join('\n');
}
