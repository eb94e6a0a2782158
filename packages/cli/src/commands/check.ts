import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { Alert, DiagnosticSnapshot, MonitorConfig } from '@hostwatch/shared';
import {
  ConnectivityChecker,
  Sampler,
  ThresholdEvaluator,
  createProcessSnapshotSource,
  createSources,
  formatAlertLine,
} from '@hostwatch/core';
import type { CommandRunner, HostProbe, SampleResult } from '@hostwatch/core';
import type { ConfigFlags } from '../utils/options.js';
import { addConfigOptions, loadConfig } from '../utils/options.js';
import { renderConnectivity, renderSampleTable } from '../ui/Table.js';

interface CheckFlags extends ConfigFlags {
  json?: boolean;
}

export interface CheckResult extends SampleResult {
  alerts: Alert[];
  diagnostic: DiagnosticSnapshot | null;
}

export interface TakeSampleDeps {
  run?: CommandRunner;
  probe?: HostProbe;
}

/** One collect-and-evaluate pass. Nothing is written to the logs. */
export async function takeSample(config: MonitorConfig, deps: TakeSampleDeps = {}): Promise<CheckResult> {
  const { run, probe } = deps;
  const sampler = new Sampler(
    createSources(config, run),
    new ConnectivityChecker(config.hosts, config.probe, probe),
  );
  const evaluator = new ThresholdEvaluator(config.thresholds, createProcessSnapshotSource(config.topProcesses, run));

  const result = await sampler.sample();
  const alerts = evaluator.evaluate(result.sample);
  const diagnostic = await evaluator.captureDiagnostics(result.sample, alerts);
  return { ...result, alerts, diagnostic };
}

export const checkCommand = addConfigOptions(
  new Command('check').description('Take one sample and print it without writing any log'),
)
  .option('--json', 'Output the sample and alerts as JSON')
  .action(async (flags: CheckFlags) => {
    const config = loadConfig(flags);
    if (!config) return;

    const spinner = ora('Sampling host metrics...').start();

    try {
      const result = await takeSample(config);
      spinner.stop();

      if (flags.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      console.log(renderSampleTable(result.sample, config.thresholds));
      console.log(renderConnectivity(result.connectivity));

      for (const failure of result.failures) {
        console.log(chalk.yellow(`  ⚠ ${failure.source}: ${failure.error} (default used)`));
      }

      console.log('');
      if (result.alerts.length === 0) {
        console.log(chalk.green('  No thresholds exceeded.\n'));
      } else {
        for (const alert of result.alerts) {
          console.log(chalk.red(`  ${formatAlertLine(alert)}`));
        }
        console.log('');
      }

      if (result.diagnostic) {
        console.log(chalk.bold('  Top processes'));
        for (const line of result.diagnostic.lines) {
          console.log(`  ${line}`);
        }
        console.log('');
      }
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      spinner.fail(chalk.red(`Sampling failed: ${msg}`));
      process.exitCode = 1;
    }
  });
