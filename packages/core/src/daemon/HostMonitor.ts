import type { MonitorConfig } from '@hostwatch/shared';
import { getLogger } from '@hostwatch/shared';
import { ConnectivityChecker } from '../connectivity/ConnectivityChecker.js';
import { AlertCooldown } from '../evaluator/AlertCooldown.js';
import { ThresholdEvaluator } from '../evaluator/ThresholdEvaluator.js';
import { EventBus } from '../events/EventBus.js';
import { Sampler } from '../scheduler/Sampler.js';
import { Scheduler } from '../scheduler/Scheduler.js';
import type { SchedulerState } from '../scheduler/Scheduler.js';
import type { Sleeper } from '../scheduler/sleep.js';
import { SinkSet } from '../sinks/SinkSet.js';
import type { CommandRunner } from '../sources/command.js';
import { createProcessSnapshotSource, createSources } from '../sources/index.js';
import type { MetricSources } from '../sources/index.js';
import type { MetricSource } from '../sources/types.js';

const logger = getLogger();

const STOP_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * Collaborators {@link HostMonitor} builds from the config unless given.
 */
export interface HostMonitorDeps {
  run?: CommandRunner;
  sources?: MetricSources;
  processes?: MetricSource<string[]>;
  connectivity?: ConnectivityChecker;
  sinks?: SinkSet;
  sleeper?: Sleeper;
  eventBus?: EventBus;
  now?: () => Date;
  /** Install SIGINT/SIGTERM handlers while running. Defaults to true. */
  handleSignals?: boolean;
}

export class HostMonitor {
  readonly config: MonitorConfig;
  private eventBus: EventBus;
  private sinks: SinkSet;
  private scheduler: Scheduler;
  private now: () => Date;
  private handleSignals: boolean;
  private running: Promise<void> | null = null;
  private signalHandler: (() => void) | null = null;

  constructor(config: MonitorConfig, deps: HostMonitorDeps = {}) {
    this.config = config;
    this.now = deps.now ?? (() => new Date());
    this.eventBus = deps.eventBus ?? new EventBus();
    this.handleSignals = deps.handleSignals ?? true;

    const sources = deps.sources ?? createSources(config, deps.run);
    const connectivity = deps.connectivity ?? new ConnectivityChecker(config.hosts, config.probe);
    const processes = deps.processes ?? createProcessSnapshotSource(config.topProcesses, deps.run);

    this.sinks = deps.sinks ?? SinkSet.fromConfig(config.logs);
    this.scheduler = new Scheduler(
      new Sampler(sources, connectivity, this.now),
      new ThresholdEvaluator(config.thresholds, processes),
      this.sinks,
      this.eventBus,
      {
        interval: config.interval,
        sleeper: deps.sleeper,
        cooldown: config.alertCooldown > 0 ? new AlertCooldown(config.alertCooldown) : undefined,
        now: this.now,
      },
    );
  }

  getEventBus(): EventBus {
    return this.eventBus;
  }

  getState(): SchedulerState {
    return this.scheduler.getState();
  }

  /**
   * Write the start banner and loop until {@link stop} is called or a stop
   * signal arrives. Resolves after the logs are closed.
   */
  run(): Promise<void> {
    if (!this.running) {
      this.running = this.runUntilStopped();
    }
    return this.running;
  }

  /** Finish the in-flight cycle, then end the loop. */
  async stop(): Promise<void> {
    await this.scheduler.stop();
    if (this.running) {
      await this.running;
    }
  }

  private async runUntilStopped(): Promise<void> {
    const startedAt = this.now();
    const bannerErrors = await this.sinks.writeBanner(startedAt);
    for (const error of bannerErrors) {
      this.eventBus.emit('sink:error', error);
    }

    this.installSignalHandlers();
    this.eventBus.emit('monitor:start', { config: this.config });
    logger.info(
      {
        interval: this.config.interval,
        interface: this.config.interface,
        hosts: this.config.hosts,
        sources: this.config.sources,
        logDir: this.config.logs.dir,
      },
      'Host monitor started',
    );

    try {
      await this.scheduler.run();
    } finally {
      this.removeSignalHandlers();
      await this.sinks.close();
      this.eventBus.emit('monitor:stop', undefined);
      logger.info({ cycles: this.scheduler.getCycleCount() }, 'Host monitor stopped');
    }
  }

  private installSignalHandlers(): void {
    if (!this.handleSignals || this.signalHandler) return;

    const handler = () => {
      logger.info('Stop signal received, finishing current cycle');
      this.scheduler.stop().catch((err: unknown) => {
        logger.error({ err }, 'Error while stopping scheduler');
      });
    };

    for (const signal of STOP_SIGNALS) {
      process.on(signal, handler);
    }
    this.signalHandler = handler;
  }

  private removeSignalHandlers(): void {
    const handler = this.signalHandler;
    if (!handler) return;
    for (const signal of STOP_SIGNALS) {
      process.off(signal, handler);
    }
    this.signalHandler = null;
  }
}
