import type { Alert, DiagnosticSnapshot, Sample } from '@hostwatch/shared';
import { getLogger } from '@hostwatch/shared';
import type { EventBus } from '../events/EventBus.js';
import type { AlertCooldown } from '../evaluator/AlertCooldown.js';
import type { ThresholdEvaluator } from '../evaluator/ThresholdEvaluator.js';
import type { SinkSet, SinkWriteReport } from '../sinks/SinkSet.js';
import type { Sampler, SourceFailure } from './Sampler.js';
import type { Sleeper } from './sleep.js';
import { timerSleeper } from './sleep.js';

const logger = getLogger();

export type SchedulerState =
  | 'idle'
  | 'collecting'
  | 'evaluating'
  | 'persisting'
  | 'sleeping'
  | 'stopped';

export interface CycleReport {
  cycle: number;
  sample: Sample;
  /** Alerts written this cycle, after any cool-down filtering. */
  alerts: Alert[];
  suppressed: Alert[];
  diagnostic: DiagnosticSnapshot | null;
  failures: SourceFailure[];
  sinks: SinkWriteReport;
  startedAt: Date;
  persistedAt: Date;
}

export interface SchedulerOptions {
  /** Milliseconds slept after each cycle completes. */
  interval: number;
  sleeper?: Sleeper;
  cooldown?: AlertCooldown;
  now?: () => Date;
}

/**
 * Drives collect → evaluate → persist → sleep, one cycle at a time.
 *
 * The sleep is a fixed spacing from the end of one cycle to the start of the
 * next; time spent collecting is not subtracted from it. Cycles never
 * overlap.
 */
export class Scheduler {
  private sampler: Sampler;
  private evaluator: ThresholdEvaluator;
  private sinks: SinkSet;
  private eventBus: EventBus;
  private interval: number;
  private sleeper: Sleeper;
  private cooldown: AlertCooldown | null;
  private now: () => Date;

  private state: SchedulerState = 'idle';
  private cycleCount: number = 0;
  private loop: Promise<void> | null = null;
  private inFlight: Promise<CycleReport> | null = null;
  private stopRequested: boolean = false;
  private abort: AbortController = new AbortController();

  constructor(
    sampler: Sampler,
    evaluator: ThresholdEvaluator,
    sinks: SinkSet,
    eventBus: EventBus,
    options: SchedulerOptions,
  ) {
    this.sampler = sampler;
    this.evaluator = evaluator;
    this.sinks = sinks;
    this.eventBus = eventBus;
    this.interval = options.interval;
    this.sleeper = options.sleeper ?? timerSleeper;
    this.cooldown = options.cooldown ?? null;
    this.now = options.now ?? (() => new Date());
  }

  getState(): SchedulerState {
    return this.state;
  }

  getCycleCount(): number {
    return this.cycleCount;
  }

  /**
   * Run exactly one cycle. Rejects if another cycle is still in flight or
   * the scheduler has been stopped.
   */
  runCycle(): Promise<CycleReport> {
    if (this.inFlight) {
      return Promise.reject(new Error('A cycle is already in progress'));
    }
    if (this.state === 'stopped') {
      return Promise.reject(new Error('Scheduler is stopped'));
    }

    const cycle = this.executeCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  /**
   * Loop until {@link stop} is called. Resolves once the final cycle has
   * been persisted. Calling it while already running returns the same loop.
   */
  run(): Promise<void> {
    if (!this.loop) {
      this.loop = this.loopUntilStopped();
    }
    return this.loop;
  }

  /**
   * Stop accepting new cycles. The in-flight cycle, including its sink
   * writes, completes before the returned promise resolves.
   */
  async stop(): Promise<void> {
    this.stopRequested = true;
    this.abort.abort();

    if (this.loop) {
      await this.loop;
    } else if (this.inFlight) {
      await this.inFlight.catch(() => undefined);
    }
    this.setState('stopped');
  }

  private async loopUntilStopped(): Promise<void> {
    logger.info({ interval: this.interval }, 'Scheduler started');

    while (!this.stopRequested) {
      try {
        await this.runCycle();
      } catch (err) {
        logger.error({ err }, 'Cycle failed');
        this.setState('idle');
      }

      if (this.stopRequested) break;

      this.setState('sleeping');
      await this.sleeper(this.interval, this.abort.signal);
      if (!this.stopRequested) {
        this.setState('idle');
      }
    }

    this.setState('stopped');
    logger.info({ cycles: this.cycleCount }, 'Scheduler stopped');
  }

  private async executeCycle(): Promise<CycleReport> {
    const cycle = ++this.cycleCount;
    const startedAt = this.now();
    this.eventBus.emit('cycle:start', { cycle, startedAt });

    this.setState('collecting');
    const { sample, failures } = await this.sampler.sample();
    for (const failure of failures) {
      logger.debug({ source: failure.source, error: failure.error }, 'Source fell back to default');
      this.eventBus.emit('source:fail', failure);
    }
    this.eventBus.emit('sample:collected', sample);

    this.setState('evaluating');
    const evaluated = this.evaluator.evaluate(sample);
    const { passed: alerts, suppressed } = this.cooldown
      ? this.cooldown.filter(evaluated)
      : { passed: evaluated, suppressed: [] };
    const diagnostic = await this.evaluator.captureDiagnostics(sample, alerts);

    this.setState('persisting');
    const sinks = await this.sinks.persist(sample, alerts, diagnostic);
    for (const error of sinks.errors) {
      this.eventBus.emit('sink:error', error);
    }
    for (const alert of alerts) {
      logger.warn({ kind: alert.kind }, alert.message);
      this.eventBus.emit('alert:raised', alert);
    }
    for (const alert of suppressed) {
      this.eventBus.emit('alert:suppressed', alert);
    }

    const report: CycleReport = {
      cycle,
      sample,
      alerts,
      suppressed,
      diagnostic,
      failures,
      sinks,
      startedAt,
      persistedAt: this.now(),
    };

    this.setState('idle');
    this.eventBus.emit('cycle:complete', report);
    logger.debug(
      { cycle, alerts: alerts.length, durationMs: report.persistedAt.getTime() - startedAt.getTime() },
      'Cycle complete',
    );
    return report;
  }

  private setState(to: SchedulerState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.eventBus.emit('state:change', { from, to });
  }
}
