// Copier Scheduler
// Fires reconciliation runs on timeframe boundaries (node-cron) or back to
// back with a fixed delay. Never more than one run at a time.

import cron from 'node-cron';
import logger from '../shared/logger';
import { errorMessage, StateCorruptionError } from '../shared/errors';
import { RunSummary, ScheduleConfig } from '../shared/types';
import { timeframeToCron } from './schedule';

export interface RunSource {
  runOnce(signal?: AbortSignal): Promise<RunSummary>;
}

export class CopierScheduler {
  private isRunning: boolean = false;
  private stopped: boolean = true;
  private cronJob: cron.ScheduledTask | null = null;
  private abortController = new AbortController();
  private fatalError: StateCorruptionError | null = null;
  private runsCompleted = 0;
  private runsSkipped = 0;
  private wake: (() => void) | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;
  private done: Promise<void> = Promise.resolve();
  private resolveDone: () => void = () => undefined;

  constructor(private orchestrator: RunSource, private schedule: ScheduleConfig) {}

  /**
   * Start scheduling. Resolves once the scheduler has stopped, whether by
   * `stop()`, by reaching the maximum runtime, or on a ledger failure.
   */
  async start(): Promise<void> {
    if (!this.stopped) {
      logger.warn('[Scheduler] Already running');
      return this.done;
    }

    this.stopped = false;
    this.abortController = new AbortController();
    this.done = new Promise(resolve => {
      this.resolveDone = resolve;
    });

    if (this.schedule.mode === 'continuous') {
      await this.runContinuous();
      return;
    }

    const expression = timeframeToCron(this.schedule.timeframe, this.schedule.offsetSeconds);
    this.cronJob = cron.schedule(expression, async () => {
      await this.tick();
    });
    logger.info(
      `[Scheduler] Scheduled on ${this.schedule.timeframe} bars + ${this.schedule.offsetSeconds}s (cron "${expression}")`
    );

    return this.done;
  }

  /**
   * Continuous mode: run, wait, repeat until stopped or out of runtime
   */
  private async runContinuous(): Promise<void> {
    const deadline = this.schedule.maxRuntimeHours > 0
      ? Date.now() + this.schedule.maxRuntimeHours * 3600 * 1000
      : Infinity;
    logger.info(
      `[Scheduler] Continuous mode, ${this.schedule.continuousDelaySeconds}s between runs` +
      (Number.isFinite(deadline) ? `, stopping after ${this.schedule.maxRuntimeHours}h` : '')
    );

    while (!this.stopped) {
      await this.tick();
      if (this.stopped) break;

      if (Date.now() >= deadline) {
        logger.info('[Scheduler] Maximum runtime reached');
        this.stop();
        break;
      }
      await this.sleep(this.schedule.continuousDelaySeconds * 1000);
    }
  }

  /**
   * Execute one run unless one is already in flight.
   */
  async tick(): Promise<RunSummary | null> {
    if (this.isRunning) {
      this.runsSkipped++;
      logger.warn('[Scheduler] Previous run still in progress, skipping this one');
      return null;
    }

    this.isRunning = true;
    try {
      const summary = await this.orchestrator.runOnce(this.abortController.signal);
      this.runsCompleted++;
      return summary;
    } catch (error) {
      if (error instanceof StateCorruptionError) {
        logger.error(`[Scheduler] Relationship ledger unusable, stopping: ${error.message}`);
        this.fatalError = error;
        this.stop();
      } else {
        logger.error(`[Scheduler] Run failed: ${errorMessage(error)}`);
      }
      return null;
    } finally {
      this.isRunning = false;
      if (this.stopped) this.resolveDone();
    }
  }

  /**
   * Stop scheduling. A run in progress finishes its current target first,
   * and `start()` resolves only once that run has settled.
   */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.abortController.abort();

    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
    }
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    this.wake?.();
    this.wake = null;

    if (this.isRunning) {
      logger.info('[Scheduler] Stopping, waiting for the run in progress');
      return;
    }
    logger.info('[Scheduler] Stopped');
    this.resolveDone();
  }

  getFatalError(): StateCorruptionError | null {
    return this.fatalError;
  }

  getStatus(): { running: boolean; inFlight: boolean; runsCompleted: number; runsSkipped: number } {
    return {
      running: !this.stopped,
      inFlight: this.isRunning,
      runsCompleted: this.runsCompleted,
      runsSkipped: this.runsSkipped,
    };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      this.wake = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }
}
