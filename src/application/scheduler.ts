/**
 * Periodic sweep trigger.
 */

import type { SweepCallback, SweepSummary } from "../core/types/scheduler.js";
import type { IScheduler } from "../core/interfaces/scheduler.js";
import { errorMessage } from "../core/errors.js";
import { emptySummary } from "./execution-coordinator.js";
import logger from "../utils/logger.js";

/** Default sweep interval: 5 minutes */
const DEFAULT_INTERVAL_MINUTES = 5;

function nowMs(): number {
  return Date.now();
}

/**
 * Timer-driven scheduler that runs one sweep per interval.
 *
 * Sweeps never overlap: a tick or manual trigger that arrives while a sweep
 * is running shares that sweep's result instead of starting another. Work
 * passed to `runExclusive` queues with the sweeps.
 */
export class Scheduler implements IScheduler {
  private onSweep: SweepCallback;
  private intervalMinutes: number;
  private runOnStart: boolean;
  private timerTimeout: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<SweepSummary> | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private nextWakeMs: number | undefined;
  private lastSweepAt: Date | undefined;
  private _running = false;

  constructor(options: {
    onSweep: SweepCallback;
    intervalMinutes?: number;
    runOnStart?: boolean;
  }) {
    this.onSweep = options.onSweep;
    this.intervalMinutes = options.intervalMinutes ?? DEFAULT_INTERVAL_MINUTES;
    this.runOnStart = options.runOnStart ?? false;
  }

  /**
   * Start the scheduler.
   */
  async start(): Promise<void> {
    this._running = true;
    logger.info({ intervalMinutes: this.intervalMinutes }, "Scheduler started");

    if (this.runOnStart) {
      await this.trigger();
    }
    this.armTimer();
  }

  /**
   * Stop the scheduler. A sweep already running finishes on its own.
   */
  stop(): void {
    this._running = false;
    this.nextWakeMs = undefined;
    if (this.timerTimeout) {
      clearTimeout(this.timerTimeout);
      this.timerTimeout = null;
    }
  }

  async trigger(): Promise<SweepSummary> {
    if (this.inFlight) {
      logger.debug("Sweep already in progress, joining it");
      return this.inFlight;
    }

    this.inFlight = this.runExclusive(() => this.runSweep());
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * Get scheduler status.
   */
  status(): { running: boolean; intervalMinutes: number; lastSweepAt?: Date; nextWakeAt?: number } {
    return {
      running: this._running,
      intervalMinutes: this.intervalMinutes,
      lastSweepAt: this.lastSweepAt,
      nextWakeAt: this.nextWakeMs,
    };
  }

  private async runSweep(): Promise<SweepSummary> {
    const startedAt = new Date();
    try {
      const summary = await this.onSweep();
      this.lastSweepAt = startedAt;
      return summary;
    } catch (error) {
      logger.error({ error: errorMessage(error) }, "Sweep failed");
      return emptySummary(startedAt, errorMessage(error));
    }
  }

  /**
   * Schedule the next timer tick.
   */
  private armTimer(): void {
    if (this.timerTimeout) {
      clearTimeout(this.timerTimeout);
      this.timerTimeout = null;
    }

    if (!this._running) {
      return;
    }

    const delayMs = this.intervalMinutes * 60 * 1000;
    this.nextWakeMs = nowMs() + delayMs;

    this.timerTimeout = setTimeout(() => {
      this.onTimer().catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, "Scheduler tick failed");
      });
    }, delayMs);
  }

  /**
   * Handle timer tick: run one sweep, then re-arm.
   */
  private async onTimer(): Promise<void> {
    if (!this._running) return;
    try {
      await this.trigger();
    } finally {
      this.armTimer();
    }
  }
}
