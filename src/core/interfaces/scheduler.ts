/**
 * Scheduler interface.
 */

import type { SweepSummary } from "../types/scheduler.js";

/**
 * Interface for the periodic sweep trigger.
 */
export interface IScheduler {
  /**
   * Start the scheduler.
   */
  start(): Promise<void>;

  /**
   * Stop the scheduler.
   */
  stop(): void;

  /**
   * Run one sweep now. A call made while a sweep is in flight joins it.
   */
  trigger(): Promise<SweepSummary>;

  /**
   * Run `task` between sweeps, never beside one. Its failure reaches the
   * caller only.
   */
  runExclusive<T>(task: () => Promise<T>): Promise<T>;

  /**
   * Get scheduler status.
   */
  status(): { running: boolean; intervalMinutes: number; lastSweepAt?: Date; nextWakeAt?: number };
}
