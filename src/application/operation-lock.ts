/**
 * Named, self-expiring operation locks.
 */

import logger from "../utils/logger.js";

/** Default hold time: 5 minutes */
export const DEFAULT_OPERATION_TIMEOUT_MS = 5 * 60 * 1000;

/** Longest delay a Node.js timer honours; anything above fires after 1 ms */
export const MAX_OPERATION_TIMEOUT_MS = 2_147_483_647;

interface NamedOperation {
  identifier: string;
  startedAt: Date;
  timeoutMs: number;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Advisory locks keyed by identifier. A held lock is released by `end` or
 * automatically once its timeout elapses.
 */
export class OperationLock {
  private operations: Map<string, NamedOperation> = new Map();

  /**
   * Acquire `identifier`. Returns false while it is already held.
   *
   * @throws RangeError when `timeoutMs` is not a positive delay a timer can hold
   */
  begin(identifier: string, timeoutMs: number = DEFAULT_OPERATION_TIMEOUT_MS): boolean {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_OPERATION_TIMEOUT_MS) {
      throw new RangeError(`Operation timeout must be between 1 and ${MAX_OPERATION_TIMEOUT_MS} ms, got ${timeoutMs}`);
    }
    if (this.operations.has(identifier)) {
      logger.debug({ identifier }, "Operation already in progress");
      return false;
    }

    const timer = setTimeout(() => {
      if (this.operations.delete(identifier)) {
        logger.warn({ identifier, timeoutMs }, "Operation lock expired");
      }
    }, timeoutMs);
    timer.unref();

    this.operations.set(identifier, { identifier, startedAt: new Date(), timeoutMs, timer });
    return true;
  }

  /**
   * Release `identifier`. Always succeeds, held or not.
   */
  end(identifier: string): boolean {
    const operation = this.operations.get(identifier);
    if (operation) {
      clearTimeout(operation.timer);
      this.operations.delete(identifier);
    }
    return true;
  }

  isHeld(identifier: string): boolean {
    return this.operations.has(identifier);
  }

  /**
   * Release everything, e.g. on shutdown.
   */
  clear(): void {
    for (const operation of this.operations.values()) {
      clearTimeout(operation.timer);
    }
    this.operations.clear();
  }

  get size(): number {
    return this.operations.size;
  }
}
