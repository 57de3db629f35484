/**
 * Bounded-attempt retry for fallible filesystem steps.
 */
import { setTimeout as sleep } from "node:timers/promises";

import type { Logger } from "../logger.js";
import { errorMessage } from "./exceptions.js";

/** A named operation the executor may invoke more than once. */
export interface RetryableAction<T> {
  name: string;
  run: () => Promise<T>;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export interface RetryExecutorOptions {
  /** Pause between attempts in milliseconds */
  delayMs?: number;
}

export class RetryExecutor {
  private logger: Logger;
  private delayMs: number;

  constructor(logger: Logger, options: RetryExecutorOptions = {}) {
    this.logger = logger;
    this.delayMs = options.delayMs ?? 0;
  }

  /**
   * Run `action` until it succeeds or `maxAttempts` attempts have failed.
   * Every failure is treated as retryable. Never rejects; the last failure is
   * returned in the result.
   */
  async execute<T>(action: RetryableAction<T>, maxAttempts: number): Promise<RetryResult<T>> {
    const limit = Math.max(1, Math.floor(maxAttempts));
    let lastError: unknown;

    for (let attempt = 1; attempt <= limit; attempt++) {
      try {
        const value = await action.run();
        return { ok: true, value, attempts: attempt };
      } catch (err) {
        lastError = err;
        this.logger.warn(
          `${action.name} failed (attempt ${attempt}/${limit}): ${errorMessage(err)}`,
          { attempt },
        );
        if (attempt < limit && this.delayMs > 0) {
          await sleep(this.delayMs);
        }
      }
    }

    this.logger.error(`${action.name} failed after ${limit} attempts`, lastError);
    return { ok: false, error: lastError, attempts: limit };
  }
}
