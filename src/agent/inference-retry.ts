/**
 * @fileoverview Retry of inference calls with capped exponential backoff.
 *
 * Only `Transient` and `RateLimited` errors are retried. A `retryAfterMs`
 * hint from the provider replaces the computed delay; a hint longer than
 * `maxDelayMs` ends the retries, and so does a delay that would run past
 * the run deadline.
 *
 * @module orga-runtime/agent/inference-retry
 */

import type { Clock } from '../types/core.types.js';
import { InferenceError } from '../types/errors.js';
import type { InferenceRetrySettings } from '../types/loop.types.js';

/**
 * Delay before retry number `attempt` (0-based):
 * `min(baseDelayMs * 2^attempt, maxDelayMs)`, scaled into [0.5, 1.5)
 * when jitter is on.
 */
export function backoffDelay(
  attempt: number,
  settings: InferenceRetrySettings,
  random: () => number = Math.random,
): number {
  const delay = Math.min(settings.baseDelayMs * 2 ** attempt, settings.maxDelayMs);
  return Math.round(settings.jitter ? delay * (0.5 + random()) : delay);
}

export interface InferenceRetryOptions {
  readonly settings: InferenceRetrySettings;
  readonly clock: Clock;

  /** Epoch ms past which no retry is scheduled */
  readonly deadline: number;
  readonly signal: AbortSignal;
  readonly random?: () => number;

  /** Called before each wait; `attempt` is the 1-based retry number */
  onRetry?(error: InferenceError, attempt: number, delayMs: number): void;
}

/**
 * Runs `call` until it succeeds, fails with a kind that is not retried or
 * the retry budget is spent. The last error is rethrown.
 */
export async function withInferenceRetry<T>(call: () => Promise<T>, options: InferenceRetryOptions): Promise<T> {
  const { settings, clock } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await call();
    } catch (error) {
      if (!(error instanceof InferenceError) || !error.retryable || attempt >= settings.maxRetries) {
        throw error;
      }

      let delayMs: number;
      if (error.retryAfterMs !== undefined && error.retryAfterMs > 0) {
        if (error.retryAfterMs > settings.maxDelayMs) throw error;
        delayMs = error.retryAfterMs;
      } else {
        delayMs = backoffDelay(attempt, settings, options.random);
      }

      if (options.signal.aborted || clock.now() + delayMs >= options.deadline) throw error;

      options.onRetry?.(error, attempt + 1, delayMs);
      await clock.sleep(delayMs, options.signal);
      if (options.signal.aborted) throw error;
    }
  }
}
