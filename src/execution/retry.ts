/**
 * Rate-limit retries for a system under test.
 *
 * Retrying belongs to the collaborator layer: the execution engine sees only the
 * final outcome of a wrapped system.
 */

import type { Configuration } from '../configuration.js';
import type { InvokeOptions, InvokeOutcome, SystemUnderTest } from '../types.js';
import { delay } from './delay.js';

export interface RetryOptions {
  /** Retries after the first attempt. Defaults to 3. */
  maxRetries?: number;
  /** Wait before the first retry, doubled for each following one. Defaults to 1000. */
  baseDelayMs?: number;
  /** Upper bound for a computed wait; `retryAfterMs` may exceed it. Defaults to 30000. */
  maxDelayMs?: number;
}

export const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

/**
 * Wrap `system` so outcomes flagged `rateLimited` are retried with exponential backoff.
 * A larger `retryAfterMs` on the outcome takes precedence over the computed wait, even
 * beyond `maxDelayMs`.
 */
export function withRateLimitRetry<TInput>(
  system: SystemUnderTest<TInput>,
  opts?: RetryOptions,
): SystemUnderTest<TInput> {
  const { maxRetries, baseDelayMs, maxDelayMs } = { ...DEFAULT_RETRY_OPTIONS, ...opts };

  return {
    async invoke(
      configuration: Configuration,
      input: TInput,
      options?: InvokeOptions,
    ): Promise<InvokeOutcome> {
      let outcome = await system.invoke(configuration, input, options);

      for (let attempt = 0; attempt < maxRetries && isRateLimited(outcome); attempt++) {
        const wait = Math.max(
          Math.min(maxDelayMs, baseDelayMs * 2 ** attempt),
          outcome.retryAfterMs ?? 0,
        );
        const waited = await delay(wait, options?.signal);
        if (!waited) return outcome;
        outcome = await system.invoke(configuration, input, options);
      }

      return outcome;
    },
  };
}

function isRateLimited(outcome: InvokeOutcome): boolean {
  return !outcome.success && outcome.rateLimited === true;
}
