/**
 * Execution engine: one trial of one test case under one configuration.
 */

import type { Configuration } from '../configuration.js';
import { describeError } from '../errors.js';
import { type Logger, logger as defaultLogger } from '../logger.js';
import type { TestCase } from '../test-case.js';
import type { InvokeOutcome, SystemUnderTest, TrialResult, Verdict } from '../types.js';
import { validateOutput } from '../validation/validate.js';

export interface TrialOptions {
  /** Abandon the call after this many milliseconds and record a failure. */
  timeoutMs?: number;
  /** Cancels the in-flight call; the trial is recorded as a failure. */
  signal?: AbortSignal;
  logger?: Logger;
}

export const CANCELLED_ERROR = 'Trial cancelled';

/**
 * Run a single trial and record its outcome.
 *
 * Never rejects. Transport failures, thrown errors, timeouts and cancellation all
 * produce a failed TrialResult; latency of the call is recorded on every path.
 * No retries happen here.
 */
export async function runTrial<TInput>(
  system: SystemUnderTest<TInput>,
  configuration: Configuration,
  testCase: TestCase<TInput>,
  opts?: TrialOptions,
): Promise<TrialResult> {
  const log = opts?.logger ?? defaultLogger;

  const t0 = performance.now();
  const outcome = await invokeGuarded(system, configuration, testCase.input, opts);
  const latencyMs = performance.now() - t0;

  const base = {
    testCaseId: testCase.id,
    configurationId: configuration.id,
    latencyMs,
  };

  if (!outcome.success) {
    const error = outcome.error || 'Unknown error';
    log.debug(`Call failed for ${testCase.id} on ${configuration.id}: ${error}`);
    return Object.freeze({
      ...base,
      timestamp: new Date().toISOString(),
      success: false,
      quality: null,
      error,
      issues: Object.freeze([]),
    });
  }

  let verdict: Verdict;
  try {
    verdict = await validateOutput(outcome.output, testCase);
  } catch (e) {
    // Only reachable for outputs that cannot be serialized (cycles, bigint).
    verdict = {
      valid: false,
      quality: 0,
      issues: [`Output could not be validated: ${describeError(e)}`],
    };
  }

  return Object.freeze({
    ...base,
    timestamp: new Date().toISOString(),
    success: verdict.valid,
    output: outcome.output,
    quality: verdict.quality,
    error: null,
    issues: Object.freeze([...verdict.issues]),
  });
}

function invokeGuarded<TInput>(
  system: SystemUnderTest<TInput>,
  configuration: Configuration,
  input: TInput,
  opts?: TrialOptions,
): Promise<InvokeOutcome> {
  return new Promise<InvokeOutcome>((resolve) => {
    const controller = new AbortController();
    const cleanups: (() => void)[] = [];
    let settled = false;

    const settle = (outcome: InvokeOutcome): void => {
      if (settled) return;
      settled = true;
      for (const cleanup of cleanups) cleanup();
      resolve(outcome);
    };

    const signal = opts?.signal;
    if (signal) {
      if (signal.aborted) {
        settle({ success: false, error: CANCELLED_ERROR });
        return;
      }
      const onAbort = (): void => {
        controller.abort();
        settle({ success: false, error: CANCELLED_ERROR });
      };
      signal.addEventListener('abort', onAbort, { once: true });
      cleanups.push(() => signal.removeEventListener('abort', onAbort));
    }

    const timeoutMs = opts?.timeoutMs;
    if (timeoutMs !== undefined) {
      const timer = setTimeout(() => {
        controller.abort();
        settle({ success: false, error: `Timed out after ${timeoutMs}ms` });
      }, timeoutMs);
      cleanups.push(() => clearTimeout(timer));
    }

    let pending: Promise<InvokeOutcome>;
    try {
      pending = system.invoke(configuration, input, { signal: controller.signal });
    } catch (e) {
      settle({ success: false, error: describeError(e) });
      return;
    }

    void pending.then(
      (outcome) => settle(outcome),
      (e: unknown) => settle({ success: false, error: describeError(e) }),
    );
  });
}
