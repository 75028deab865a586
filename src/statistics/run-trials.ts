/**
 * Drive the repeated trials of one (configuration, test case) pair.
 */

import type { Configuration } from '../configuration.js';
import { EvaluationError } from '../errors.js';
import { delay } from '../execution/delay.js';
import { runTrial } from '../execution/trial.js';
import type { Logger } from '../logger.js';
import type { TestCase } from '../test-case.js';
import type { AggregatedStatistic, SystemUnderTest, TrialResult } from '../types.js';
import { aggregate } from './aggregate.js';

export const DEFAULT_TRIALS = 5;
/** Pause between consecutive calls of a pair. */
export const DEFAULT_INTER_TRIAL_DELAY_MS = 1000;

export interface PairOptions {
  trials?: number;
  interTrialDelayMs?: number;
  timeoutMs?: number;
  /** Stops issuing new trials once aborted. */
  signal?: AbortSignal;
  logger?: Logger;
}

export interface PairEvaluation {
  results: TrialResult[];
  statistic: AggregatedStatistic;
}

/**
 * Run the trials of a pair strictly in order, pausing between calls.
 *
 * The first trial is always issued, so the result list is never empty; a trial cut
 * short by the signal is recorded as a cancelled failure.
 */
export async function runTrials<TInput>(
  system: SystemUnderTest<TInput>,
  configuration: Configuration,
  testCase: TestCase<TInput>,
  opts?: PairOptions,
): Promise<TrialResult[]> {
  const trials = opts?.trials ?? DEFAULT_TRIALS;
  if (!Number.isInteger(trials) || trials < 1) {
    throw new EvaluationError(`trials must be a positive integer, got ${trials}`);
  }
  const interTrialDelayMs = opts?.interTrialDelayMs ?? DEFAULT_INTER_TRIAL_DELAY_MS;

  const results: TrialResult[] = [];
  for (let i = 0; i < trials; i++) {
    if (i > 0) {
      const waited = await delay(interTrialDelayMs, opts?.signal);
      if (!waited) break;
    }

    const result = await runTrial(system, configuration, testCase, {
      timeoutMs: opts?.timeoutMs,
      signal: opts?.signal,
      logger: opts?.logger,
    });
    const verdict = result.success ? 'passed' : 'failed';
    opts?.logger?.debug(
      `  trial ${i + 1}/${trials} ${verdict} in ${result.latencyMs.toFixed(0)}ms`,
      { testCaseId: testCase.id, configurationId: configuration.id },
    );
    results.push(result);
  }
  return results;
}

/**
 * Run every trial of a pair, then aggregate them in one pass.
 */
export async function evaluatePair<TInput>(
  system: SystemUnderTest<TInput>,
  configuration: Configuration,
  testCase: TestCase<TInput>,
  opts?: PairOptions,
): Promise<PairEvaluation> {
  const results = await runTrials(system, configuration, testCase, opts);
  return { results, statistic: aggregate(configuration, testCase, results) };
}
