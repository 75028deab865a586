/**
 * Reduce the trials of one (configuration, test case) pair to an AggregatedStatistic.
 */

import type { Configuration } from '../configuration.js';
import { AggregationError } from '../errors.js';
import type { TestCase } from '../test-case.js';
import type { AggregatedStatistic, TrialResult } from '../types.js';
import { outputKey } from '../validation/checks.js';
import { moments } from './moments.js';

/**
 * A trial whose call reached the system and returned an output, whether or not
 * the output then passed validation.
 */
export function callSucceeded(result: TrialResult): boolean {
  return result.error === null;
}

/**
 * Aggregate a complete trial set.
 *
 * Latency moments cover every trial; quality moments cover trials with a quality
 * score and are null when there are none. Consistency is the reciprocal of the
 * number of distinct outputs among trials whose call succeeded (0 if none did),
 * so it rewards determinism, not correctness.
 *
 * Throws AggregationError for an empty trial set or for results from another pair.
 */
export function aggregate<TInput>(
  configuration: Configuration,
  testCase: TestCase<TInput>,
  results: readonly TrialResult[],
): AggregatedStatistic {
  if (results.length === 0) {
    throw new AggregationError(
      `Cannot aggregate zero trials for test case '${testCase.id}' ` +
        `on configuration '${configuration.id}'`,
    );
  }

  for (const r of results) {
    if (r.testCaseId !== testCase.id || r.configurationId !== configuration.id) {
      throw new AggregationError(
        `Result for test case '${r.testCaseId}' on configuration '${r.configurationId}' ` +
          `does not belong to pair ('${testCase.id}', '${configuration.id}')`,
      );
    }
  }

  const successCount = results.filter((r) => r.success).length;
  const qualities = results.flatMap((r) => (r.quality === null ? [] : [r.quality]));
  const distinctOutputs = new Set(
    results.filter(callSucceeded).map((r) => outputKey(r.output)),
  ).size;

  return Object.freeze({
    configurationId: configuration.id,
    modelId: configuration.modelId,
    testCaseId: testCase.id,
    category: testCase.category,
    trialCount: results.length,
    successCount,
    successRate: successCount / results.length,
    latency: Object.freeze(moments(results.map((r) => r.latencyMs))),
    quality: qualities.length > 0 ? Object.freeze(moments(qualities)) : null,
    distinctOutputs,
    consistency: distinctOutputs > 0 ? 1 / distinctOutputs : 0,
  });
}
