/**
 * Adapt a secondary Scorer capability into a custom validation function.
 */

import type { CustomValidation, CustomVerdict, TestCase } from '../test-case.js';
import type { InvokeOutcome, Scorer } from '../types.js';

/**
 * Decide a verdict from what the scorer returned for an output.
 */
export type ScoreJudge<TInput = unknown> = (
  scored: unknown,
  output: unknown,
  testCase: TestCase<TInput>,
) => boolean | CustomVerdict;

/**
 * Build a custom validation that sends the output to `scorer` and lets `judge`
 * decide the verdict from a successful scoring call.
 *
 * A failed scoring call is an invalid verdict carrying the scorer's error.
 *
 * @example
 * ```ts
 * const testCase = createTestCase({
 *   id: 'distance',
 *   input: 'Distance between A(2,3) and B(8,7)',
 *   validate: scoredBy(expressionService, (value) => Math.abs(Number(value) - 7.21) < 0.1),
 * });
 * ```
 */
export function scoredBy<TInput>(
  scorer: Scorer<TInput>,
  judge: ScoreJudge<TInput> = () => true,
): CustomValidation<TInput> {
  return async (output, testCase) => {
    const outcome: InvokeOutcome = await scorer.score(output, testCase);
    if (!outcome.success) {
      return { valid: false, issues: [`Scorer failed: ${outcome.error ?? 'unknown error'}`] };
    }
    return judge(outcome.output, output, testCase);
  };
}
