/**
 * Outcome validator: turn a raw output and its test case into a Verdict.
 */

import type { TestCase } from '../test-case.js';
import type { Verdict } from '../types.js';
import {
  type CheckOutcome,
  checkExpectedKind,
  checkPattern,
  clampQuality,
  runCustomValidation,
  stringifyOutput,
} from './checks.js';

/**
 * Run every applicable check against the output.
 *
 * `valid` is the conjunction of the applicable checks and `quality` the product
 * of their multipliers, so a pattern miss on otherwise good output keeps partial credit.
 * Never rejects: custom validation errors are folded into the verdict.
 */
export async function validateOutput<TInput>(
  output: unknown,
  testCase: TestCase<TInput>,
): Promise<Verdict> {
  const text = stringifyOutput(output);
  const checks: CheckOutcome[] = [];

  const kind = checkExpectedKind(text, testCase.expectedKind);
  if (kind) checks.push(kind);

  const pattern = checkPattern(text, testCase.expectedPattern);
  if (pattern) checks.push(pattern);

  if (testCase.validate) {
    checks.push(await runCustomValidation(testCase.validate, output, testCase));
  }

  return {
    valid: checks.every((c) => c.valid),
    quality: clampQuality(checks.reduce((product, c) => product * c.multiplier, 1)),
    issues: checks.flatMap((c) => c.issues),
  };
}
