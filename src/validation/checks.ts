/**
 * Built-in output checks: expected kind, expected pattern, custom validation.
 *
 * Each applicable check yields a CheckOutcome; `validateOutput` combines them.
 */

import { canonicalJson } from '../configuration.js';
import type { CustomValidation, ExpectedOutputKind, TestCase } from '../test-case.js';

/** Quality multipliers applied when a check fails. */
export const KIND_MISMATCH_MULTIPLIER = 0.5;
export const PATTERN_MISMATCH_MULTIPLIER = 0.7;
export const CUSTOM_FAILURE_MULTIPLIER = 0.3;
export const CUSTOM_ERROR_MULTIPLIER = 0.8;

export interface CheckOutcome {
  name: string;
  valid: boolean;
  multiplier: number;
  issues: string[];
}

const DECIMAL_NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * The text form of an output: strings verbatim, anything else as canonical JSON.
 * Used for pattern matching, kind checks and distinct-output counting.
 */
export function stringifyOutput(output: unknown): string {
  return typeof output === 'string' ? output : canonicalJson(output);
}

/**
 * Key used to compare outputs for distinctness. Falls back to `String(output)` for
 * values JSON cannot render (bigint, cycles).
 */
export function outputKey(output: unknown): string {
  try {
    return stringifyOutput(output);
  } catch {
    return String(output);
  }
}

export function isNumericText(text: string): boolean {
  const trimmed = text.trim();
  return DECIMAL_NUMBER.test(trimmed) && Number.isFinite(Number(trimmed));
}

export function isStructuredText(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check the output parses as the expected kind. Returns null for `any`.
 */
export function checkExpectedKind(text: string, kind: ExpectedOutputKind): CheckOutcome | null {
  switch (kind) {
    case 'any':
      return null;
    case 'numeric':
      return isNumericText(text)
        ? { name: 'kind', valid: true, multiplier: 1, issues: [] }
        : {
            name: 'kind',
            valid: false,
            multiplier: KIND_MISMATCH_MULTIPLIER,
            issues: ['Output is not numeric'],
          };
    case 'structured':
      return isStructuredText(text)
        ? { name: 'kind', valid: true, multiplier: 1, issues: [] }
        : {
            name: 'kind',
            valid: false,
            multiplier: KIND_MISMATCH_MULTIPLIER,
            issues: ['Output is not valid JSON'],
          };
  }
}

/**
 * Check the output contains a match for the pattern. Returns null when there is none.
 */
export function checkPattern(text: string, pattern: RegExp | null): CheckOutcome | null {
  if (pattern === null) return null;
  if (pattern.test(text)) {
    return { name: 'pattern', valid: true, multiplier: 1, issues: [] };
  }
  return {
    name: 'pattern',
    valid: false,
    multiplier: PATTERN_MISMATCH_MULTIPLIER,
    issues: [`Output does not match pattern: ${pattern.source}`],
  };
}

/**
 * Run a case's custom validation. Errors it raises become an issue with a fixed
 * penalty and do not invalidate the output.
 */
export async function runCustomValidation<TInput>(
  validate: CustomValidation<TInput>,
  output: unknown,
  testCase: TestCase<TInput>,
): Promise<CheckOutcome> {
  try {
    const verdict = await validate(output, testCase);

    if (typeof verdict === 'boolean') {
      return verdict
        ? { name: 'custom', valid: true, multiplier: 1, issues: [] }
        : {
            name: 'custom',
            valid: false,
            multiplier: CUSTOM_FAILURE_MULTIPLIER,
            issues: ['Custom validation failed'],
          };
    }

    const valid = verdict.valid ?? true;
    let issues: string[] = [];
    if (!valid) {
      const reported = verdict.issues ?? [];
      issues = reported.length > 0 ? [...reported] : ['Custom validation failed'];
    }
    return { name: 'custom', valid, multiplier: verdict.qualityMultiplier ?? 1, issues };
  } catch (e) {
    const error = e instanceof Error ? e : new Error(String(e));
    return {
      name: 'custom',
      valid: true,
      multiplier: CUSTOM_ERROR_MULTIPLIER,
      issues: [`Validation function error: ${error.message}`],
    };
  }
}

/** Clamp to [0, 1]; NaN becomes 0. */
export function clampQuality(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
