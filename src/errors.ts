/**
 * Errors raised for programming mistakes: invalid definitions, empty aggregates,
 * duplicate ids, invalid run options.
 *
 * Failures of a single trial are never raised; they are recorded on its TrialResult.
 */

import type { ZodError } from 'zod';

export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluationError';
  }
}

/** A configuration definition failed validation. */
export class ConfigurationError extends EvaluationError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A test case definition failed validation. */
export class TestCaseError extends EvaluationError {
  constructor(message: string) {
    super(message);
    this.name = 'TestCaseError';
  }
}

/** Malformed input to the aggregator, e.g. an empty trial set. */
export class AggregationError extends EvaluationError {
  constructor(message: string) {
    super(message);
    this.name = 'AggregationError';
  }
}

export class SuiteError extends EvaluationError {
  constructor(message: string) {
    super(message);
    this.name = 'SuiteError';
  }
}

/**
 * Normalize a caught value to an Error and render it as `Name: message`.
 */
export function describeError(e: unknown): string {
  const error = e instanceof Error ? e : new Error(String(e));
  return `${error.name}: ${error.message}`;
}

/**
 * Render zod issues as `path: message` pairs for an error message.
 */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
