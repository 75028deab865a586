/**
 * Core type definitions shared by the execution, aggregation and analysis stages.
 */

import type { Configuration } from './configuration.js';
import type { TestCase } from './test-case.js';

/**
 * What a system under test returns for one call.
 * Every failure mode is reported here rather than thrown.
 */
export interface InvokeOutcome {
  success: boolean;
  output?: unknown;
  error?: string | null;
  /** Set by adapters when the failure was a rate-limit response. */
  rateLimited?: boolean;
  /** Server-suggested wait before retrying, in milliseconds. */
  retryAfterMs?: number | null;
}

export interface InvokeOptions {
  /** Aborted when the trial times out or the run is cancelled. */
  signal?: AbortSignal;
}

/**
 * The capability being evaluated: one configuration, one input, one outcome.
 *
 * Concrete networked implementations are adapters satisfying this interface.
 */
export interface SystemUnderTest<TInput = unknown> {
  invoke(
    configuration: Configuration,
    input: TInput,
    options?: InvokeOptions,
  ): Promise<InvokeOutcome>;
}

/**
 * Optional secondary capability that scores a produced artifact against a
 * second ground truth (e.g. evaluating generated code).
 */
export interface Scorer<TInput = unknown> {
  score(artifact: unknown, testCase: TestCase<TInput>): Promise<InvokeOutcome>;
}

/**
 * Verdict of the outcome validator for one output.
 */
export interface Verdict {
  valid: boolean;
  /** Product of per-check multipliers, clamped to [0, 1]. */
  quality: number;
  issues: string[];
}

/**
 * Immutable record of a single trial.
 */
export interface TrialResult {
  readonly testCaseId: string;
  readonly configurationId: string;
  /** ISO-8601 time at which the trial finished. */
  readonly timestamp: string;
  /** True only when the call succeeded and the output passed validation. */
  readonly success: boolean;
  /** Raw output; absent when the call itself failed. */
  readonly output?: unknown;
  readonly latencyMs: number;
  /** Defined only for trials whose call succeeded. */
  readonly quality: number | null;
  readonly error: string | null;
  readonly issues: readonly string[];
}

export interface Moments {
  mean: number;
  /** Sample standard deviation; 0 for a single sample. */
  stdDev: number;
}

/**
 * Summary of all trials of one (configuration, test case) pair.
 */
export interface AggregatedStatistic {
  readonly configurationId: string;
  readonly modelId: string;
  readonly testCaseId: string;
  readonly category: string;
  readonly trialCount: number;
  readonly successCount: number;
  readonly successRate: number;
  readonly latency: Readonly<Moments>;
  /** Null when no trial produced a quality score. */
  readonly quality: Readonly<Moments> | null;
  readonly distinctOutputs: number;
  /** 1 / distinctOutputs, or 0 when no call succeeded. */
  readonly consistency: number;
}
