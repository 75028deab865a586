/**
 * stochastic-evals: statistical evaluation of non-deterministic AI configurations.
 *
 * @example
 * ```ts
 * import { createConfiguration, createTestCase, EvaluationSuite } from 'stochastic-evals';
 *
 * const suite = new EvaluationSuite({
 *   configurations: [
 *     createConfiguration({ modelId: 'model-pro', temperature: 0.3, topK: 40, topP: 0.95 }),
 *     createConfiguration({ modelId: 'model-lite', temperature: 0.3, topK: 40, topP: 0.95 }),
 *   ],
 *   testCases: [
 *     createTestCase({
 *       id: 'sum',
 *       input: 'What is 2 + 2? Answer with a number.',
 *       expectedKind: 'numeric',
 *       expectedPattern: /^\s*4\s*$/,
 *     }),
 *   ],
 * });
 *
 * const report = await suite.run(system, { trials: 10 });
 * console.log(report.comparison.best, report.comparison.difficulty);
 * ```
 */

// Analysis
export type {
  ComparisonReport,
  ComparisonSummary,
  ConfigurationRanking,
  DifficultyLevel,
  TestCaseDifficulty,
} from './analysis/index.js';
export {
  analyze,
  assessDifficulty,
  CONSISTENCY_SPREAD_THRESHOLD,
  classifyDifficulty,
  EASY_THRESHOLD,
  MEDIUM_THRESHOLD,
  PASSING_SUCCESS_RATE,
  PERFORMANCE_SPREAD_THRESHOLD,
  rankConfigurations,
} from './analysis/index.js';
// Data model
export type {
  Configuration,
  ConfigurationAttributes,
  ConfigurationInput,
  OutputFormat,
} from './configuration.js';
export {
  canonicalJson,
  configurationId,
  configurationSchema,
  createConfiguration,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_TEMPERATURE,
} from './configuration.js';
export {
  AggregationError,
  ConfigurationError,
  describeError,
  EvaluationError,
  SuiteError,
  TestCaseError,
} from './errors.js';
// Execution
export type { RetryOptions, TrialOptions } from './execution/index.js';
export {
  CANCELLED_ERROR,
  DEFAULT_RETRY_OPTIONS,
  runTrial,
  withRateLimitRetry,
} from './execution/index.js';
export type { JsonLogEntry, Logger, LoggerOptions, LogLevel, LogSink } from './logger.js';
export { createLogger, logger } from './logger.js';
// Statistics
export type { PairEvaluation, PairOptions } from './statistics/index.js';
export {
  aggregate,
  callSucceeded,
  DEFAULT_INTER_TRIAL_DELAY_MS,
  DEFAULT_TRIALS,
  evaluatePair,
  mean,
  moments,
  runTrials,
  sampleStdDev,
} from './statistics/index.js';
// Suite
export type { PairRecord, RunOptions, SuiteOptions, SuiteReport } from './suite.js';
export { EvaluationSuite, runOptionsSchema } from './suite.js';
export type {
  CustomValidation,
  CustomVerdict,
  ExpectedOutputKind,
  TestCase,
  TestCaseInput,
} from './test-case.js';
export { createTestCase } from './test-case.js';
// Core types
export type {
  AggregatedStatistic,
  InvokeOptions,
  InvokeOutcome,
  Moments,
  Scorer,
  SystemUnderTest,
  TrialResult,
  Verdict,
} from './types.js';
// Validation
export type { CheckOutcome, ScoreJudge } from './validation/index.js';
export {
  checkExpectedKind,
  checkPattern,
  outputKey,
  scoredBy,
  stringifyOutput,
  validateOutput,
} from './validation/index.js';
