/**
 * EvaluationSuite: configurations × test cases, each pair run for N trials.
 *
 * A suite evaluates every (configuration, test case) pair against a system under
 * test, aggregates each pair once all of its trials are done, and compares the
 * configurations across the whole run.
 */

import pLimit from 'p-limit';
import { z } from 'zod';
import { analyze, type ComparisonReport } from './analysis/compare.js';
import type { Configuration } from './configuration.js';
import { formatIssues, SuiteError } from './errors.js';
import { type Logger, logger as defaultLogger } from './logger.js';
import {
  DEFAULT_INTER_TRIAL_DELAY_MS,
  DEFAULT_TRIALS,
  evaluatePair,
  type PairEvaluation,
} from './statistics/run-trials.js';
import type { TestCase } from './test-case.js';
import type { AggregatedStatistic, SystemUnderTest, TrialResult } from './types.js';

export interface SuiteOptions<TInput = unknown> {
  name?: string | null;
  configurations?: Configuration[];
  testCases?: TestCase<TInput>[];
}

export const runOptionsSchema = z
  .object({
    /** Name for the run. Defaults to the suite name. */
    name: z.string().optional(),
    /** Trials per (configuration, test case) pair. */
    trials: z.number().int().min(1).default(DEFAULT_TRIALS),
    /** Pause between consecutive trials of a pair. */
    interTrialDelayMs: z.number().min(0).default(DEFAULT_INTER_TRIAL_DELAY_MS),
    /** Per-call timeout; a timed-out call is a failed trial. */
    timeoutMs: z.number().positive().optional(),
    /** Pairs evaluated at once. 1 reproduces fully sequential runs. */
    maxConcurrency: z.number().int().min(1).default(1),
    /** Log per-pair progress at info level. */
    progress: z.boolean().default(false),
  })
  .strict();

export type RunOptions = z.input<typeof runOptionsSchema> & {
  /** Abort the run: no new pairs or trials start once aborted. */
  signal?: AbortSignal;
  logger?: Logger;
};

export interface PairRecord extends PairEvaluation {
  configurationId: string;
  testCaseId: string;
}

export interface SuiteReport {
  name: string;
  startedAt: string;
  finishedAt: string;
  trialsPerPair: number;
  /** Completed pairs, in configuration-major order. */
  pairs: PairRecord[];
  /** Every trial of the run, pair by pair. */
  results: TrialResult[];
  statistics: AggregatedStatistic[];
  comparison: ComparisonReport;
}

export class EvaluationSuite<TInput = unknown> {
  name: string | null;
  configurations: Configuration[];
  testCases: TestCase<TInput>[];

  constructor(opts?: SuiteOptions<TInput>) {
    this.name = opts?.name ?? null;
    this.configurations = [];
    this.testCases = [];
    for (const c of opts?.configurations ?? []) this.addConfiguration(c);
    for (const t of opts?.testCases ?? []) this.addTestCase(t);
  }

  /**
   * Add a configuration. Configurations with identical attributes share an id and
   * are rejected as duplicates.
   */
  addConfiguration(configuration: Configuration): void {
    if (this.configurations.some((c) => c.id === configuration.id)) {
      throw new SuiteError(`Duplicate configuration: '${configuration.id}'`);
    }
    this.configurations.push(configuration);
  }

  addTestCase(testCase: TestCase<TInput>): void {
    if (this.testCases.some((t) => t.id === testCase.id)) {
      throw new SuiteError(`Duplicate test case id: '${testCase.id}'`);
    }
    this.testCases.push(testCase);
  }

  /**
   * Evaluate every pair and compare the configurations.
   *
   * Each pair's trials run in order with the inter-trial pause; distinct pairs may
   * overlap up to `maxConcurrency`. Pairs not started before an abort are omitted.
   */
  async run(system: SystemUnderTest<TInput>, opts?: RunOptions): Promise<SuiteReport> {
    const { signal, logger, ...rest }: RunOptions = opts ?? {};
    const parsed = runOptionsSchema.safeParse(rest);
    if (!parsed.success) {
      throw new SuiteError(`Invalid run options: ${formatIssues(parsed.error)}`);
    }
    const options = parsed.data;
    const log = logger ?? defaultLogger;
    const name = options.name ?? this.name ?? 'suite';
    const limit = pLimit(options.maxConcurrency);
    const startedAt = new Date().toISOString();

    if (options.progress) {
      log.info(
        `Starting ${name}: ${this.configurations.length} configurations x ` +
          `${this.testCases.length} test cases x ${options.trials} trials`,
      );
    }

    const tasks = this.configurations.flatMap((configuration) =>
      this.testCases.map((testCase) =>
        limit(async (): Promise<PairRecord | null> => {
          if (signal?.aborted) return null;
          const evaluation = await evaluatePair(system, configuration, testCase, {
            trials: options.trials,
            interTrialDelayMs: options.interTrialDelayMs,
            timeoutMs: options.timeoutMs,
            signal,
            logger: log,
          });
          if (options.progress) {
            const s = evaluation.statistic;
            log.info(
              `  ${testCase.name} on ${configuration.modelId} (${configuration.id}): ` +
                `${s.successCount}/${s.trialCount} passed, consistency ${s.consistency.toFixed(2)}`,
            );
          }
          return { configurationId: configuration.id, testCaseId: testCase.id, ...evaluation };
        }),
      ),
    );

    const pairs = (await Promise.all(tasks)).filter((p): p is PairRecord => p !== null);
    const statistics = pairs.map((p) => p.statistic);
    const comparison = analyze(statistics);

    if (options.progress && comparison.best) {
      log.info(
        `Best configuration: ${comparison.best.modelId} (${comparison.best.configurationId})`,
      );
    }
    for (const insight of comparison.insights) log.debug(insight);

    return {
      name,
      startedAt,
      finishedAt: new Date().toISOString(),
      trialsPerPair: options.trials,
      pairs,
      results: pairs.flatMap((p) => p.results),
      statistics,
      comparison,
    };
  }
}
