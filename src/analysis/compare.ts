/**
 * Comparative analyzer: rank configurations and classify test-case difficulty
 * from the full set of aggregated statistics of a run.
 */

import { mean, sampleStdDev } from '../statistics/moments.js';
import type { AggregatedStatistic } from '../types.js';

export type DifficultyLevel = 'easy' | 'medium' | 'hard';

/** Mean success rate above which a test case is easy. */
export const EASY_THRESHOLD = 0.8;
/** Mean success rate above which a test case is at least medium. */
export const MEDIUM_THRESHOLD = 0.5;
/** A pair counts as passed at or above this success rate. */
export const PASSING_SUCCESS_RATE = 0.8;
export const PERFORMANCE_SPREAD_THRESHOLD = 0.2;
export const CONSISTENCY_SPREAD_THRESHOLD = 0.3;

export interface ConfigurationRanking {
  /** 1-based position. */
  rank: number;
  configurationId: string;
  modelId: string;
  meanSuccessRate: number;
  meanConsistency: number;
  meanLatencyMs: number;
  testCount: number;
  testsPassed: number;
  testsFailed: number;
}

export interface TestCaseDifficulty {
  testCaseId: string;
  category: string;
  meanSuccessRate: number;
  difficulty: DifficultyLevel;
  /** 1 minus the spread of success rates across configurations; 1 for a single one. */
  agreement: number;
  successRates: readonly { readonly configurationId: string; readonly successRate: number }[];
}

export interface ComparisonSummary {
  meanSuccessRate: number;
  successRateStdDev: number;
  meanConsistency: number;
  consistencyStdDev: number;
  pairCount: number;
  configurationCount: number;
}

/**
 * Read-only view over all statistics of a run. Recomputed in full on each analysis.
 */
export interface ComparisonReport {
  readonly rankings: readonly ConfigurationRanking[];
  readonly best: ConfigurationRanking | null;
  readonly difficulty: readonly TestCaseDifficulty[];
  /** Advisory only; never used to order the rankings. */
  readonly insights: readonly string[];
  readonly summary: ComparisonSummary;
}

export function classifyDifficulty(meanSuccessRate: number): DifficultyLevel {
  if (meanSuccessRate > EASY_THRESHOLD) return 'easy';
  if (meanSuccessRate > MEDIUM_THRESHOLD) return 'medium';
  return 'hard';
}

/**
 * Analyze a run. An empty input gives an empty report, not an error.
 */
export function analyze(statistics: readonly AggregatedStatistic[]): ComparisonReport {
  const rankings = rankConfigurations(statistics);
  return Object.freeze({
    rankings: Object.freeze(rankings),
    best: rankings[0] ?? null,
    difficulty: Object.freeze(assessDifficulty(statistics)),
    insights: Object.freeze(collectInsights(rankings)),
    summary: Object.freeze(summarize(rankings, statistics.length)),
  });
}

/**
 * Order configurations by mean success rate, then mean consistency, then first
 * appearance in `statistics`.
 */
export function rankConfigurations(
  statistics: readonly AggregatedStatistic[],
): ConfigurationRanking[] {
  const groups = groupBy(statistics, (s) => s.configurationId);

  const unranked: Omit<ConfigurationRanking, 'rank'>[] = [];
  for (const [configurationId, stats] of groups) {
    const testsPassed = stats.filter((s) => s.successRate >= PASSING_SUCCESS_RATE).length;
    unranked.push({
      configurationId,
      modelId: stats[0]?.modelId ?? '',
      meanSuccessRate: mean(stats.map((s) => s.successRate)),
      meanConsistency: mean(stats.map((s) => s.consistency)),
      meanLatencyMs: mean(stats.map((s) => s.latency.mean)),
      testCount: stats.length,
      testsPassed,
      testsFailed: stats.length - testsPassed,
    });
  }

  // Array.prototype.sort is stable, so full ties keep first-appearance order.
  unranked.sort(
    (a, b) => b.meanSuccessRate - a.meanSuccessRate || b.meanConsistency - a.meanConsistency,
  );
  return unranked.map((r, i) => Object.freeze({ rank: i + 1, ...r }));
}

export function assessDifficulty(statistics: readonly AggregatedStatistic[]): TestCaseDifficulty[] {
  const groups = groupBy(statistics, (s) => s.testCaseId);

  const result: TestCaseDifficulty[] = [];
  for (const [testCaseId, stats] of groups) {
    const rates = stats.map((s) => s.successRate);
    const meanSuccessRate = mean(rates);
    const successRates = stats.map((s) =>
      Object.freeze({ configurationId: s.configurationId, successRate: s.successRate }),
    );
    result.push(
      Object.freeze({
        testCaseId,
        category: stats[0]?.category ?? 'general',
        meanSuccessRate,
        difficulty: classifyDifficulty(meanSuccessRate),
        agreement: 1 - sampleStdDev(rates),
        successRates: Object.freeze(successRates),
      }),
    );
  }
  return result;
}

function collectInsights(rankings: readonly ConfigurationRanking[]): string[] {
  const first = rankings[0];
  const last = rankings[rankings.length - 1];
  if (!first || !last) return [];

  const insights: string[] = [];
  if (first.meanSuccessRate - last.meanSuccessRate > PERFORMANCE_SPREAD_THRESHOLD) {
    const best = formatPercent(first.meanSuccessRate);
    const worst = formatPercent(last.meanSuccessRate);
    insights.push(`Significant performance difference: ${best} vs ${worst}`);
  }

  const consistencies = rankings.map((r) => r.meanConsistency);
  if (Math.max(...consistencies) - Math.min(...consistencies) > CONSISTENCY_SPREAD_THRESHOLD) {
    insights.push('Large consistency variations between configurations');
  }
  return insights;
}

function summarize(
  rankings: readonly ConfigurationRanking[],
  pairCount: number,
): ComparisonSummary {
  if (rankings.length === 0) {
    return {
      meanSuccessRate: 0,
      successRateStdDev: 0,
      meanConsistency: 0,
      consistencyStdDev: 0,
      pairCount,
      configurationCount: 0,
    };
  }

  const successRates = rankings.map((r) => r.meanSuccessRate);
  const consistencies = rankings.map((r) => r.meanConsistency);
  return {
    meanSuccessRate: mean(successRates),
    successRateStdDev: sampleStdDev(successRates),
    meanConsistency: mean(consistencies),
    consistencyStdDev: sampleStdDev(consistencies),
    pairCount,
    configurationCount: rankings.length,
  };
}

function groupBy<T>(items: readonly T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) {
      group.push(item);
    } else {
      groups.set(k, [item]);
    }
  }
  return groups;
}

function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}
