export type {
  ComparisonReport,
  ComparisonSummary,
  ConfigurationRanking,
  DifficultyLevel,
  TestCaseDifficulty,
} from './compare.js';
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
} from './compare.js';
