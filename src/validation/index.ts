export type { CheckOutcome } from './checks.js';
export {
  CUSTOM_ERROR_MULTIPLIER,
  CUSTOM_FAILURE_MULTIPLIER,
  checkExpectedKind,
  checkPattern,
  clampQuality,
  isNumericText,
  isStructuredText,
  KIND_MISMATCH_MULTIPLIER,
  outputKey,
  PATTERN_MISMATCH_MULTIPLIER,
  runCustomValidation,
  stringifyOutput,
} from './checks.js';
export type { ScoreJudge } from './scorer.js';
export { scoredBy } from './scorer.js';
export { validateOutput } from './validate.js';
