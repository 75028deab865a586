export { aggregate, callSucceeded } from './aggregate.js';
export { mean, moments, sampleStdDev } from './moments.js';
export type { PairEvaluation, PairOptions } from './run-trials.js';
export {
  DEFAULT_INTER_TRIAL_DELAY_MS,
  DEFAULT_TRIALS,
  evaluatePair,
  runTrials,
} from './run-trials.js';
