export { delay } from './delay.js';
export type { RetryOptions } from './retry.js';
export { DEFAULT_RETRY_OPTIONS, withRateLimitRetry } from './retry.js';
export type { TrialOptions } from './trial.js';
export { CANCELLED_ERROR, runTrial } from './trial.js';
