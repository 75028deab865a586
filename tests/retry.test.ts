import { describe, expect, it } from 'vitest';
import { createConfiguration } from '../src/configuration.js';
import { withRateLimitRetry } from '../src/execution/retry.js';
import { runTrial } from '../src/execution/trial.js';
import { createLogger } from '../src/logger.js';
import { createTestCase } from '../src/test-case.js';
import { scriptedSystem } from './fakes.js';

const config = createConfiguration({ modelId: 'model-a' });
const sum = createTestCase({ id: 'sum', input: 'What is 2 + 2?', expectedPattern: /^4$/ });

describe('withRateLimitRetry', () => {
  it('retries a rate-limited call', async () => {
    const system = scriptedSystem([
      { success: false, error: 'HTTP 429', rateLimited: true },
      { success: true, output: '4' },
    ]);
    const outcome = await withRateLimitRetry(system, { baseDelayMs: 1 }).invoke(config, 'q');
    expect(outcome).toEqual({ success: true, output: '4' });
    expect(system.calls).toHaveLength(2);
  });

  it('gives up after maxRetries', async () => {
    const system = scriptedSystem([{ success: false, error: 'HTTP 429', rateLimited: true }]);
    const outcome = await withRateLimitRetry(system, { maxRetries: 2, baseDelayMs: 1 }).invoke(
      config,
      'q',
    );
    expect(outcome.rateLimited).toBe(true);
    expect(system.calls).toHaveLength(3);
  });

  it('does not retry other failures', async () => {
    const system = scriptedSystem([{ success: false, error: 'HTTP 500' }]);
    const outcome = await withRateLimitRetry(system, { baseDelayMs: 1 }).invoke(config, 'q');
    expect(outcome.error).toBe('HTTP 500');
    expect(system.calls).toHaveLength(1);
  });

  it('caps the computed backoff at maxDelayMs', async () => {
    const system = scriptedSystem([
      { success: false, error: 'HTTP 429', rateLimited: true },
      { success: true, output: '4' },
    ]);
    const started = performance.now();
    await withRateLimitRetry(system, { baseDelayMs: 60_000, maxDelayMs: 5 }).invoke(config, 'q');
    expect(performance.now() - started).toBeLessThan(1000);
    expect(system.calls).toHaveLength(2);
  });

  it('waits out a retryAfterMs longer than maxDelayMs', async () => {
    const system = scriptedSystem([
      { success: false, error: 'HTTP 429', rateLimited: true, retryAfterMs: 60 },
      { success: true, output: '4' },
    ]);
    await withRateLimitRetry(system, { baseDelayMs: 1, maxDelayMs: 5 }).invoke(config, 'q');
    expect(system.calls).toHaveLength(2);
    const [first, second] = system.calls;
    expect((second?.startedAt ?? 0) - (first?.startedAt ?? 0)).toBeGreaterThanOrEqual(55);
  });

  it('returns the last outcome when aborted during backoff', async () => {
    const system = scriptedSystem([{ success: false, error: 'HTTP 429', rateLimited: true }]);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);
    const outcome = await withRateLimitRetry(system, { baseDelayMs: 10_000 }).invoke(config, 'q', {
      signal: controller.signal,
    });
    expect(outcome).toEqual({ success: false, error: 'HTTP 429', rateLimited: true });
    expect(system.calls).toHaveLength(1);
  });

  it('hides retries from the trial', async () => {
    const system = scriptedSystem([
      { success: false, error: 'HTTP 429', rateLimited: true },
      { success: true, output: '4' },
    ]);
    const result = await runTrial<string>(withRateLimitRetry(system, { baseDelayMs: 1 }), config, sum, {
      logger: createLogger({ quiet: true }, { stdout: () => {}, stderr: () => {} }),
    });
    expect(result.success).toBe(true);
    expect(result.error).toBeNull();
  });
});
