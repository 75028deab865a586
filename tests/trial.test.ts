import { describe, expect, it } from 'vitest';
import { createConfiguration } from '../src/configuration.js';
import { CANCELLED_ERROR, runTrial } from '../src/execution/trial.js';
import { createLogger } from '../src/logger.js';
import { createTestCase } from '../src/test-case.js';
import type { InvokeOutcome, SystemUnderTest } from '../src/types.js';
import { scriptedSystem } from './fakes.js';

const config = createConfiguration({ modelId: 'model-a' });
const sum = createTestCase({ id: 'sum', input: 'What is 2 + 2?', expectedPattern: /^4$/ });
const silent = createLogger({ quiet: true }, { stdout: () => {}, stderr: () => {} });

describe('runTrial', () => {
  it('records a validated output', async () => {
    const result = await runTrial<string>(scriptedSystem([{ success: true, output: '4' }]), config, sum, {
      logger: silent,
    });
    expect(result).toMatchObject({
      testCaseId: 'sum',
      configurationId: config.id,
      success: true,
      output: '4',
      quality: 1,
      error: null,
      issues: [],
    });
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
    expect(Number.isNaN(Date.parse(result.timestamp))).toBe(false);
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('passes the test case input to the system', async () => {
    const system = scriptedSystem([{ success: true, output: '4' }]);
    await runTrial<string>(system, config, sum, { logger: silent });
    expect(system.calls).toHaveLength(1);
    expect(system.calls[0]?.input).toBe('What is 2 + 2?');
    expect(system.calls[0]?.configurationId).toBe(config.id);
  });

  it('records a rejected output as a failure without an error', async () => {
    const result = await runTrial<string>(scriptedSystem([{ success: true, output: '5' }]), config, sum, {
      logger: silent,
    });
    expect(result.success).toBe(false);
    expect(result.output).toBe('5');
    expect(result.quality).toBe(0.7);
    expect(result.error).toBeNull();
    expect(result.issues).toEqual(['Output does not match pattern: ^4$']);
  });

  it('records a transport failure', async () => {
    const result = await runTrial<string>(
      scriptedSystem([{ success: false, error: 'HTTP 503: unavailable' }]),
      config,
      sum,
      { logger: silent },
    );
    expect(result.success).toBe(false);
    expect(result.error).toBe('HTTP 503: unavailable');
    expect(result.quality).toBeNull();
    expect(result.issues).toEqual([]);
    expect('output' in result).toBe(false);
  });

  it('fills in a missing error message', async () => {
    const result = await runTrial<string>(scriptedSystem([{ success: false }]), config, sum, {
      logger: silent,
    });
    expect(result.error).toBe('Unknown error');
  });

  it('records a rejected invocation', async () => {
    const system: SystemUnderTest = {
      invoke: async () => {
        throw new Error('socket hang up');
      },
    };
    const result = await runTrial<string>(system, config, sum, { logger: silent });
    expect(result.success).toBe(false);
    expect(result.error).toBe('Error: socket hang up');
  });

  it('records a synchronous throw', async () => {
    const system: SystemUnderTest = {
      invoke(): Promise<InvokeOutcome> {
        throw new TypeError('bad input');
      },
    };
    const result = await runTrial<string>(system, config, sum, { logger: silent });
    expect(result.error).toBe('TypeError: bad input');
  });

  it('times out a hanging call and aborts it', async () => {
    const system = scriptedSystem(['hang']);
    const result = await runTrial<string>(system, config, sum, { timeoutMs: 20, logger: silent });
    expect(result.success).toBe(false);
    expect(result.error).toBe('Timed out after 20ms');
    expect(result.latencyMs).toBeGreaterThanOrEqual(15);
    expect(system.calls[0]?.signal?.aborted).toBe(true);
  });

  it('cancels an in-flight call', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);
    const result = await runTrial<string>(scriptedSystem(['hang']), config, sum, {
      signal: controller.signal,
      logger: silent,
    });
    expect(result.error).toBe(CANCELLED_ERROR);
  });

  it('does not call the system when already cancelled', async () => {
    const system = scriptedSystem([{ success: true, output: '4' }]);
    const result = await runTrial<string>(system, config, sum, {
      signal: AbortSignal.abort(),
      logger: silent,
    });
    expect(result.error).toBe('Trial cancelled');
    expect(system.calls).toHaveLength(0);
  });

  it('keeps a trial successful when its custom validation throws', async () => {
    const testCase = createTestCase({
      id: 'sum',
      input: 'What is 2 + 2?',
      expectedPattern: /^4$/,
      validate: () => {
        throw new Error('checker offline');
      },
    });
    const system = scriptedSystem([{ success: true, output: '4' }]);
    const result = await runTrial<string>(system, config, testCase, { logger: silent });
    expect(result.success).toBe(true);
    expect(result.quality).toBe(0.8);
    expect(result.issues).toEqual(['Validation function error: checker offline']);
  });

  it('logs call failures at debug level', async () => {
    const lines: string[] = [];
    const log = createLogger(
      { verbose: true, noColor: true },
      { stdout: (line) => lines.push(line), stderr: (line) => lines.push(line) },
    );
    await runTrial<string>(scriptedSystem([{ success: false, error: 'HTTP 429' }]), config, sum, {
      logger: log,
    });
    expect(lines).toEqual([`[debug] Call failed for sum on ${config.id}: HTTP 429`]);
  });
});
