import { describe, expect, it } from 'vitest';
import { createLogger, type LoggerOptions } from '../src/logger.js';

function capture(options: LoggerOptions) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const log = createLogger(options, {
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
  });
  return { stdout, stderr, log };
}

describe('createLogger', () => {
  it('writes info to stdout and problems to stderr', () => {
    const { stdout, stderr, log } = capture({ noColor: true });
    log.info('started');
    log.warn('slow response');
    log.error('run failed');
    expect(stdout).toEqual(['started']);
    expect(stderr).toEqual(['warning: slow response', 'error: run failed']);
  });

  it('hides debug output unless verbose', () => {
    const quietish = capture({ noColor: true });
    quietish.log.debug('trial 1/5 passed');
    expect(quietish.stdout).toEqual([]);

    const verbose = capture({ noColor: true, verbose: true });
    verbose.log.debug('trial 1/5 passed');
    expect(verbose.stdout).toEqual(['[debug] trial 1/5 passed']);
  });

  it('only shows errors when quiet', () => {
    const { stdout, stderr, log } = capture({ noColor: true, quiet: true, verbose: true });
    log.debug('a');
    log.info('b');
    log.warn('c');
    log.error('d');
    expect(stdout).toEqual([]);
    expect(stderr).toEqual(['error: d']);
  });

  it('dumps data when verbose', () => {
    const { stdout, log } = capture({ noColor: true, verbose: true });
    log.info('pair done', { successRate: 1 });
    expect(stdout).toEqual(['pair done', '{\n  "successRate": 1\n}']);
  });

  it('emits one JSON object per line', () => {
    const { stdout, log } = capture({ json: true });
    log.warn('rate limited', { retryAfterMs: 500 });
    expect(stdout).toHaveLength(1);
    const entry: unknown = JSON.parse(stdout[0] ?? '');
    expect(entry).toMatchObject({
      level: 'warn',
      message: 'rate limited',
      data: { retryAfterMs: 500 },
    });
  });

  it('can be reconfigured', () => {
    const { stdout, log } = capture({ noColor: true });
    log.configure({ quiet: true });
    log.info('hidden');
    expect(stdout).toEqual([]);
    expect(log.getOptions()).toEqual({ noColor: true, quiet: true });
  });
});
