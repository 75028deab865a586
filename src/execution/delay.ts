import { setTimeout as sleep } from 'node:timers/promises';

/**
 * Wait `ms` milliseconds. Resolves false instead of waiting out the delay when
 * `signal` aborts.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  if (ms <= 0) return true;
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (e) {
    if (e instanceof Error && e.name === 'AbortError') return false;
    throw e;
  }
}
