import { setTimeout as wait } from 'node:timers/promises';
import { ExtractionError, errorMessage } from '../../errors/src/index.js';

/**
 * Runs `task` bounded by `timeoutMs`. Expiry becomes an ExtractionError with
 * reason "timeout"; any other failure is wrapped with reason "navigation".
 */
export async function withTimeout<T>(step: string, timeoutMs: number, task: () => Promise<T>): Promise<T> {
  const timer = new AbortController();
  const timeout = wait(timeoutMs, undefined, { signal: timer.signal }).then(() => {
    throw new ExtractionError(`${step} timed out after ${timeoutMs}ms`, 'timeout', { step, timeoutMs });
  });
  // the timer is aborted once the task settles; that rejection is expected
  timeout.catch(() => undefined);
  try {
    return await Promise.race([task(), timeout]);
  } catch (err) {
    if (err instanceof ExtractionError) throw err;
    throw new ExtractionError(`${step} failed: ${errorMessage(err)}`, 'navigation', { step }, { cause: err });
  } finally {
    timer.abort();
  }
}
