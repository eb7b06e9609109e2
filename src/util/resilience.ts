import { timeout, TimeoutStrategy, TaskCancelledError } from 'cockatiel';
import { ExternalCallError } from '../tools/errors.js';
import { createLogger } from './logging.js';

const log = createLogger();

/**
 * Runs one external call under a single timeout. No retry, no breaker:
 * a call either finishes within `timeoutMs` or fails with ExternalCallError('timeout').
 * The signal handed to `fn` is aborted when the deadline passes.
 */
export async function withTimeout<T>(
  service: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const policy = timeout(timeoutMs, TimeoutStrategy.Aggressive);
  // A task that rejects on abort can settle before the policy's own cancellation
  let timedOut = false;
  const listener = policy.onTimeout(() => {
    timedOut = true;
  });
  try {
    return await policy.execute(({ signal }) => fn(signal));
  } catch (error) {
    if (timedOut || error instanceof TaskCancelledError) {
      log.debug({ service, timeoutMs }, '⏰ External call timed out');
      throw new ExternalCallError('timeout', `${service} timed out after ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    listener.dispose();
  }
}
