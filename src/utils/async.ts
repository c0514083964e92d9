import { ProviderError } from '../errors.js';

/**
 * Run `task` with an AbortSignal that fires after `ms`. Rejects with a
 * timeout ProviderError even when the task ignores the signal.
 */
export async function withTimeout<T>(ms: number, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ProviderError('timeout', `Provider did not respond within ${ms} ms`));
    }, ms);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
