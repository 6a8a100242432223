import { TimeoutError } from './errors.js';

/**
 * Run `fn` with a deadline. On expiry the signal handed to `fn` is aborted and the
 * returned promise rejects with TimeoutError, whether or not `fn` honours the signal.
 */
export async function withTimeout<T>(
  ms: number,
  label: string,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(`${label} timed out after ${ms}ms`, { timeoutMs: ms }));
    }, ms);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
