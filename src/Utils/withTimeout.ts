import { TimeoutError } from './errors';

/**
 * Races `promise` against a timer. On expiry the returned promise rejects with a `TimeoutError`
 * naming `what`; the underlying operation is not interrupted.
 */
export const withTimeout = <T>(promise: PromiseLike<T>, ms: number, what: string, signal?: AbortSignal): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    if (signal?.aborted) return reject(signal.reason);

    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
    const onAbort = () => {
      cleanup();
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new TimeoutError(`${what} timed out after ${ms}ms`));
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
