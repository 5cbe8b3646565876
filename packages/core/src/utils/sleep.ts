import { ShutdownRaceError } from '../errors/index.js';

/**
 * Sleep that can be interrupted by an AbortSignal.
 * Rejects with ShutdownRaceError if the signal is (or becomes) aborted so
 * the caller can bail out.
 */
export function interruptibleSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new ShutdownRaceError());
  }

  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      resolve();
    }, ms);

    const onAbort = () => {
      clearTimeout(timer);
      cleanup();
      reject(new ShutdownRaceError());
    };

    const cleanup = () => {
      signal?.removeEventListener('abort', onAbort);
    };

    signal?.addEventListener('abort', onAbort);
  });
}
