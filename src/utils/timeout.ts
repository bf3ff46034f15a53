import { RunCancelledError, TimeoutError } from '../pipeline/errors';

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }
}

/**
 * Resolves after `ms`, or rejects with RunCancelledError as soon as the
 * signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RunCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Races `work` against a timer. The work itself is not interrupted; callers
 * that can cancel it should also pass the signal down.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  operation: string,
  signal?: AbortSignal
): Promise<T> {
  const cleanups: Array<() => void> = [];

  const timeoutPromise = new Promise<never>((_, reject) => {
    const timeoutHandle = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
    cleanups.push(() => clearTimeout(timeoutHandle));

    if (signal) {
      const onAbort = () => reject(new RunCancelledError());
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
        cleanups.push(() => signal.removeEventListener('abort', onAbort));
      }
    }
  });

  try {
    return await Promise.race([work, timeoutPromise]);
  } finally {
    cleanups.forEach((cleanup) => cleanup());
    // the losing side may still reject later
    work.catch(() => undefined);
  }
}
