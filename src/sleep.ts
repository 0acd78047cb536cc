/**
 * Waits for `ms` milliseconds. Resolves early, without error, once `signal`
 * is aborted.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> => {
  if (signal?.aborted) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve) => {
    const timer = setTimeout(() => {
      cleanup();
      resolve();
    }, ms);

    const onAbort = () => {
      clearTimeout(timer);
      cleanup();
      resolve();
    };

    const cleanup = () => {
      signal?.removeEventListener('abort', onAbort);
    };

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

/**
 * Settles like `promise`, or rejects with `reason()` as soon as `signal` is
 * aborted. The abandoned promise keeps running; its outcome is observed so a
 * late rejection is never unhandled.
 */
export const abortable = <T>(promise: Promise<T>, signal: AbortSignal, reason: () => Error): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(reason());
    const cleanup = () => signal.removeEventListener('abort', onAbort);

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

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Resolves once `signal` is aborted.
 */
export const aborted = (signal: AbortSignal): Promise<void> => {
  if (signal.aborted) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
};
