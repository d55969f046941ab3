export const abortReason = (signal: AbortSignal): Error =>
  signal.reason instanceof Error ? signal.reason : new Error('Aborted');

export const sleep = (ms: number, signal?: AbortSignal | null): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error('Aborted'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

/** Lets pending timers and I/O callbacks run before continuing. */
export const yieldToEventLoop = (signal?: AbortSignal | null): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    setImmediate(() => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }
      resolve();
    });
  });

/**
 * Races `task` against a timer. On expiry the controller handed to `task` is aborted
 * with the error built by `onTimeout` and the returned promise rejects immediately,
 * without waiting for `task` to settle.
 */
export const withDeadline = <T>(
  ms: number,
  task: (signal: AbortSignal) => Promise<T>,
  onTimeout: () => Error,
): Promise<T> => {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = onTimeout();
      controller.abort(error);
      reject(error);
    }, ms);
  });

  const running = task(controller.signal);
  // the losing branch settles later; keep it from surfacing as unhandled
  running.catch(() => undefined);

  return Promise.race([running, expired]).finally(() => clearTimeout(timer));
};
