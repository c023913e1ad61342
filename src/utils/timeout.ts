export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class OperationAbortedError extends Error {
  constructor(public readonly label: string) {
    super(`${label} aborted by caller`);
    this.name = 'OperationAbortedError';
  }
}

/**
 * Runs `work` with a signal that fires on timeout or when `outer` aborts.
 * Whatever `work` resolves with after that point is discarded.
 */
export function withTimeout<T>(
  label: string,
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
  outer?: AbortSignal
): Promise<T> {
  if (outer?.aborted) return Promise.reject(new OperationAbortedError(label));

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const cleanup = (): void => {
      clearTimeout(timer);
      outer?.removeEventListener('abort', onAbort);
    };
    const onAbort = (): void => {
      cleanup();
      controller.abort();
      reject(new OperationAbortedError(label));
    };
    const timer = setTimeout(() => {
      cleanup();
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    outer?.addEventListener('abort', onAbort, { once: true });

    Promise.resolve()
      .then(() => work(controller.signal))
      .then(
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
}
