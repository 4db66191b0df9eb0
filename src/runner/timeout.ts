/**
 * Bound a provider call in time.
 * Throws a TimeoutError if the operation exceeds the timeout; the supplied
 * AbortController is aborted so the underlying request can be torn down.
 */
export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export interface TimeoutOptions {
  abortController?: AbortController;
}

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation = 'Operation',
  options: TimeoutOptions = {}
): Promise<T> {
  // 0 or Infinity disables the bound
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const timeoutError = new TimeoutError(`${operation} timed out after ${timeoutMs}ms`, timeoutMs);
      if (options.abortController && !options.abortController.signal.aborted) {
        options.abortController.abort(timeoutError);
      }
      reject(timeoutError);
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}
