export class OperationTimeoutError extends Error {
  constructor(public readonly timeoutMs: number, message?: string) {
    super(message || `Operation timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run a cancellable operation with a deadline. The operation receives an
 * AbortSignal that fires when the deadline passes, so the underlying work
 * can stop instead of running on in the background.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  message?: string,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new OperationTimeoutError(ms, message);
      controller.abort(error);
      reject(error);
    }, ms);

    let pending: Promise<T>;
    try {
      pending = fn(controller.signal);
    } catch (err) {
      clearTimeout(timer);
      reject(err);
      return;
    }

    pending
      .then(value => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch(err => {
        clearTimeout(timer);
        reject(err);
      });
  });
}
