/**
 * Timeout Utilities
 */

/**
 * Custom error class for timeout failures
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

/**
 * Execute a function with a timeout.
 *
 * IMPORTANT: This does NOT abort the underlying operation - it only
 * stops waiting for it. In-flight HTTP requests finish on their own
 * request timeout.
 *
 * @param fn - Async function to execute
 * @param timeoutMs - Maximum time to wait in milliseconds
 * @param operationName - Name for error messages
 * @throws TimeoutError if timeout expires
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  operationName?: string
): Promise<T> {
  const opName = operationName ?? 'Operation';

  return new Promise<T>((resolve, reject) => {
    let completed = false;

    const timeoutId = setTimeout(() => {
      if (!completed) {
        completed = true;
        reject(new TimeoutError(`${opName} timed out after ${timeoutMs}ms`, timeoutMs));
      }
    }, timeoutMs);

    fn()
      .then((result) => {
        if (!completed) {
          completed = true;
          clearTimeout(timeoutId);
          resolve(result);
        }
      })
      .catch((error: unknown) => {
        if (!completed) {
          completed = true;
          clearTimeout(timeoutId);
          reject(error);
        }
      });
  });
}
