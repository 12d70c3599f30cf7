/**
 * Request deadline
 *
 * Runs a request and its body read under one timer. The signal handed to
 * `run` is aborted when the deadline passes, and the returned promise
 * rejects with an `AbortError` even if the work ignores the signal.
 *
 * @module providers/timeout
 */

/**
 * Error raised when the deadline passes.
 */
export function timeoutError(timeoutMs: number): Error {
  const error = new Error(`Request timed out after ${timeoutMs}ms`);
  error.name = 'AbortError';
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Race `run` against a deadline, clearing the timer either way.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(timeoutError(timeoutMs));
    }, timeoutMs);
  });

  const work = run(controller.signal);
  // A late rejection after the deadline won has nobody left to report to.
  void work.catch(() => undefined);

  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}
