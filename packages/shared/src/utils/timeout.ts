/**
 * Promise timeout helper.
 *
 * The underlying operation is not cancelled; its eventual result is ignored.
 * Redis and pg clients carry their own command timeouts, this bounds the
 * caller's wait on top of those.
 */

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Race `promise` against a timer.
 *
 * @throws TimeoutError when the timer wins
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, operation = "operation"): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, ms)), ms);
  });

  return Promise.race([promise, timeout]).finally(() => {
    if (timer !== undefined) clearTimeout(timer);
  });
}
