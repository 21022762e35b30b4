/**
 * Hard deadlines for operations the caller does not trust to stop on time.
 */

/**
 * Raised when an operation does not settle before its deadline.
 */
export class DeadlineExceededError extends Error {
  readonly code = 'DEADLINE_EXCEEDED';

  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} exceeded its deadline of ${timeoutMs}ms`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Race an operation against a timer.
 *
 * The timer is always cleared, so a settled operation leaves nothing running.
 * On expiry `onTimeout` is invoked (e.g. to abort a request or kill a
 * container) and the returned promise rejects with DeadlineExceededError.
 * The losing operation's eventual result or rejection is discarded.
 */
export async function withDeadline<T>(
  operation: Promise<T>,
  timeoutMs: number,
  label: string,
  onTimeout?: () => void
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timer = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      onTimeout?.();
      reject(new DeadlineExceededError(label, timeoutMs));
    }, timeoutMs);
  });

  // The operation may still reject after losing the race
  void operation.catch(() => undefined);

  try {
    return await Promise.race([operation, timer]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}
