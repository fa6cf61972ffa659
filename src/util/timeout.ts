/** Longest delay a timer accepts; Node fires larger values after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Race a promise against a deadline. The timer is always cleared, so a
 * settled operation leaves nothing pending on the event loop.
 *
 * `onTimeout` builds the rejection and runs exactly once, when the deadline
 * wins; use it to abort the underlying work as well.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_resolve, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutHandle !== undefined) {
      clearTimeout(timeoutHandle);
    }
  }
}
