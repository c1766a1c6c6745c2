/**
 * Discriminated result so a resolved value can never be mistaken for a timeout.
 */
export type TimeoutResult<T> =
  | { type: "resolved"; value: T }
  | { type: "timeout" };

/**
 * Race a promise against a timeout.
 * The underlying promise keeps running; callers that can cancel should pass an AbortSignal instead.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
): Promise<TimeoutResult<T>> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<{ type: "timeout" }>((resolve) => {
    timeoutId = setTimeout(() => {
      resolve({ type: "timeout" });
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      promise.then((value) => ({ type: "resolved" as const, value })),
      timeoutPromise,
    ]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
