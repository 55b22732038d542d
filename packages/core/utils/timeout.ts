/**
 * Explicit time budgets for calls that suspend on network I/O.
 *
 * The outcome is a value, not an exception: callers switch on `status`.
 */

export type TimedOutcome<T> =
  | { status: "ok"; value: T; elapsedMs: number }
  | { status: "timeout"; elapsedMs: number }
  | { status: "error"; error: Error; elapsedMs: number };

export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  budgetMs: number
): Promise<TimedOutcome<T>> {
  const controller = new AbortController();
  const startedAt = Date.now();

  return new Promise<TimedOutcome<T>>((resolve) => {
    // First settlement wins; later calls to resolve are no-ops.
    const timer = setTimeout(() => {
      controller.abort();
      resolve({ status: "timeout", elapsedMs: Date.now() - startedAt });
    }, budgetMs);

    Promise.resolve()
      .then(() => task(controller.signal))
      .then(
        (value) => {
          clearTimeout(timer);
          resolve({ status: "ok", value, elapsedMs: Date.now() - startedAt });
        },
        (error: unknown) => {
          clearTimeout(timer);
          resolve({
            status: "error",
            error: error instanceof Error ? error : new Error(String(error)),
            elapsedMs: Date.now() - startedAt,
          });
        }
      );
  });
}
