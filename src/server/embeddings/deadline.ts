import { createLogger, describeError } from "../log.ts";

const log = createLogger("embeddings.deadline");

export type DeadlineOutcome<T> =
  | { kind: "completed"; value: T }
  | { kind: "timed_out"; timeoutMs: number }
  | { kind: "failed"; error: unknown };

/**
 * Runs `task` and settles no later than `timeoutMs` after the call. On
 * overrun the task's signal is aborted, but the work itself may keep going
 * in the background; only the caller's wait is bounded.
 */
export function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<DeadlineOutcome<T>> {
  const abortController = new AbortController();
  const startedAt = Date.now();

  return new Promise<DeadlineOutcome<T>>((resolve) => {
    let settled = false;

    const timeout = setTimeout(() => {
      if (settled) { return; }
      settled = true;
      abortController.abort();
      resolve({ kind: "timed_out", timeoutMs });
    }, timeoutMs);

    let running: Promise<T>;
    try {
      running = task(abortController.signal);
    } catch (error: unknown) {
      running = Promise.reject(error);
    }

    running.then(
      (value) => {
        if (settled) {
          log.debug("late_completion", { elapsedMs: Date.now() - startedAt, timeoutMs });
          return;
        }
        settled = true;
        clearTimeout(timeout);
        resolve({ kind: "completed", value });
      },
      (error: unknown) => {
        if (settled) {
          // The caller already got a timeout; record what the backend did next.
          log.warn("late_failure", {
            elapsedMs: Date.now() - startedAt,
            timeoutMs,
            error: describeError(error),
          });
          return;
        }
        settled = true;
        clearTimeout(timeout);
        resolve({ kind: "failed", error });
      },
    );
  });
}
