import { DeadlineExceededError } from "@/domain/errors/AppError";

// Largest delay setTimeout honours; anything above fires after 1ms.
export const MAX_TIMEOUT_MS = 2147483647;

export type DeadlineResult<T> = { status: "completed"; value: T } | { status: "timed-out"; timeoutMs: number };

/**
 * Runs `task` with a wall-clock budget.
 *
 * On expiry the signal handed to the task is aborted with a {@link DeadlineExceededError}
 * and the result is `timed-out`; whatever the task produces afterwards is discarded.
 * A rejection from the task before the deadline propagates unchanged.
 * Once the call settles the signal is aborted either way, so requests still in flight are cancelled.
 * Rejects with a `RangeError` for a budget outside 1..{@link MAX_TIMEOUT_MS} without starting the task.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<DeadlineResult<T>> {
  if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new RangeError(`Deadline must be an integer between 1 and ${MAX_TIMEOUT_MS}ms, got ${timeoutMs}`);
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expiry = new Promise<DeadlineResult<T>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort(new DeadlineExceededError(timeoutMs));
      resolve({ status: "timed-out", timeoutMs });
    }, timeoutMs);
  });

  const completion = task(controller.signal).then((value): DeadlineResult<T> => ({ status: "completed", value }));

  try {
    return await Promise.race([completion, expiry]);
  } finally {
    clearTimeout(timer);
    if (!controller.signal.aborted) {
      controller.abort(new Error("Task settled"));
    }
  }
}
