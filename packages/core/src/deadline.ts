import { TimeoutError } from "./errors.js";

// ─── Deadline / cancellation ───────────────────────────────────────────────────

export interface DeadlineOptions {
  /** Caller cancellation. */
  signal?: AbortSignal;
  /** Milliseconds before the operation fails with TimeoutError. */
  timeoutMs?: number;
  /** Used in error messages. */
  label?: string;
}

/**
 * Run `task` with a derived AbortSignal that fires when the caller's signal
 * aborts or the deadline expires. Either way the returned promise rejects with
 * a TimeoutError; the task is expected to observe the signal and stop.
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => T | Promise<T>,
  options: DeadlineOptions = {}
): Promise<T> {
  const { signal: parent, timeoutMs, label = "operation" } = options;
  if (parent?.aborted) {
    throw cancellationError(label, parent.reason);
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    if (timeoutMs !== undefined && Number.isFinite(timeoutMs)) {
      timer = setTimeout(() => {
        const err = new TimeoutError(`${label} timed out after ${timeoutMs}ms`);
        controller.abort(err);
        reject(err);
      }, Math.max(0, timeoutMs));
    }
    if (parent) {
      onParentAbort = () => {
        const err = cancellationError(label, parent.reason);
        controller.abort(err);
        reject(err);
      };
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([
      Promise.resolve().then(() => task(controller.signal)),
      deadline,
    ]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
    if (parent && onParentAbort) parent.removeEventListener("abort", onParentAbort);
  }
}

/** Throw if `signal` has fired, preserving a TimeoutError abort reason. */
export function throwIfCancelled(signal: AbortSignal | undefined, label = "operation"): void {
  if (signal?.aborted) {
    throw cancellationError(label, signal.reason);
  }
}

function cancellationError(label: string, reason: unknown): TimeoutError {
  if (reason instanceof TimeoutError) return reason;
  return new TimeoutError(`${label} was cancelled`, "CANCELLED", reason);
}
