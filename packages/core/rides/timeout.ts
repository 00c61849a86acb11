/**
 * Deadline helper: runs async work with an AbortSignal that fires when the
 * deadline passes or the parent signal aborts. Whatever the work settles to
 * after that is dropped.
 */

// Longer delays overflow setTimeout and fire at once
const MAX_TIMER_MS = 2_147_483_647;

export class DeadlineExceededError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = "DeadlineExceededError";
  }
}

export class OperationAbortedError extends Error {
  constructor() {
    super("Operation aborted");
    this.name = "OperationAbortedError";
  }
}

export async function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new OperationAbortedError();
  }

  const controller = new AbortController();
  let rejectEarly: (error: Error) => void = () => {};
  const early = new Promise<never>((_, reject) => {
    rejectEarly = reject;
  });

  // Reject before aborting so work that settles on abort cannot win the race
  const timer = setTimeout(() => {
    rejectEarly(new DeadlineExceededError(timeoutMs));
    controller.abort();
  }, Math.min(timeoutMs, MAX_TIMER_MS));

  const onParentAbort = () => {
    rejectEarly(new OperationAbortedError());
    controller.abort();
  };
  parent?.addEventListener("abort", onParentAbort, { once: true });

  try {
    return await Promise.race([work(controller.signal), early]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
