/**
 * Run `operation` with a deadline. When the deadline passes the signal handed
 * to the operation is aborted and the returned promise rejects with
 * `onTimeout()`; the operation is expected to stop before it commits anything.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, rejectDeadline) => {
    timer = setTimeout(() => {
      controller.abort();
      rejectDeadline(onTimeout());
    }, ms);
  });
  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Deadline for writes. The signal is aborted when `ms` passes, but the
 * operation is always awaited: a write that went past its point of no return
 * (COMMIT sent) keeps its result. Only a failure after the abort is reported
 * as `onTimeout()`.
 */
export async function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), ms);
  try {
    return await operation(controller.signal);
  } catch (err) {
    if (controller.signal.aborted) throw onTimeout();
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
