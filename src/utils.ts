import { AppError, SessionCancelledError, TimeoutError } from "./infra/errors.js";

/**
 * The error an aborted signal should surface. Reasons we raise ourselves
 * (cancellation, timeout) pass through; anything else, including the
 * platform's AbortError, becomes a SessionCancelledError.
 */
export function abortReason(signal?: AbortSignal): AppError {
  return signal?.reason instanceof AppError ? signal.reason : new SessionCancelledError();
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Settles with `work`, or rejects as soon as `signal` aborts. The work itself
 * keeps running when it ignores the signal; its eventual outcome is dropped.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export type TimeoutOptions = {
  label: string;
  timeoutMs?: number;
  signal?: AbortSignal;
};

/**
 * Runs `run` with a child signal that aborts when the parent aborts or the
 * timeout elapses. A timeout rejects with TimeoutError.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions,
): Promise<T> {
  const { label, timeoutMs, signal: parent } = options;
  if (parent?.aborted) {
    throw abortReason(parent);
  }

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(abortReason(parent));
  parent?.addEventListener("abort", onParentAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  if (timeoutMs !== undefined) {
    timer = setTimeout(() => {
      controller.abort(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  }

  try {
    return await raceAbort(run(controller.signal), controller.signal);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

export function truncate(text: string, maxLength: number): string {
  if (maxLength < 1) {
    return "";
  }
  if (text.length <= maxLength) {
    return text;
  }
  if (maxLength < 4) {
    return text.slice(0, maxLength);
  }
  return text.slice(0, maxLength - 3) + "...";
}
