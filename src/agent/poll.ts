import { ConfigError, TimeoutError } from "../infra/errors.js";
import { abortReason, sleep } from "../utils.js";

export type PollOptions = {
  /** Total budget across every check and sleep. */
  maxWaitMs: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffFactor?: number;
  signal?: AbortSignal;
  /** Replaceable for tests. */
  clock?: () => number;
};

/**
 * Calls `check` until it returns something other than undefined, sleeping
 * with exponential backoff in between. The last sleep is cut short so the
 * final check lands inside `maxWaitMs`.
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<T | undefined>,
  options: PollOptions,
): Promise<T> {
  const { maxWaitMs, signal } = options;
  const initialDelayMs = options.initialDelayMs ?? 1000;
  const maxDelayMs = options.maxDelayMs ?? 30_000;
  const backoffFactor = options.backoffFactor ?? 2;
  const clock = options.clock ?? Date.now;

  if (!(maxWaitMs > 0)) {
    throw new ConfigError(`maxWaitMs must be positive, got ${maxWaitMs}`);
  }
  if (!(initialDelayMs >= 0) || !(maxDelayMs >= initialDelayMs)) {
    throw new ConfigError(`invalid poll delays: initial ${initialDelayMs}ms, max ${maxDelayMs}ms`);
  }
  if (!(backoffFactor >= 1)) {
    throw new ConfigError(`backoffFactor must be at least 1, got ${backoffFactor}`);
  }

  const startedAt = clock();
  let delay = initialDelayMs;
  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw abortReason(signal);
    }
    const value = await check(attempt);
    if (value !== undefined) {
      return value;
    }
    const remaining = maxWaitMs - (clock() - startedAt);
    if (remaining <= 0) {
      throw new TimeoutError(`condition not met within ${maxWaitMs}ms after ${attempt} attempt(s)`, maxWaitMs);
    }
    await sleep(Math.min(delay, remaining), signal);
    delay = Math.min(delay * backoffFactor, maxDelayMs);
  }
}
