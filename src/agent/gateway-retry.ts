import {
  GatewayRetryExhaustedError,
  RetryableGatewayError,
  SessionCancelledError,
  TimeoutError,
  formatError,
} from "../infra/errors.js";
import { createLogger } from "../logging.js";
import { sleep, withTimeout } from "../utils.js";
import type { ModelGateway } from "./gateway.js";

const log = createLogger("gateway-retry");

export type GatewayRetryOptions = {
  /** Total attempts including the first. */
  maxAttempts: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  /** Per-attempt timeout; a timed-out attempt is retried. */
  timeoutMs?: number;
  /** Replaceable for tests. */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
};

export const DEFAULT_GATEWAY_RETRY: GatewayRetryOptions = {
  maxAttempts: 3,
  initialBackoffMs: 1000,
  maxBackoffMs: 30_000,
  timeoutMs: 60_000,
};

export function backoffDelay(attempt: number, options: Pick<GatewayRetryOptions, "initialBackoffMs" | "maxBackoffMs">): number {
  return Math.min(options.initialBackoffMs * Math.pow(2, attempt), options.maxBackoffMs);
}

function isRetryable(error: unknown): boolean {
  return error instanceof RetryableGatewayError || error instanceof TimeoutError;
}

/**
 * Wraps a gateway with timeout and exponential-backoff retry. Only retryable
 * errors and timeouts are retried; anything else passes straight through.
 */
export function withGatewayRetry(gateway: ModelGateway, options: GatewayRetryOptions): ModelGateway {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  return {
    async send(messages, tools, sendOptions) {
      const { signal } = sendOptions;
      let lastError: unknown;

      for (let attempt = 0; attempt < maxAttempts; attempt++) {
        try {
          return await withTimeout((attemptSignal) => gateway.send(messages, tools, { signal: attemptSignal }), {
            label: "gateway call",
            timeoutMs: options.timeoutMs,
            signal,
          });
        } catch (error) {
          if (signal.aborted) {
            throw error instanceof SessionCancelledError ? error : new SessionCancelledError();
          }
          if (!isRetryable(error)) {
            throw error;
          }
          lastError = error;
          log.warn(`gateway attempt ${attempt + 1}/${maxAttempts} failed: ${formatError(error)}`);
          if (attempt < maxAttempts - 1) {
            await wait(backoffDelay(attempt, options), signal);
          }
        }
      }

      throw new GatewayRetryExhaustedError(maxAttempts, lastError);
    },
  };
}
