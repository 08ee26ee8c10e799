import {
  SchemaValidationError,
  TimeoutError,
  ToolExecutionError,
  UnknownToolError,
  errorMessage,
} from "../infra/errors.js";
import { createLogger } from "../logging.js";
import { withTimeout } from "../utils.js";
import { createToolResultMessage } from "./messages.js";
import type { BoundToolCall, ToolRegistry } from "./tool-registry.js";
import type { ToolCallPart, ToolResultMessage } from "./types.js";

const log = createLogger("dispatch");

export const DEFAULT_TOOL_CONCURRENCY = 4;
export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export type PendingToolCall = {
  readonly part: ToolCallPart;
  /** Set when the gateway sent arguments that are not a JSON object. */
  readonly argumentError?: string;
};

export type DispatchOptions = {
  readonly concurrency: number;
  readonly toolTimeoutMs?: number;
  readonly signal: AbortSignal;
};

export class Semaphore {
  private permits: number;
  private readonly waiters: Array<() => void> = [];

  constructor(permits: number) {
    this.permits = permits;
  }

  async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits--;
      return () => this.release();
    }
    return new Promise((resolve) => {
      this.waiters.push(() => {
        this.permits--;
        resolve(() => this.release());
      });
    });
  }

  private release(): void {
    this.permits++;
    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }
}

function errorResult(part: ToolCallPart, text: string): ToolResultMessage {
  return createToolResultMessage({
    toolCallId: part.toolCallId,
    name: part.name,
    payload: text,
    isError: true,
  });
}

async function runToolCall(
  registry: ToolRegistry,
  call: PendingToolCall,
  options: DispatchOptions,
): Promise<ToolResultMessage> {
  const { part } = call;
  if (call.argumentError !== undefined) {
    log.warn(`malformed arguments for ${part.name} (${part.toolCallId}): ${call.argumentError}`);
    return errorResult(part, `malformed arguments for ${part.name}: ${call.argumentError}`);
  }

  let bound: BoundToolCall;
  try {
    bound = registry.resolve(part.name, part.arguments);
  } catch (err) {
    if (err instanceof UnknownToolError || err instanceof SchemaValidationError) {
      log.warn(`${err.message} (${part.toolCallId})`);
      return errorResult(part, err.message);
    }
    log.warn(`resolving ${part.name} (${part.toolCallId}) threw: ${errorMessage(err)}`);
    return errorResult(part, `invalid arguments for ${part.name}: ${errorMessage(err)}`);
  }

  try {
    const payload = await withTimeout(
      (signal) => registry.execute(bound, { toolCallId: part.toolCallId, toolName: part.name, signal }),
      { label: `tool ${part.name}`, timeoutMs: options.toolTimeoutMs, signal: options.signal },
    );
    return createToolResultMessage({ toolCallId: part.toolCallId, name: part.name, payload });
  } catch (err) {
    if (options.signal.aborted) {
      throw err;
    }
    if (err instanceof TimeoutError || err instanceof ToolExecutionError) {
      log.warn(`${err.message} (${part.toolCallId})`);
      return errorResult(part, err.message);
    }
    return errorResult(part, `tool ${part.name} failed: ${errorMessage(err)}`);
  }
}

/**
 * Runs one turn's tool calls, at most `concurrency` at a time. Results come
 * back in call order whatever order the tools finish in. Every tool-level
 * failure becomes an error result; only cancellation rejects.
 */
export function dispatchToolCalls(
  registry: ToolRegistry,
  calls: readonly PendingToolCall[],
  options: DispatchOptions,
): Promise<ToolResultMessage[]> {
  const semaphore = new Semaphore(options.concurrency);
  return Promise.all(
    calls.map(async (call) => {
      const release = await semaphore.acquire();
      try {
        return await runToolCall(registry, call, options);
      } finally {
        release();
      }
    }),
  );
}
