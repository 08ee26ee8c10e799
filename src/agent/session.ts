import { randomUUID } from "node:crypto";
import {
  AgentFailedError,
  AppError,
  ConfigError,
  ContextLengthExceededError,
  FatalGatewayError,
  GatewayRetryExhaustedError,
  InvalidStateError,
  RetryableGatewayError,
  SessionCancelledError,
  TimeoutError,
  errorMessage,
  formatError,
} from "../infra/errors.js";
import { createLogger } from "../logging.js";
import { abortReason, raceAbort } from "../utils.js";
import { DEFAULT_KEEP_RECENT, createGatewaySummarizer, createSummaryMessage, planCompaction } from "./compaction.js";
import type { Summarizer } from "./compaction.js";
import { DEFAULT_TOOL_CONCURRENCY, DEFAULT_TOOL_TIMEOUT_MS, dispatchToolCalls } from "./dispatch.js";
import type { PendingToolCall } from "./dispatch.js";
import { normalizeArguments, parseGatewayResponse } from "./gateway.js";
import type { GatewayResponse, ModelGateway, ToolCallRequest } from "./gateway.js";
import { DEFAULT_GATEWAY_RETRY, withGatewayRetry } from "./gateway-retry.js";
import type { GatewayRetryOptions } from "./gateway-retry.js";
import { MessageLog } from "./message-log.js";
import type { LogRange } from "./message-log.js";
import { createAssistantMessage, createUserMessage } from "./messages.js";
import { checkTermination, createTerminationPolicy } from "./termination.js";
import type { TerminationPolicy } from "./termination.js";
import { ToolRegistry, createToolRegistry } from "./tool-registry.js";
import type { ToolDefinition } from "./tool-registry.js";
import type { AgentState, FinalAnswer, Message, OutputPart, TokenUsage, ToolCallPart } from "./types.js";

const log = createLogger("session");

export type SessionOptions = {
  gateway: ModelGateway;
  /** Either a tool list (a registry is built and sealed) or a shared registry, not both. */
  tools?: readonly ToolDefinition[];
  registry?: ToolRegistry;
  policy?: Partial<TerminationPolicy>;
  toolConcurrency?: number;
  toolTimeoutMs?: number;
  /** Retry/timeout policy at the gateway boundary; `false` sends calls unwrapped. */
  retry?: Partial<GatewayRetryOptions> | false;
  /** Messages left untouched when history is compacted. */
  keepRecent?: number;
  summarizer?: Summarizer;
  id?: string;
  onStateChange?: (from: AgentState, to: AgentState) => void;
  /** Wall clock used for the deadline. */
  clock?: () => number;
};

export type SubmitOptions = {
  /** Aborting this cancels the whole session. */
  signal?: AbortSignal;
};

export type Session = {
  readonly id: string;
  readonly state: AgentState;
  submit: (input: string | readonly OutputPart[], options?: SubmitOptions) => Promise<FinalAnswer>;
  cancel: (reason?: string) => void;
  messages: () => readonly Message[];
  compact: (range: LogRange, summary: Message) => void;
  /** Summarizes all but the most recent messages. Returns false when nothing could be compacted. */
  compactHistory: (options?: SubmitOptions) => Promise<boolean>;
};

function resolveRegistry(options: SessionOptions): ToolRegistry {
  if (options.tools && options.registry) {
    throw new ConfigError("pass either tools or registry, not both");
  }
  const registry = options.registry ?? createToolRegistry(options.tools ?? []);
  registry.seal();
  return registry;
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function toFailure(err: unknown): AgentFailedError | undefined {
  if (err instanceof AgentFailedError) {
    return err;
  }
  if (err instanceof GatewayRetryExhaustedError || err instanceof RetryableGatewayError || err instanceof TimeoutError) {
    return new AgentFailedError("gateway_exhausted", `model gateway retry budget exhausted: ${err.message}`, {
      cause: err,
    });
  }
  if (err instanceof ContextLengthExceededError) {
    return new AgentFailedError("context_exhausted", `context budget exhausted: ${err.message}`, { cause: err });
  }
  if (err instanceof FatalGatewayError) {
    return new AgentFailedError("gateway_fatal", `model gateway failed: ${err.message}`, { cause: err });
  }
  return undefined;
}

/**
 * Creates a session: one conversation driven by the agent loop. Configuration
 * problems (duplicate tools, bad limits) throw here, before any message.
 */
export function createSession(options: SessionOptions): Session {
  const id = options.id ?? randomUUID();
  const registry = resolveRegistry(options);
  const toolMetadata = registry.metadata();
  const policy = createTerminationPolicy(options.policy);
  const toolConcurrency = requirePositiveInteger("toolConcurrency", options.toolConcurrency ?? DEFAULT_TOOL_CONCURRENCY);
  const toolTimeoutMs = requirePositiveInteger("toolTimeoutMs", options.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS);
  const keepRecent = options.keepRecent ?? DEFAULT_KEEP_RECENT;
  if (!Number.isInteger(keepRecent) || keepRecent < 0) {
    throw new ConfigError(`keepRecent must be a non-negative integer, got ${keepRecent}`);
  }
  const gateway =
    options.retry === false
      ? options.gateway
      : withGatewayRetry(options.gateway, { ...DEFAULT_GATEWAY_RETRY, ...options.retry });
  const summarize = options.summarizer ?? createGatewaySummarizer(gateway);
  const clock = options.clock ?? Date.now;

  const messageLog = new MessageLog();
  const controller = new AbortController();
  let state: AgentState = "idle";
  let running = false;

  function transition(to: AgentState): void {
    const from = state;
    state = to;
    log.debug(`session ${id}: ${from} -> ${to}`);
    if (options.onStateChange) {
      try {
        options.onStateChange(from, to);
      } catch (err) {
        log.warn(`onStateChange hook threw: ${formatError(err)}`);
      }
    }
  }

  function throwIfCancelled(): void {
    if (controller.signal.aborted) {
      throw abortReason(controller.signal);
    }
  }

  async function sendToGateway(): Promise<GatewayResponse> {
    const open = messageLog.openToolCallIds();
    if (open.length > 0) {
      throw new InvalidStateError(`unresolved tool calls before model call: ${open.join(", ")}`);
    }
    let raw: unknown;
    try {
      raw = await raceAbort(
        gateway.send(messageLog.snapshot(), toolMetadata, { signal: controller.signal }),
        controller.signal,
      );
    } catch (err) {
      if (err instanceof AppError || controller.signal.aborted) {
        throw err;
      }
      throw new FatalGatewayError(`gateway failed: ${errorMessage(err)}`, { cause: err });
    }
    return parseGatewayResponse(raw);
  }

  async function compactOnce(signal: AbortSignal): Promise<boolean> {
    const snapshot = messageLog.snapshot();
    const range = planCompaction(snapshot, keepRecent);
    if (!range) {
      return false;
    }
    const text = await raceAbort(summarize(snapshot.slice(range.start, range.end + 1), signal), signal);
    messageLog.compact(range, createSummaryMessage(text));
    log.info(`session ${id}: compacted messages ${range.start}..${range.end} into a summary`);
    return true;
  }

  /** One model call; on context overflow, compacts once and retries the same turn. */
  async function callModel(): Promise<GatewayResponse> {
    try {
      return await sendToGateway();
    } catch (err) {
      if (!(err instanceof ContextLengthExceededError)) {
        throw err;
      }
      log.warn(`session ${id}: context length exceeded, compacting history`);
      if (!(await compactOnce(controller.signal))) {
        throw new AgentFailedError("context_exhausted", "context length exceeded and history cannot be compacted", {
          cause: err,
        });
      }
    }
    try {
      return await sendToGateway();
    } catch (err) {
      if (err instanceof ContextLengthExceededError) {
        throw new AgentFailedError("context_exhausted", "context length still exceeded after compaction", {
          cause: err,
        });
      }
      throw err;
    }
  }

  function toPendingCalls(requests: readonly ToolCallRequest[]): PendingToolCall[] {
    const assigned = new Set<string>();
    return requests.map((request) => {
      let toolCallId = request.id;
      if (toolCallId === undefined || assigned.has(toolCallId) || messageLog.hasToolCallId(toolCallId)) {
        if (toolCallId !== undefined) {
          log.warn(`session ${id}: gateway reused tool call id ${toolCallId}, assigning a new one`);
        }
        toolCallId = `call_${randomUUID()}`;
      }
      assigned.add(toolCallId);
      const args = normalizeArguments(request.arguments);
      const part: ToolCallPart = {
        type: "tool_call",
        toolCallId,
        name: request.name,
        arguments: args.ok ? args.value : {},
      };
      return args.ok ? { part } : { part, argumentError: args.reason };
    });
  }

  function settle(err: unknown): unknown {
    if (controller.signal.aborted) {
      transition("cancelled");
      return abortReason(controller.signal);
    }
    const failure = toFailure(err);
    transition("failed");
    if (failure) {
      log.error(`session ${id} failed (${failure.reason}): ${failure.message}`);
      return failure;
    }
    log.error(`session ${id} failed unexpectedly: ${formatError(err)}`);
    return err;
  }

  async function runLoop(): Promise<FinalAnswer> {
    const startedAt = clock();
    let turns = 0;
    let usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };

    try {
      for (;;) {
        // Checked before entering awaiting_model so a tripped limit goes
        // straight to failed without an extra awaiting_model entry.
        const verdict = checkTermination(policy, { turnsTaken: turns, startedAt, now: clock() });
        if (verdict) {
          throw new AgentFailedError(verdict.reason, verdict.message);
        }
        transition("awaiting_model");
        turns++;

        const response = await callModel();
        throwIfCancelled();
        if (response.usage) {
          usage = {
            inputTokens: usage.inputTokens + response.usage.inputTokens,
            outputTokens: usage.outputTokens + response.usage.outputTokens,
          };
        }

        if (response.type === "final") {
          const message = createAssistantMessage({ text: response.text });
          messageLog.append(message);
          transition("done");
          return { text: response.text, message, turns, usage };
        }

        const pending = toPendingCalls(response.calls);
        messageLog.append(createAssistantMessage({ text: response.text, toolCalls: pending.map((call) => call.part) }));
        transition("dispatching_tools");

        const results = await dispatchToolCalls(registry, pending, {
          concurrency: toolConcurrency,
          toolTimeoutMs,
          signal: controller.signal,
        });
        throwIfCancelled();
        for (const result of results) {
          messageLog.append(result);
        }
      }
    } catch (err) {
      throw settle(err);
    }
  }

  function assertIdle(action: string): void {
    if (running) {
      throw new InvalidStateError(`session ${id} is busy; cannot ${action}`);
    }
  }

  function cancel(reason?: string): void {
    if (state === "failed" || state === "cancelled") {
      return;
    }
    controller.abort(new SessionCancelledError(reason ? `session cancelled: ${reason}` : undefined));
    if (!running) {
      transition("cancelled");
    }
  }

  async function submit(input: string | readonly OutputPart[], submitOptions: SubmitOptions = {}): Promise<FinalAnswer> {
    if (controller.signal.aborted && state !== "failed" && state !== "cancelled") {
      transition("cancelled");
    }
    if (state === "failed" || state === "cancelled") {
      throw new InvalidStateError(`session ${id} is ${state}`);
    }
    assertIdle("submit");

    const external = submitOptions.signal;
    if (external?.aborted) {
      cancel("submit signal aborted");
      throw abortReason(controller.signal);
    }
    const onExternalAbort = () => cancel("submit signal aborted");
    external?.addEventListener("abort", onExternalAbort, { once: true });

    running = true;
    try {
      messageLog.append(createUserMessage(input));
      return await runLoop();
    } finally {
      running = false;
      external?.removeEventListener("abort", onExternalAbort);
    }
  }

  return {
    id,
    get state() {
      return state;
    },
    submit,
    cancel,
    messages: () => messageLog.snapshot(),
    compact: (range, summary) => {
      assertIdle("compact");
      messageLog.compact(range, summary);
    },
    compactHistory: async (compactOptions = {}) => {
      assertIdle("compact");
      running = true;
      try {
        const signal = compactOptions.signal
          ? AbortSignal.any([controller.signal, compactOptions.signal])
          : controller.signal;
        return await compactOnce(signal);
      } finally {
        running = false;
        if (controller.signal.aborted && state !== "failed" && state !== "cancelled") {
          transition("cancelled");
        }
      }
    },
  };
}
