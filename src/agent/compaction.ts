import { ConfigError, FatalGatewayError } from "../infra/errors.js";
import { parseGatewayResponse } from "./gateway.js";
import type { ModelGateway } from "./gateway.js";
import type { LogRange } from "./message-log.js";
import { createUserMessage, renderTranscript, toolCallsOf } from "./messages.js";
import type { Message, UserMessage } from "./types.js";

export const DEFAULT_KEEP_RECENT = 4;

const SUMMARY_PREFIX = "[Conversation summary]";

const SUMMARY_INSTRUCTIONS =
  "Summarize the following conversation concisely. Keep facts, decisions, tool results and open questions " +
  "that later turns may depend on.";

export type Summarizer = (messages: readonly Message[], signal: AbortSignal) => Promise<string>;

/**
 * The widest range starting at 0 that leaves `keepRecent` trailing messages
 * and never separates a tool call from its result. Undefined when fewer than
 * two messages qualify.
 */
export function planCompaction(messages: readonly Message[], keepRecent: number): LogRange | undefined {
  if (!Number.isInteger(keepRecent) || keepRecent < 0) {
    throw new ConfigError(`keepRecent must be a non-negative integer, got ${keepRecent}`);
  }

  const resultIndex = new Map<string, number>();
  messages.forEach((message, index) => {
    if (message.role === "tool_result") {
      resultIndex.set(message.toolCallId, index);
    }
  });

  let end = messages.length - keepRecent - 1;
  while (end >= 1) {
    let splitAt: number | undefined;
    for (let index = 0; index <= end && splitAt === undefined; index++) {
      const message = messages[index];
      if (!message) {
        break;
      }
      for (const call of toolCallsOf(message)) {
        const result = resultIndex.get(call.toolCallId);
        if (result === undefined || result > end) {
          splitAt = index;
          break;
        }
      }
    }
    if (splitAt === undefined) {
      return { start: 0, end };
    }
    end = splitAt - 1;
  }
  return undefined;
}

export function createSummaryMessage(text: string): UserMessage {
  return createUserMessage(`${SUMMARY_PREFIX}\n${text}`, { synthetic: true });
}

/** Asks the gateway itself, with no tools offered, for a summary. */
export function createGatewaySummarizer(gateway: ModelGateway): Summarizer {
  return async (messages, signal) => {
    const prompt = createUserMessage(`${SUMMARY_INSTRUCTIONS}\n\n${renderTranscript(messages)}`);
    const response = parseGatewayResponse(await gateway.send([prompt], [], { signal }));
    if (response.type !== "final") {
      throw new FatalGatewayError("summarizer expected a final answer but the model requested tools");
    }
    return response.text;
  };
}
