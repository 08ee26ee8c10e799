import { randomUUID } from "node:crypto";
import type {
  AssistantMessage,
  Message,
  OutputPart,
  TextPart,
  ToolCallPart,
  ToolResultMessage,
  ToolResultPayload,
  UserMessage,
} from "./types.js";

export function createUserMessage(
  content: string | readonly OutputPart[],
  options: { synthetic?: boolean } = {},
): UserMessage {
  return {
    id: randomUUID(),
    timestamp: Date.now(),
    role: "user",
    content: typeof content === "string" ? [{ type: "text", text: content }] : [...content],
    ...(options.synthetic ? { synthetic: true } : {}),
  };
}

export function createAssistantMessage(params: {
  text?: string;
  toolCalls?: readonly ToolCallPart[];
}): AssistantMessage {
  const content: (TextPart | ToolCallPart)[] = [];
  if (params.text) {
    content.push({ type: "text", text: params.text });
  }
  content.push(...(params.toolCalls ?? []));
  return {
    id: randomUUID(),
    timestamp: Date.now(),
    role: "assistant",
    content,
  };
}

export function createToolResultMessage(params: {
  toolCallId: string;
  name: string;
  payload: ToolResultPayload;
  isError?: boolean;
}): ToolResultMessage {
  return {
    id: randomUUID(),
    timestamp: Date.now(),
    role: "tool_result",
    toolCallId: params.toolCallId,
    name: params.name,
    isError: params.isError ?? false,
    content: normalizePayload(params.payload),
  };
}

export function normalizePayload(payload: ToolResultPayload): readonly OutputPart[] {
  if (typeof payload === "string") {
    return [{ type: "text", text: payload }];
  }
  if ("type" in payload) {
    return [payload];
  }
  return [...payload];
}

export function toolCallsOf(message: Message): readonly ToolCallPart[] {
  if (message.role !== "assistant") {
    return [];
  }
  return message.content.filter((part): part is ToolCallPart => part.type === "tool_call");
}

/** Concatenated text parts of a message. */
export function textOf(message: Message): string {
  const texts: string[] = [];
  for (const part of message.content) {
    if (part.type === "text") {
      texts.push(part.text);
    }
  }
  return texts.join("");
}

function renderPart(part: OutputPart | ToolCallPart): string {
  switch (part.type) {
    case "text":
      return part.text;
    case "data":
      return JSON.stringify(part.data);
    case "media":
      return `[media ${part.mimeType}]`;
    case "tool_call":
      return `[tool_call ${part.name} ${JSON.stringify(part.arguments)}]`;
  }
}

/** Plain-text rendering of messages, one per line, used for summarization prompts. */
export function renderTranscript(messages: readonly Message[]): string {
  return messages
    .map((message) => {
      const body = message.content.map(renderPart).join(" ");
      if (message.role === "tool_result") {
        const label = message.isError ? `tool_result(${message.name}, error)` : `tool_result(${message.name})`;
        return `${label}: ${body}`;
      }
      return `${message.role}: ${body}`;
    })
    .join("\n");
}
