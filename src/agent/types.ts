export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

export type TextPart = {
  readonly type: "text";
  readonly text: string;
};

export type DataPart = {
  readonly type: "data";
  readonly data: JsonValue;
};

export type MediaPart = {
  readonly type: "media";
  readonly mimeType: string;
  /** base64-encoded bytes */
  readonly data: string;
};

export type ToolCallPart = {
  readonly type: "tool_call";
  readonly toolCallId: string;
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
};

/** Parts a tool may return and a tool_result message carries. */
export type OutputPart = TextPart | DataPart | MediaPart;

export type MessageRole = "user" | "assistant" | "tool_result";

type MessageBase = {
  readonly id: string;
  readonly timestamp: number;
  /** Set on messages produced by compaction. */
  readonly synthetic?: boolean;
};

export type UserMessage = MessageBase & {
  readonly role: "user";
  readonly content: readonly OutputPart[];
};

export type AssistantMessage = MessageBase & {
  readonly role: "assistant";
  readonly content: readonly (TextPart | ToolCallPart)[];
};

export type ToolResultMessage = MessageBase & {
  readonly role: "tool_result";
  readonly toolCallId: string;
  readonly name: string;
  readonly isError: boolean;
  readonly content: readonly OutputPart[];
};

export type Message = UserMessage | AssistantMessage | ToolResultMessage;

export type TokenUsage = {
  readonly inputTokens: number;
  readonly outputTokens: number;
};

/** What a tool's execute function may return; normalized to OutputPart[]. */
export type ToolResultPayload = string | OutputPart | readonly OutputPart[];

export type ToolContext = {
  readonly toolCallId: string;
  readonly toolName: string;
  /** Aborted on session cancellation or when the tool's timeout elapses. */
  readonly signal: AbortSignal;
};

export type FinalAnswer = {
  readonly text: string;
  readonly message: AssistantMessage;
  /** Number of model calls this submit made. */
  readonly turns: number;
  readonly usage: TokenUsage;
};

export type AgentState =
  | "idle"
  | "awaiting_model"
  | "dispatching_tools"
  | "done"
  | "failed"
  | "cancelled";
