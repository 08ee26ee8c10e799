export { createSession } from "./agent/session.js";
export type { Session, SessionOptions, SubmitOptions } from "./agent/session.js";

export { MessageLog } from "./agent/message-log.js";
export type { LogRange } from "./agent/message-log.js";
export {
  createAssistantMessage,
  createToolResultMessage,
  createUserMessage,
  renderTranscript,
  textOf,
  toolCallsOf,
} from "./agent/messages.js";

export { ToolRegistry, createToolRegistry, defineTool } from "./agent/tool-registry.js";
export type { BoundToolCall, ToolDefinition, ToolMetadata } from "./agent/tool-registry.js";
export { calculatorTool, evaluateExpression } from "./agent/calculator-tool.js";
export { createFileTools } from "./agent/file-tools.js";
export type { FileToolsOptions } from "./agent/file-tools.js";

export { GatewayResponseSchema, normalizeArguments, parseGatewayResponse } from "./agent/gateway.js";
export type { GatewayResponse, GatewaySendOptions, ModelGateway, ToolCallRequest } from "./agent/gateway.js";
export { DEFAULT_GATEWAY_RETRY, backoffDelay, withGatewayRetry } from "./agent/gateway-retry.js";
export type { GatewayRetryOptions } from "./agent/gateway-retry.js";

export { DEFAULT_MAX_TURNS, checkTermination, createTerminationPolicy } from "./agent/termination.js";
export type { TerminationPolicy, TerminationVerdict } from "./agent/termination.js";
export { DEFAULT_KEEP_RECENT, createGatewaySummarizer, createSummaryMessage, planCompaction } from "./agent/compaction.js";
export type { Summarizer } from "./agent/compaction.js";
export { pollUntil } from "./agent/poll.js";
export type { PollOptions } from "./agent/poll.js";

export type {
  AgentState,
  AssistantMessage,
  DataPart,
  FinalAnswer,
  JsonValue,
  MediaPart,
  Message,
  MessageRole,
  OutputPart,
  TextPart,
  TokenUsage,
  ToolCallPart,
  ToolContext,
  ToolResultMessage,
  ToolResultPayload,
  UserMessage,
} from "./agent/types.js";

export { loadConfig, resolveSessionSettings } from "./config/config.js";
export type { SessionSettings, ToolloopConfig } from "./config/types.js";

export * from "./infra/errors.js";
export { createLogger, logger } from "./logging.js";
