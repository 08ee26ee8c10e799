export type AppErrorOptions = {
  cause?: unknown;
};

export class AppError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = "AppError";
    this.code = code;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string) {
    super(message, "INVALID_STATE");
    this.name = "InvalidStateError";
  }
}

export class InvalidRangeError extends AppError {
  constructor(message: string) {
    super(message, "INVALID_RANGE");
    this.name = "InvalidRangeError";
  }
}

export class DuplicateToolError extends AppError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`tool already registered: ${toolName}`, "DUPLICATE_TOOL");
    this.name = "DuplicateToolError";
    this.toolName = toolName;
  }
}

export class UnknownToolError extends AppError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`unknown tool: ${toolName}`, "UNKNOWN_TOOL");
    this.name = "UnknownToolError";
    this.toolName = toolName;
  }
}

export class SchemaValidationError extends AppError {
  readonly toolName: string;
  readonly issues: readonly string[];

  constructor(toolName: string, issues: readonly string[]) {
    super(`invalid arguments for ${toolName}: ${issues.join("; ")}`, "SCHEMA_VALIDATION");
    this.name = "SchemaValidationError";
    this.toolName = toolName;
    this.issues = issues;
  }
}

export class ToolExecutionError extends AppError {
  readonly toolName: string;

  constructor(toolName: string, cause: unknown) {
    super(
      `tool ${toolName} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      "TOOL_EXECUTION",
      { cause },
    );
    this.name = "ToolExecutionError";
    this.toolName = toolName;
  }
}

export class TimeoutError extends AppError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, "TIMEOUT");
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class RetryableGatewayError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, "GATEWAY_RETRYABLE", options);
    this.name = "RetryableGatewayError";
  }
}

export class FatalGatewayError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, "GATEWAY_FATAL", options);
    this.name = "FatalGatewayError";
  }
}

export class ContextLengthExceededError extends AppError {
  constructor(message = "context length exceeded", options?: AppErrorOptions) {
    super(message, "CONTEXT_LENGTH_EXCEEDED", options);
    this.name = "ContextLengthExceededError";
  }
}

export class GatewayRetryExhaustedError extends AppError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(
      `gateway failed after ${attempts} attempt(s): ${cause instanceof Error ? cause.message : String(cause)}`,
      "GATEWAY_EXHAUSTED",
      { cause },
    );
    this.name = "GatewayRetryExhaustedError";
    this.attempts = attempts;
  }
}

export type FailureReason =
  | "max_turns_exceeded"
  | "deadline_exceeded"
  | "gateway_exhausted"
  | "gateway_fatal"
  | "context_exhausted";

export class AgentFailedError extends AppError {
  readonly reason: FailureReason;

  constructor(reason: FailureReason, message: string, options?: AppErrorOptions) {
    super(message, "AGENT_FAILED", options);
    this.name = "AgentFailedError";
    this.reason = reason;
  }
}

export class SessionCancelledError extends AppError {
  constructor(message = "session cancelled") {
    super(message, "SESSION_CANCELLED");
    this.name = "SessionCancelledError";
  }
}

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? err.message;
  }
  return String(err);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
