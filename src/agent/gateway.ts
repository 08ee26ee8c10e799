import { z } from "zod";
import { FatalGatewayError } from "../infra/errors.js";
import type { ToolMetadata } from "./tool-registry.js";
import type { Message } from "./types.js";

const TokenUsageSchema = z.object({
  inputTokens: z.number().nonnegative(),
  outputTokens: z.number().nonnegative(),
});

export const ToolCallRequestSchema = z.object({
  /** Gateways that do not assign ids may omit this; the loop assigns one. */
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  /** A JSON object, or a string holding one. Anything else is fed back as an error. */
  arguments: z.unknown(),
});

export type ToolCallRequest = z.infer<typeof ToolCallRequestSchema>;

export const GatewayResponseSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("final"),
    text: z.string(),
    usage: TokenUsageSchema.optional(),
  }),
  z.object({
    type: z.literal("tool_calls"),
    calls: z.array(ToolCallRequestSchema).min(1),
    text: z.string().optional(),
    usage: TokenUsageSchema.optional(),
  }),
]);

export type GatewayResponse = z.infer<typeof GatewayResponseSchema>;

export type GatewaySendOptions = {
  readonly signal: AbortSignal;
};

/**
 * The model backend as the loop sees it. Implementations translate the
 * conversation into a vendor request and classify failures as
 * RetryableGatewayError, FatalGatewayError or ContextLengthExceededError.
 */
export type ModelGateway = {
  send: (
    messages: readonly Message[],
    tools: readonly ToolMetadata[],
    options: GatewaySendOptions,
  ) => Promise<GatewayResponse>;
};

export function parseGatewayResponse(value: unknown): GatewayResponse {
  const parsed = GatewayResponseSchema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.map((segment) => String(segment)).join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new FatalGatewayError(`malformed gateway response: ${detail}`, { cause: parsed.error });
  }
  return parsed.data;
}

export type NormalizedArguments =
  | { readonly ok: true; readonly value: Record<string, unknown> }
  | { readonly ok: false; readonly reason: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Tool call arguments as a string-keyed object; absent arguments mean `{}`. */
export function normalizeArguments(raw: unknown): NormalizedArguments {
  if (raw === undefined || raw === null) {
    return { ok: true, value: {} };
  }
  if (typeof raw === "string") {
    if (raw.trim() === "") {
      return { ok: true, value: {} };
    }
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      return { ok: false, reason: "arguments are not valid JSON" };
    }
    return isPlainObject(decoded)
      ? { ok: true, value: decoded }
      : { ok: false, reason: "arguments must be a JSON object" };
  }
  return isPlainObject(raw) ? { ok: true, value: raw } : { ok: false, reason: "arguments must be a JSON object" };
}
