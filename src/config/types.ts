import { z } from "zod";

// --- Config file schema ---

const positiveInt = z.number().int().positive();

export const AgentConfigSchema = z.strictObject({
  maxTurns: positiveInt.optional(),
  deadlineMs: z.number().positive().optional(),
});

export const ToolsConfigSchema = z.strictObject({
  concurrency: positiveInt.optional(),
  timeoutMs: positiveInt.optional(),
});

export const RetryConfigSchema = z.strictObject({
  maxAttempts: positiveInt.optional(),
  initialBackoffMs: z.number().nonnegative().optional(),
  maxBackoffMs: z.number().nonnegative().optional(),
});

export const GatewayConfigSchema = z.strictObject({
  timeoutMs: positiveInt.optional(),
  retry: RetryConfigSchema.optional(),
});

export const CompactionConfigSchema = z.strictObject({
  keepRecent: z.number().int().nonnegative().optional(),
});

export const ToolloopConfigSchema = z.strictObject({
  agent: AgentConfigSchema.optional(),
  tools: ToolsConfigSchema.optional(),
  gateway: GatewayConfigSchema.optional(),
  compaction: CompactionConfigSchema.optional(),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type CompactionConfig = z.infer<typeof CompactionConfigSchema>;
export type ToolloopConfig = z.infer<typeof ToolloopConfigSchema>;

// --- Resolved settings ---

/** Every limit filled in; spreads straight into createSession options. */
export type SessionSettings = {
  policy: { maxTurns: number; deadlineMs?: number };
  toolConcurrency: number;
  toolTimeoutMs: number;
  retry: { maxAttempts: number; initialBackoffMs: number; maxBackoffMs: number; timeoutMs: number };
  keepRecent: number;
};
