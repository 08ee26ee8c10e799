import { ConfigError } from "../infra/errors.js";
import type { FailureReason } from "../infra/errors.js";

export const DEFAULT_MAX_TURNS = 25;

export type TerminationPolicy = {
  readonly maxTurns: number;
  /** Wall-clock budget for one submit, measured from its start. */
  readonly deadlineMs?: number;
};

export type TurnProgress = {
  /** Model calls already made in this submit. */
  readonly turnsTaken: number;
  readonly startedAt: number;
  readonly now: number;
};

export type TerminationVerdict = {
  readonly reason: Extract<FailureReason, "max_turns_exceeded" | "deadline_exceeded">;
  readonly message: string;
};

export function createTerminationPolicy(options: Partial<TerminationPolicy> = {}): TerminationPolicy {
  const maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
  if (!Number.isInteger(maxTurns) || maxTurns < 1) {
    throw new ConfigError(`maxTurns must be a positive integer, got ${maxTurns}`);
  }
  const { deadlineMs } = options;
  if (deadlineMs !== undefined && (!Number.isFinite(deadlineMs) || deadlineMs <= 0)) {
    throw new ConfigError(`deadlineMs must be a positive number, got ${deadlineMs}`);
  }
  return deadlineMs === undefined ? { maxTurns } : { maxTurns, deadlineMs };
}

/**
 * Checked on entry to awaiting_model. Returns undefined when another model
 * call is allowed, so the gateway is called at most `maxTurns` times.
 */
export function checkTermination(policy: TerminationPolicy, progress: TurnProgress): TerminationVerdict | undefined {
  if (progress.turnsTaken >= policy.maxTurns) {
    return {
      reason: "max_turns_exceeded",
      message: `max turns (${policy.maxTurns}) reached without a final answer`,
    };
  }
  if (policy.deadlineMs !== undefined && progress.now - progress.startedAt >= policy.deadlineMs) {
    return {
      reason: "deadline_exceeded",
      message: `deadline of ${policy.deadlineMs}ms exceeded`,
    };
  }
  return undefined;
}
