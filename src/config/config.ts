import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { DEFAULT_KEEP_RECENT } from "../agent/compaction.js";
import { DEFAULT_TOOL_CONCURRENCY, DEFAULT_TOOL_TIMEOUT_MS } from "../agent/dispatch.js";
import { DEFAULT_GATEWAY_RETRY } from "../agent/gateway-retry.js";
import { DEFAULT_MAX_TURNS } from "../agent/termination.js";
import { optionalEnv, optionalIntEnv } from "../infra/env.js";
import { ConfigError, errorMessage } from "../infra/errors.js";
import { ToolloopConfigSchema } from "./types.js";
import type { SessionSettings, ToolloopConfig } from "./types.js";

const CONFIG_FILENAMES = [
  "toolloop.config.yaml",
  "toolloop.config.yml",
  "toolloop.config.json",
];

const DEFAULT_GATEWAY_TIMEOUT_MS = 60_000;

function validateConfig(value: unknown, filepath: string): ToolloopConfig {
  if (value === null || value === undefined) {
    return {};
  }
  const parsed = ToolloopConfigSchema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => {
        const path = issue.path.map((segment) => String(segment)).join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join("; ");
    throw new ConfigError(`Invalid config file ${filepath}: ${detail}`, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Loads the first config file found in `dir` (default: TOOLLOOP_CONFIG_DIR,
 * then the working directory). No file means an empty config.
 */
export function loadConfig(dir?: string): ToolloopConfig {
  const baseDir = dir ?? optionalEnv("TOOLLOOP_CONFIG_DIR") ?? process.cwd();

  for (const filename of CONFIG_FILENAMES) {
    const filepath = resolve(baseDir, filename);
    if (!existsSync(filepath)) {
      continue;
    }
    let raw: string;
    try {
      raw = readFileSync(filepath, "utf-8");
    } catch (err) {
      throw new ConfigError(`Failed to read config file ${filepath}: ${errorMessage(err)}`, { cause: err });
    }
    let parsed: unknown;
    try {
      parsed = filename.endsWith(".json") ? JSON.parse(raw) : parseYaml(raw);
    } catch (err) {
      throw new ConfigError(`Failed to parse config file ${filepath}: ${errorMessage(err)}`, { cause: err });
    }
    return validateConfig(parsed, filepath);
  }

  return {};
}

/** Fills defaults. TOOLLOOP_MAX_TURNS and TOOLLOOP_TOOL_CONCURRENCY override the file. */
export function resolveSessionSettings(config: ToolloopConfig): SessionSettings {
  const maxTurns = optionalIntEnv("TOOLLOOP_MAX_TURNS") ?? config.agent?.maxTurns ?? DEFAULT_MAX_TURNS;
  const deadlineMs = config.agent?.deadlineMs;
  const retry = config.gateway?.retry;
  const initialBackoffMs = retry?.initialBackoffMs ?? DEFAULT_GATEWAY_RETRY.initialBackoffMs;
  const maxBackoffMs = retry?.maxBackoffMs ?? DEFAULT_GATEWAY_RETRY.maxBackoffMs;
  if (maxBackoffMs < initialBackoffMs) {
    throw new ConfigError(
      `gateway.retry.maxBackoffMs (${maxBackoffMs}) must not be below initialBackoffMs (${initialBackoffMs})`,
    );
  }

  return {
    policy: deadlineMs === undefined ? { maxTurns } : { maxTurns, deadlineMs },
    toolConcurrency:
      optionalIntEnv("TOOLLOOP_TOOL_CONCURRENCY") ?? config.tools?.concurrency ?? DEFAULT_TOOL_CONCURRENCY,
    toolTimeoutMs: config.tools?.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS,
    retry: {
      maxAttempts: retry?.maxAttempts ?? DEFAULT_GATEWAY_RETRY.maxAttempts,
      initialBackoffMs,
      maxBackoffMs,
      timeoutMs: config.gateway?.timeoutMs ?? DEFAULT_GATEWAY_TIMEOUT_MS,
    },
    keepRecent: config.compaction?.keepRecent ?? DEFAULT_KEEP_RECENT,
  };
}
