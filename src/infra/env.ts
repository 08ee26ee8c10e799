import { ConfigError } from "./errors.js";

export function optionalEnv(key: string, fallback?: string): string | undefined {
  const val = process.env[key];
  const trimmed = val?.trim();
  return trimmed ? trimmed : fallback;
}

export function optionalIntEnv(key: string): number | undefined {
  const raw = optionalEnv(key);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`Environment variable ${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}
