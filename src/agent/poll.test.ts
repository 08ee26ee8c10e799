import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { pollUntil } from "./poll.js";
import { ConfigError, SessionCancelledError, TimeoutError } from "../infra/errors.js";

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe("pollUntil", () => {
  it("returns the first defined value", async () => {
    const check = vi.fn(async (attempt: number) => (attempt === 3 ? "ready" : undefined));
    const promise = pollUntil(check, { maxWaitMs: 10_000, initialDelayMs: 100, backoffFactor: 2 });
    await vi.advanceTimersByTimeAsync(300);
    await expect(promise).resolves.toBe("ready");
    expect(check).toHaveBeenCalledTimes(3);
  });

  it("backs off exponentially up to maxDelayMs", async () => {
    const times: number[] = [];
    const check = vi.fn(async () => {
      times.push(Date.now());
      return times.length === 5 ? true : undefined;
    });
    const start = Date.now();
    const promise = pollUntil(check, { maxWaitMs: 10_000, initialDelayMs: 100, maxDelayMs: 300 });
    await vi.advanceTimersByTimeAsync(1000);
    await expect(promise).resolves.toBe(true);
    expect(times.map((t) => t - start)).toEqual([0, 100, 300, 600, 900]);
  });

  it("treats falsy values other than undefined as results", async () => {
    await expect(pollUntil(async () => 0, { maxWaitMs: 100 })).resolves.toBe(0);
  });

  it("throws TimeoutError once maxWaitMs is spent", async () => {
    const check = vi.fn(async () => undefined);
    const promise = pollUntil(check, { maxWaitMs: 250, initialDelayMs: 100, maxDelayMs: 100 });
    const assertion = expect(promise).rejects.toThrow(
      new TimeoutError("condition not met within 250ms after 4 attempt(s)", 250),
    );
    await vi.advanceTimersByTimeAsync(250);
    await assertion;
    expect(check).toHaveBeenCalledTimes(4);
  });

  it("stops when the signal aborts", async () => {
    const controller = new AbortController();
    const promise = pollUntil(async () => undefined, {
      maxWaitMs: 10_000,
      initialDelayMs: 1000,
      signal: controller.signal,
    });
    const assertion = expect(promise).rejects.toBeInstanceOf(SessionCancelledError);
    await vi.advanceTimersByTimeAsync(10);
    controller.abort();
    await assertion;
  });

  it("rejects invalid options", async () => {
    await expect(pollUntil(async () => 1, { maxWaitMs: 0 })).rejects.toBeInstanceOf(ConfigError);
    await expect(pollUntil(async () => 1, { maxWaitMs: 10, backoffFactor: 0.5 })).rejects.toThrow(
      "backoffFactor must be at least 1, got 0.5",
    );
  });
});
