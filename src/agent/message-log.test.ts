import { describe, it, expect, beforeEach } from "vitest";
import { MessageLog } from "./message-log.js";
import { createAssistantMessage, createToolResultMessage, createUserMessage, textOf } from "./messages.js";
import { InvalidRangeError, InvalidStateError } from "../infra/errors.js";
import type { ToolCallPart } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toolCall(id: string, name = "calculator"): ToolCallPart {
  return { type: "tool_call", toolCallId: id, name, arguments: {} };
}

function result(id: string, payload = "ok") {
  return createToolResultMessage({ toolCallId: id, name: "calculator", payload });
}

let log: MessageLog;

beforeEach(() => {
  log = new MessageLog();
});

// ---------------------------------------------------------------------------
// append
// ---------------------------------------------------------------------------

describe("MessageLog.append", () => {
  it("keeps messages in order", () => {
    log.append(createUserMessage("one"));
    log.append(createAssistantMessage({ text: "two" }));
    expect(log.size).toBe(2);
    expect(log.snapshot().map(textOf)).toEqual(["one", "two"]);
  });

  it("accepts a result for an open tool call", () => {
    log.append(createAssistantMessage({ toolCalls: [toolCall("c1"), toolCall("c2")] }));
    expect(log.openToolCallIds()).toEqual(["c1", "c2"]);
    log.append(result("c2"));
    expect(log.openToolCallIds()).toEqual(["c1"]);
  });

  it("rejects a result with no matching call", () => {
    expect(() => log.append(result("nope"))).toThrow(new InvalidStateError("no open tool call for tool_result nope"));
  });

  it("rejects a second result for the same call", () => {
    log.append(createAssistantMessage({ toolCalls: [toolCall("c1")] }));
    log.append(result("c1"));
    expect(() => log.append(result("c1"))).toThrow(InvalidStateError);
  });

  it("rejects duplicate tool call ids", () => {
    log.append(createAssistantMessage({ toolCalls: [toolCall("c1")] }));
    expect(() => log.append(createAssistantMessage({ toolCalls: [toolCall("c1")] }))).toThrow(
      "duplicate tool call id c1",
    );
    expect(() => log.append(createAssistantMessage({ toolCalls: [toolCall("c9"), toolCall("c9")] }))).toThrow(
      "duplicate tool call id c9",
    );
    expect(log.size).toBe(1);
  });

  it("freezes appended messages", () => {
    log.append(createUserMessage("frozen"));
    const [message] = log.snapshot();
    expect(Object.isFrozen(message)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// snapshot
// ---------------------------------------------------------------------------

describe("MessageLog.snapshot", () => {
  it("is not affected by later appends", () => {
    log.append(createUserMessage("a"));
    const before = log.snapshot();
    log.append(createUserMessage("b"));
    expect(before).toHaveLength(1);
    expect(log.snapshot()).toHaveLength(2);
  });
});

// ---------------------------------------------------------------------------
// compact
// ---------------------------------------------------------------------------

describe("MessageLog.compact", () => {
  beforeEach(() => {
    log.append(createUserMessage("question"));
    log.append(createAssistantMessage({ toolCalls: [toolCall("c1")] }));
    log.append(result("c1"));
    log.append(createAssistantMessage({ text: "answer" }));
  });

  it("replaces a pair-preserving range with one synthetic summary", () => {
    log.compact({ start: 0, end: 2 }, createUserMessage("summary"));
    const messages = log.snapshot();
    expect(messages.map(textOf)).toEqual(["summary", "answer"]);
    expect(messages[0]?.synthetic).toBe(true);
    expect(log.hasToolCallId("c1")).toBe(false);
  });

  it("rejects a range that splits a call from its result", () => {
    expect(() => log.compact({ start: 0, end: 1 }, createUserMessage("s"))).toThrow(
      new InvalidRangeError("range [0, 1] splits tool call c1 from its result"),
    );
    expect(() => log.compact({ start: 2, end: 3 }, createUserMessage("s"))).toThrow(InvalidRangeError);
    expect(log.size).toBe(4);
  });

  it("rejects a range containing an unresolved call", () => {
    log.append(createAssistantMessage({ toolCalls: [toolCall("c2")] }));
    expect(() => log.compact({ start: 3, end: 4 }, createUserMessage("s"))).toThrow(
      "range [3, 4] contains unresolved tool call c2",
    );
  });

  it("rejects out-of-range and non-integer bounds", () => {
    expect(() => log.compact({ start: 0, end: 4 }, createUserMessage("s"))).toThrow(
      "range [0, 4] is outside the log (size 4)",
    );
    expect(() => log.compact({ start: 2, end: 1 }, createUserMessage("s"))).toThrow(InvalidRangeError);
    expect(() => log.compact({ start: 0.5, end: 1 }, createUserMessage("s"))).toThrow(
      "range bounds must be integers, got [0.5, 1]",
    );
  });

  it("rejects a summary that carries tool calls", () => {
    expect(() =>
      log.compact({ start: 0, end: 0 }, createAssistantMessage({ toolCalls: [toolCall("c5")] })),
    ).toThrow(InvalidStateError);
  });

  it("keeps indexing results after compaction", () => {
    log.compact({ start: 0, end: 2 }, createUserMessage("summary"));
    log.append(createAssistantMessage({ toolCalls: [toolCall("c3")] }));
    log.append(result("c3"));
    expect(log.openToolCallIds()).toEqual([]);
    expect(() => log.compact({ start: 1, end: 2 }, createUserMessage("s"))).toThrow(
      "range [1, 2] splits tool call c3 from its result",
    );
  });
});
