import { InvalidRangeError, InvalidStateError } from "../infra/errors.js";
import { toolCallsOf } from "./messages.js";
import type { Message } from "./types.js";

export type LogRange = {
  /** inclusive */
  readonly start: number;
  /** inclusive */
  readonly end: number;
};

type CallPosition = {
  callIndex: number;
  resultIndex?: number;
};

function freezeMessage(message: Message): Message {
  Object.freeze(message.content);
  return Object.freeze(message);
}

function indexToolCalls(messages: readonly Message[]): Map<string, CallPosition> {
  const positions = new Map<string, CallPosition>();
  messages.forEach((message, index) => {
    for (const call of toolCallsOf(message)) {
      positions.set(call.toolCallId, { callIndex: index });
    }
    if (message.role === "tool_result") {
      const position = positions.get(message.toolCallId);
      if (position) {
        position.resultIndex = index;
      }
    }
  });
  return positions;
}

/**
 * Ordered record of one conversation. Append-only, except for `compact`,
 * which swaps a pair-preserving range for a single summary message.
 */
export class MessageLog {
  private messages: Message[] = [];
  /** tool call id -> position of its call and (once appended) its result */
  private calls = new Map<string, CallPosition>();

  get size(): number {
    return this.messages.length;
  }

  append(message: Message): void {
    if (message.role === "tool_result") {
      const position = this.calls.get(message.toolCallId);
      if (!position || position.resultIndex !== undefined) {
        throw new InvalidStateError(`no open tool call for tool_result ${message.toolCallId}`);
      }
      position.resultIndex = this.messages.length;
    }

    const toolCalls = toolCallsOf(message);
    const seen = new Set<string>();
    for (const call of toolCalls) {
      if (this.calls.has(call.toolCallId) || seen.has(call.toolCallId)) {
        throw new InvalidStateError(`duplicate tool call id ${call.toolCallId}`);
      }
      seen.add(call.toolCallId);
    }
    for (const call of toolCalls) {
      this.calls.set(call.toolCallId, { callIndex: this.messages.length });
    }

    this.messages.push(freezeMessage(message));
  }

  /** Point-in-time copy; later appends and compactions do not affect it. */
  snapshot(): readonly Message[] {
    return Object.freeze([...this.messages]);
  }

  hasToolCallId(id: string): boolean {
    return this.calls.has(id);
  }

  openToolCallIds(): string[] {
    const open: string[] = [];
    for (const [id, position] of this.calls) {
      if (position.resultIndex === undefined) {
        open.push(id);
      }
    }
    return open;
  }

  compact(range: LogRange, summary: Message): void {
    const { start, end } = range;
    if (!Number.isInteger(start) || !Number.isInteger(end)) {
      throw new InvalidRangeError(`range bounds must be integers, got [${start}, ${end}]`);
    }
    if (start < 0 || end < start || end >= this.messages.length) {
      throw new InvalidRangeError(
        `range [${start}, ${end}] is outside the log (size ${this.messages.length})`,
      );
    }
    if (summary.role === "tool_result" || toolCallsOf(summary).length > 0) {
      throw new InvalidStateError("a summary message cannot carry tool calls or tool results");
    }

    const inRange = (index: number | undefined) => index !== undefined && index >= start && index <= end;
    for (const [id, position] of this.calls) {
      const callInside = inRange(position.callIndex);
      const resultInside = inRange(position.resultIndex);
      if (callInside && position.resultIndex === undefined) {
        throw new InvalidRangeError(`range [${start}, ${end}] contains unresolved tool call ${id}`);
      }
      if (callInside !== resultInside) {
        throw new InvalidRangeError(`range [${start}, ${end}] splits tool call ${id} from its result`);
      }
    }

    const next = [...this.messages];
    next.splice(start, end - start + 1, freezeMessage({ ...summary, synthetic: true }));
    this.messages = next;
    this.calls = indexToolCalls(next);
  }
}
