import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { ToolRegistry, createToolRegistry, defineTool } from "./tool-registry.js";
import {
  ConfigError,
  DuplicateToolError,
  InvalidStateError,
  SchemaValidationError,
  ToolExecutionError,
  UnknownToolError,
} from "../infra/errors.js";
import { MessageLog } from "./message-log.js";
import { createAssistantMessage, createToolResultMessage } from "./messages.js";
import type { ToolContext } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const echoTool = defineTool({
  name: "echo",
  description: "Echo the input back",
  inputSchema: z.object({ text: z.string(), times: z.number().int().positive().default(1) }),
  async execute({ text, times }) {
    return text.repeat(times);
  },
});

function context(): ToolContext {
  return { toolCallId: "c1", toolName: "echo", signal: new AbortController().signal };
}

// ---------------------------------------------------------------------------
// register
// ---------------------------------------------------------------------------

describe("ToolRegistry.register", () => {
  it("exposes metadata with a JSON Schema and no execute", () => {
    const registry = createToolRegistry([echoTool]);
    const [metadata] = registry.metadata();
    expect(metadata?.name).toBe("echo");
    expect(metadata?.description).toBe("Echo the input back");
    expect(metadata?.inputSchema).toMatchObject({
      type: "object",
      properties: { text: { type: "string" } },
      required: ["text"],
    });
    expect(metadata?.inputSchema).not.toHaveProperty("$schema");
    expect(metadata).not.toHaveProperty("execute");
  });

  it("rejects duplicate names", () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);
    expect(() => registry.register(echoTool)).toThrow(new DuplicateToolError("echo"));
    expect(() => registry.register(echoTool)).toThrow("tool already registered: echo");
  });

  it("rejects invalid names", () => {
    const registry = new ToolRegistry();
    expect(() => registry.register({ ...echoTool, name: "has space" })).toThrow(ConfigError);
    expect(() => registry.register({ ...echoTool, name: "" })).toThrow(ConfigError);
  });

  it("rejects schemas with no JSON Schema form", () => {
    const registry = new ToolRegistry();
    const tool = defineTool({
      name: "dated",
      description: "takes a date",
      inputSchema: z.object({ when: z.date() }),
      async execute() {
        return "ok";
      },
    });
    expect(() => registry.register(tool)).toThrow(ConfigError);
    expect(registry.has("dated")).toBe(false);
  });

  it("refuses registration once sealed", () => {
    const registry = createToolRegistry([]);
    expect(registry.isSealed).toBe(true);
    expect(() => registry.register(echoTool)).toThrow(InvalidStateError);
  });
});

// ---------------------------------------------------------------------------
// resolve
// ---------------------------------------------------------------------------

describe("ToolRegistry.resolve", () => {
  const registry = createToolRegistry([echoTool]);

  it("returns validated arguments with defaults applied", () => {
    const bound = registry.resolve("echo", { text: "hi" });
    expect(bound.name).toBe("echo");
    expect(bound.arguments).toEqual({ text: "hi", times: 1 });
    expect(bound.definition).toBe(echoTool);
  });

  it("throws UnknownToolError for unregistered names", () => {
    expect(() => registry.resolve("missing", {})).toThrow(new UnknownToolError("missing"));
  });

  it("throws SchemaValidationError naming the failing fields", () => {
    let caught: unknown;
    try {
      registry.resolve("echo", { times: 0 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SchemaValidationError);
    if (caught instanceof SchemaValidationError) {
      expect(caught.toolName).toBe("echo");
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0]).toMatch(/^text: /);
      expect(caught.issues[1]).toMatch(/^times: /);
      expect(caught.message).toMatch(/^invalid arguments for echo: text: .+; times: /);
    }
  });
});

// ---------------------------------------------------------------------------
// execute
// ---------------------------------------------------------------------------

describe("ToolRegistry.execute", () => {
  it("runs the tool with its validated arguments and context", async () => {
    const execute = vi.fn(async (args: { n: number }, ctx: ToolContext) => `${args.n}:${ctx.toolCallId}`);
    const registry = createToolRegistry([
      defineTool({ name: "num", description: "n", inputSchema: z.object({ n: z.number() }), execute }),
    ]);
    const output = await registry.execute(registry.resolve("num", { n: 3 }), context());
    expect(output).toBe("3:c1");
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it("wraps thrown errors in ToolExecutionError", async () => {
    const registry = createToolRegistry([
      defineTool({
        name: "boom",
        description: "always fails",
        inputSchema: z.object({}),
        async execute() {
          throw new Error("kaboom");
        },
      }),
    ]);
    const call = registry.resolve("boom", {});
    await expect(registry.execute(call, context())).rejects.toThrow(new ToolExecutionError("boom", new Error("kaboom")));
    await expect(registry.execute(call, context())).rejects.toThrow("tool boom failed: kaboom");
  });

  it("executing one bound call twice still leaves one result in the log", async () => {
    const execute = vi.fn(async ({ text }: { text: string }) => text.toUpperCase());
    const registry = createToolRegistry([
      defineTool({ name: "shout", description: "s", inputSchema: z.object({ text: z.string() }), execute }),
    ]);
    const log = new MessageLog();
    log.append(
      createAssistantMessage({
        toolCalls: [{ type: "tool_call", toolCallId: "c1", name: "shout", arguments: { text: "hi" } }],
      }),
    );

    const call = registry.resolve("shout", { text: "hi" });
    const first = await registry.execute(call, context());
    const second = await registry.execute(call, context());
    expect([first, second]).toEqual(["HI", "HI"]);
    expect(execute).toHaveBeenCalledTimes(2);

    log.append(createToolResultMessage({ toolCallId: "c1", name: "shout", payload: first }));
    expect(() => log.append(createToolResultMessage({ toolCallId: "c1", name: "shout", payload: second }))).toThrow(
      new InvalidStateError("no open tool call for tool_result c1"),
    );
    expect(log.snapshot().map((m) => m.role)).toEqual(["assistant", "tool_result"]);
  });
});
