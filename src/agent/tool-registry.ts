import { z } from "zod";
import {
  ConfigError,
  DuplicateToolError,
  InvalidStateError,
  SchemaValidationError,
  ToolExecutionError,
  UnknownToolError,
  errorMessage,
} from "../infra/errors.js";
import type { ToolContext, ToolResultPayload } from "./types.js";

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

export type ToolDefinition<TSchema extends z.ZodType = z.ZodType> = {
  readonly name: string;
  /** Shown to the model as-is. */
  readonly description: string;
  readonly inputSchema: TSchema;
  execute(args: z.output<TSchema>, context: ToolContext): Promise<ToolResultPayload>;
};

/** The part of a tool the model gateway sees. Never includes `execute`. */
export type ToolMetadata = {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Readonly<Record<string, unknown>>;
};

export type BoundToolCall = {
  readonly name: string;
  readonly arguments: unknown;
  readonly definition: ToolDefinition;
};

export function defineTool<TSchema extends z.ZodType>(
  definition: ToolDefinition<TSchema>,
): ToolDefinition<TSchema> {
  return definition;
}

function toJsonSchema(definition: ToolDefinition): Record<string, unknown> {
  try {
    const { $schema: _ignored, ...schema } = z.toJSONSchema(definition.inputSchema, { io: "input" });
    return schema;
  } catch (err) {
    throw new ConfigError(
      `tool ${definition.name} has an input schema with no JSON Schema form: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map((segment) => String(segment)).join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export class ToolRegistry {
  private readonly tools = new Map<string, { definition: ToolDefinition; metadata: ToolMetadata }>();
  private sealed = false;

  register<TSchema extends z.ZodType>(definition: ToolDefinition<TSchema>): void {
    if (this.sealed) {
      throw new InvalidStateError(`registry is sealed; cannot register ${definition.name}`);
    }
    if (!TOOL_NAME_PATTERN.test(definition.name)) {
      throw new ConfigError(`invalid tool name "${definition.name}": expected ${TOOL_NAME_PATTERN}`);
    }
    if (this.tools.has(definition.name)) {
      throw new DuplicateToolError(definition.name);
    }
    const metadata: ToolMetadata = Object.freeze({
      name: definition.name,
      description: definition.description,
      inputSchema: Object.freeze(toJsonSchema(definition)),
    });
    this.tools.set(definition.name, { definition, metadata });
  }

  /** Makes the registry read-only. Idempotent. */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  metadata(): ToolMetadata[] {
    return [...this.tools.values()].map((entry) => entry.metadata);
  }

  /**
   * Validates `args` against the tool's input schema.
   * Throws UnknownToolError or SchemaValidationError.
   */
  resolve(name: string, args: unknown): BoundToolCall {
    const entry = this.tools.get(name);
    if (!entry) {
      throw new UnknownToolError(name);
    }
    const parsed = entry.definition.inputSchema.safeParse(args);
    if (!parsed.success) {
      throw new SchemaValidationError(name, formatIssues(parsed.error));
    }
    return Object.freeze({ name, arguments: parsed.data, definition: entry.definition });
  }

  async execute(call: BoundToolCall, context: ToolContext): Promise<ToolResultPayload> {
    try {
      return await call.definition.execute(call.arguments, context);
    } catch (err) {
      if (err instanceof ToolExecutionError) {
        throw err;
      }
      throw new ToolExecutionError(call.name, err);
    }
  }
}

/** Registers every tool and seals the registry. Duplicate names fail here. */
export function createToolRegistry(tools: readonly ToolDefinition[]): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of tools) {
    registry.register(tool);
  }
  registry.seal();
  return registry;
}
