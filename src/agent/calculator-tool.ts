import { z } from "zod";
import { defineTool } from "./tool-registry.js";

type Token =
  | { kind: "number"; value: number; position: number }
  | { kind: "op"; value: string; position: number };

const OPERATORS = new Set(["+", "-", "*", "/", "%", "^", "(", ")"]);

function tokenize(expr: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;
  while (index < expr.length) {
    const char = expr.charAt(index);
    if (/\s/.test(char)) {
      index++;
      continue;
    }
    if (OPERATORS.has(char)) {
      tokens.push({ kind: "op", value: char, position: index });
      index++;
      continue;
    }
    const match = /^(\d+\.?\d*|\.\d+)/.exec(expr.slice(index));
    if (!match) {
      throw new Error(`unexpected character "${char}" at position ${index}`);
    }
    tokens.push({ kind: "number", value: Number(match[0]), position: index });
    index += match[0].length;
  }
  return tokens;
}

/**
 * Recursive-descent evaluation of `+ - * / % ^` with parentheses and unary
 * signs. `^` binds tighter than unary minus and associates to the right.
 */
export function evaluateExpression(expr: string): number {
  const tokens = tokenize(expr);
  let pos = 0;

  const peekOp = (): string | undefined => {
    const token = tokens[pos];
    return token?.kind === "op" ? token.value : undefined;
  };

  function parseExpression(): number {
    let value = parseTerm();
    for (let op = peekOp(); op === "+" || op === "-"; op = peekOp()) {
      pos++;
      const right = parseTerm();
      value = op === "+" ? value + right : value - right;
    }
    return value;
  }

  function parseTerm(): number {
    let value = parseUnary();
    for (let op = peekOp(); op === "*" || op === "/" || op === "%"; op = peekOp()) {
      pos++;
      const right = parseUnary();
      if (op === "*") {
        value *= right;
      } else if (right === 0) {
        throw new Error("division by zero");
      } else {
        value = op === "/" ? value / right : value % right;
      }
    }
    return value;
  }

  function parseUnary(): number {
    const op = peekOp();
    if (op === "-" || op === "+") {
      pos++;
      const operand = parseUnary();
      return op === "-" ? -operand : operand;
    }
    return parsePower();
  }

  function parsePower(): number {
    const base = parsePrimary();
    if (peekOp() === "^") {
      pos++;
      return Math.pow(base, parseUnary());
    }
    return base;
  }

  function parsePrimary(): number {
    const token = tokens[pos];
    if (!token) {
      throw new Error("unexpected end of expression");
    }
    pos++;
    if (token.kind === "number") {
      return token.value;
    }
    if (token.value === "(") {
      const value = parseExpression();
      if (peekOp() !== ")") {
        throw new Error(`missing ")" for "(" at position ${token.position}`);
      }
      pos++;
      return value;
    }
    throw new Error(`unexpected "${token.value}" at position ${token.position}`);
  }

  const result = parseExpression();
  const trailing = tokens[pos];
  if (trailing) {
    throw new Error(`unexpected "${String(trailing.value)}" at position ${trailing.position}`);
  }
  if (!Number.isFinite(result)) {
    throw new Error("result is not a finite number");
  }
  return result;
}

export const calculatorTool = defineTool({
  name: "calculator",
  description: "Evaluate an arithmetic expression using + - * / % ^ and parentheses. Returns the numeric result.",
  inputSchema: z.object({
    expr: z.string().min(1).describe("The expression to evaluate, e.g. (2 + 3) * 4"),
  }),
  async execute({ expr }) {
    return String(evaluateExpression(expr));
  },
});
