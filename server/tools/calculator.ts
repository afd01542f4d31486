/**
 * Calculator Tool
 *
 * Evaluates arithmetic without eval(): + - * / % ^, parentheses, unary
 * signs and decimal numbers. Precedence, lowest first:
 *   additive (+ -) < multiplicative (* / %) < unary (+ -) < power (^, right-assoc)
 */

import { z } from "zod";
import { ValidationError } from "../utils/errorHandler";
import { defineTool } from "./types";

type Operator = "+" | "-" | "*" | "/" | "%" | "^";

type Token =
  | { kind: "number"; value: number; position: number }
  | { kind: "operator"; value: Operator; position: number }
  | { kind: "paren"; value: "(" | ")"; position: number };

const OPERATORS: readonly string[] = ["+", "-", "*", "/", "%", "^"];

function isOperator(char: string): char is Operator {
  return OPERATORS.includes(char);
}

export function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expression.length) {
    const char = expression[i];

    if (/\s/.test(char) || char === ",") {
      // thousands separators are tolerated: "22,000" reads as 22000
      i++;
      continue;
    }

    if (/[0-9.]/.test(char)) {
      const start = i;
      while (i < expression.length && /[0-9.,]/.test(expression[i])) i++;
      const literal = expression.slice(start, i).replace(/,/g, "");
      if (!/^(\d+\.?\d*|\.\d+)$/.test(literal)) {
        throw new ValidationError(`Invalid number "${literal}" at position ${start}`);
      }
      tokens.push({ kind: "number", value: Number(literal), position: start });
      continue;
    }

    if (isOperator(char)) {
      tokens.push({ kind: "operator", value: char, position: i });
      i++;
      continue;
    }

    if (char === "(" || char === ")") {
      tokens.push({ kind: "paren", value: char, position: i });
      i++;
      continue;
    }

    throw new ValidationError(`Unexpected character "${char}" at position ${i}`);
  }

  return tokens;
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new ValidationError("Expression is empty");
    }
    const value = this.parseAdditive();
    const trailing = this.peek();
    if (trailing) {
      throw new ValidationError(`Unexpected "${trailing.value}" at position ${trailing.position}`);
    }
    return value;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private matchOperator(...operators: Operator[]): Operator | null {
    const token = this.peek();
    if (token?.kind === "operator" && operators.includes(token.value)) {
      this.index++;
      return token.value;
    }
    return null;
  }

  private parseAdditive(): number {
    let value = this.parseMultiplicative();
    let op = this.matchOperator("+", "-");
    while (op) {
      const right = this.parseMultiplicative();
      value = op === "+" ? value + right : value - right;
      op = this.matchOperator("+", "-");
    }
    return value;
  }

  private parseMultiplicative(): number {
    let value = this.parseUnary();
    let op = this.matchOperator("*", "/", "%");
    while (op) {
      const right = this.parseUnary();
      if ((op === "/" || op === "%") && right === 0) {
        throw new ValidationError("Division by zero");
      }
      if (op === "*") value = value * right;
      else if (op === "/") value = value / right;
      else value = value % right;
      op = this.matchOperator("*", "/", "%");
    }
    return value;
  }

  private parseUnary(): number {
    const op = this.matchOperator("+", "-");
    if (op) {
      const operand = this.parseUnary();
      return op === "-" ? -operand : operand;
    }
    return this.parsePower();
  }

  private parsePower(): number {
    const base = this.parsePrimary();
    if (this.matchOperator("^")) {
      const exponent = this.parseUnary();
      return Math.pow(base, exponent);
    }
    return base;
  }

  private parsePrimary(): number {
    const token = this.peek();
    if (!token) {
      throw new ValidationError("Unexpected end of expression");
    }

    if (token.kind === "number") {
      this.index++;
      return token.value;
    }

    if (token.kind === "paren" && token.value === "(") {
      this.index++;
      const value = this.parseAdditive();
      const closing = this.peek();
      if (closing?.kind !== "paren" || closing.value !== ")") {
        throw new ValidationError(`Missing ")" for "(" at position ${token.position}`);
      }
      this.index++;
      return value;
    }

    throw new ValidationError(`Unexpected "${token.value}" at position ${token.position}`);
  }
}

export function evaluateExpression(expression: string): number {
  const result = new Parser(tokenize(expression)).parse();
  if (!Number.isFinite(result)) {
    throw new ValidationError(`Expression "${expression}" does not evaluate to a finite number`);
  }
  return result;
}

export const calculatorTool = defineTool({
  name: "calculator",
  description:
    "Evaluate an arithmetic expression. Supports + - * / % ^ and parentheses, e.g. \"(22000 + 15750) * 0.1\".",
  parameters: z.object({
    expression: z.string().min(1).describe("The arithmetic expression to evaluate"),
  }),
  execute: async ({ expression }) => {
    const result = evaluateExpression(expression);
    return `${expression} = ${result}`;
  },
});
