import { LoomError, ERR } from "../core/errors.js";

// Placeholder expressions may come from model output fed back into later prompts,
// so the grammar is closed: literals, names, indexing, arithmetic. No calls, no attributes.

export type BinaryOp = "+" | "-" | "*" | "/" | "//" | "%" | "**";

export type Expr =
  | { kind: "literal"; value: string | number | boolean | null }
  | { kind: "name"; name: string }
  | { kind: "index"; target: Expr; key: Expr }
  | { kind: "unary"; op: "+" | "-"; operand: Expr }
  | { kind: "binary"; op: BinaryOp; left: Expr; right: Expr };

type Token =
  | { type: "number"; value: number; pos: number }
  | { type: "string"; value: string; pos: number }
  | { type: "ident"; value: string; pos: number }
  | { type: "punct"; value: string; pos: number }
  | { type: "eof"; pos: number };

export type ExpressionScope = {
  has(name: string): boolean;
  get(name: string): unknown;
};

const PUNCT_2 = ["**", "//"];
const PUNCT_1 = "+-*/%()[]";
const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r", "\\": "\\", "'": "'", '"': '"' };

function syntaxError(message: string, source: string, pos: number): LoomError {
  return new LoomError(ERR.EXPRESSION_SYNTAX, message, { source, pos });
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (/[0-9]/.test(ch) || (ch === "." && /[0-9]/.test(source[i + 1] ?? ""))) {
      const m = /^(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?/.exec(source.slice(i));
      if (!m) throw syntaxError("malformed number", source, i);
      tokens.push({ type: "number", value: Number(m[0]), pos: i });
      i += m[0].length;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const start = i;
      let value = "";
      i++;
      while (i < source.length && source[i] !== ch) {
        if (source[i] === "\\") {
          const next = source[i + 1];
          if (next === undefined) break;
          value += ESCAPES[next] ?? next;
          i += 2;
          continue;
        }
        value += source[i];
        i++;
      }
      if (source[i] !== ch) throw syntaxError("unterminated string", source, start);
      i++;
      tokens.push({ type: "string", value, pos: start });
      continue;
    }

    if (/[\p{L}_]/u.test(ch)) {
      const m = /^[\p{L}_][\p{L}\p{M}\p{N}_]*/u.exec(source.slice(i));
      if (!m) throw syntaxError("malformed identifier", source, i);
      tokens.push({ type: "ident", value: m[0], pos: i });
      i += m[0].length;
      continue;
    }

    const two = source.slice(i, i + 2);
    if (PUNCT_2.includes(two)) {
      tokens.push({ type: "punct", value: two, pos: i });
      i += 2;
      continue;
    }
    if (PUNCT_1.includes(ch)) {
      tokens.push({ type: "punct", value: ch, pos: i });
      i++;
      continue;
    }

    throw syntaxError(`unexpected character '${ch}'`, source, i);
  }

  tokens.push({ type: "eof", pos: source.length });
  return tokens;
}

class Parser {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
  ) {}

  parse(): Expr {
    const expr = this.additive();
    const tok = this.peek();
    if (tok.type !== "eof") throw syntaxError("unexpected trailing input", this.source, tok.pos);
    return expr;
  }

  private peek(): Token {
    return this.tokens[this.pos] ?? { type: "eof", pos: this.source.length };
  }

  private next(): Token {
    const tok = this.peek();
    this.pos++;
    return tok;
  }

  private matchPunct(...values: string[]): string | null {
    const tok = this.peek();
    if (tok.type === "punct" && values.includes(tok.value)) {
      this.pos++;
      return tok.value;
    }
    return null;
  }

  private expectPunct(value: string): void {
    const tok = this.next();
    if (tok.type !== "punct" || tok.value !== value) {
      throw syntaxError(`expected '${value}'`, this.source, tok.pos);
    }
  }

  private additive(): Expr {
    let left = this.multiplicative();
    for (let op = this.matchPunct("+", "-"); op; op = this.matchPunct("+", "-")) {
      left = { kind: "binary", op: op === "+" ? "+" : "-", left, right: this.multiplicative() };
    }
    return left;
  }

  private multiplicative(): Expr {
    let left = this.unary();
    for (let op = this.matchPunct("*", "/", "//", "%"); op; op = this.matchPunct("*", "/", "//", "%")) {
      left = { kind: "binary", op: toMulOp(op), left, right: this.unary() };
    }
    return left;
  }

  private unary(): Expr {
    const op = this.matchPunct("+", "-");
    if (op === "+" || op === "-") return { kind: "unary", op, operand: this.unary() };
    return this.power();
  }

  // right-associative, binds tighter than unary minus on its left: -2 ** 2 == -4
  private power(): Expr {
    const base = this.postfix();
    if (this.matchPunct("**")) return { kind: "binary", op: "**", left: base, right: this.unary() };
    return base;
  }

  private postfix(): Expr {
    let expr = this.primary();
    while (this.matchPunct("[")) {
      const key = this.additive();
      this.expectPunct("]");
      expr = { kind: "index", target: expr, key };
    }
    return expr;
  }

  private primary(): Expr {
    const tok = this.next();
    switch (tok.type) {
      case "number":
      case "string":
        return { kind: "literal", value: tok.value };
      case "ident":
        if (tok.value === "true") return { kind: "literal", value: true };
        if (tok.value === "false") return { kind: "literal", value: false };
        if (tok.value === "null") return { kind: "literal", value: null };
        return { kind: "name", name: tok.value };
      case "punct":
        if (tok.value === "(") {
          const inner = this.additive();
          this.expectPunct(")");
          return inner;
        }
        throw syntaxError(`unexpected '${tok.value}'`, this.source, tok.pos);
      case "eof":
        throw syntaxError("unexpected end of expression", this.source, tok.pos);
    }
  }
}

function toMulOp(op: string): BinaryOp {
  switch (op) {
    case "*":
    case "/":
    case "//":
    case "%":
      return op;
    default:
      throw new LoomError(ERR.EXPRESSION_SYNTAX, `not a multiplicative operator: ${op}`);
  }
}

export function parseExpression(source: string): Expr {
  return new Parser(source, tokenize(source)).parse();
}

function evalError(message: string, details?: unknown): LoomError {
  return new LoomError(ERR.EXPRESSION_EVAL, message, details);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireNumber(value: unknown, op: string): number {
  if (typeof value !== "number") throw evalError(`operator '${op}' expects numbers`, { value });
  return value;
}

function indexInto(target: unknown, key: unknown): unknown {
  if (Array.isArray(target) || typeof target === "string") {
    if (typeof key !== "number" || !Number.isInteger(key)) throw evalError("index must be an integer", { key });
    const i = key < 0 ? target.length + key : key;
    if (i < 0 || i >= target.length) throw evalError("index out of range", { key, length: target.length });
    return target[i];
  }
  if (isRecord(target)) {
    if (typeof key !== "string") throw evalError("key must be a string", { key });
    if (!Object.hasOwn(target, key)) throw evalError(`missing key '${key}'`);
    return target[key];
  }
  throw evalError("value is not indexable", { key });
}

function applyBinary(op: BinaryOp, left: unknown, right: unknown): number | string {
  if (op === "+") {
    if (typeof left === "number" && typeof right === "number") return left + right;
    if (typeof left === "string" && typeof right === "string") return left + right;
    throw evalError("operator '+' expects two numbers or two strings");
  }

  const a = requireNumber(left, op);
  const b = requireNumber(right, op);
  switch (op) {
    case "-":
      return a - b;
    case "*":
      return a * b;
    case "**":
      return a ** b;
    case "/":
      if (b === 0) throw evalError("division by zero");
      return a / b;
    case "//":
      if (b === 0) throw evalError("division by zero");
      return Math.floor(a / b);
    case "%":
      if (b === 0) throw evalError("modulo by zero");
      // result takes the divisor's sign
      return a - b * Math.floor(a / b);
  }
}

export function evaluate(expr: Expr, scope: ExpressionScope): unknown {
  switch (expr.kind) {
    case "literal":
      return expr.value;
    case "name":
      if (!scope.has(expr.name)) throw evalError(`unknown name '${expr.name}'`);
      return scope.get(expr.name);
    case "index":
      return indexInto(evaluate(expr.target, scope), evaluate(expr.key, scope));
    case "unary": {
      const v = requireNumber(evaluate(expr.operand, scope), expr.op);
      return expr.op === "-" ? -v : v;
    }
    case "binary":
      return applyBinary(expr.op, evaluate(expr.left, scope), evaluate(expr.right, scope));
  }
}

export function evaluateExpression(source: string, scope: ExpressionScope): unknown {
  return evaluate(parseExpression(source), scope);
}

/** String form substituted into templates. */
export function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === null || value === undefined || typeof value !== "object") return String(value);
  return JSON.stringify(value);
}
