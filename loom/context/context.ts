import { errorMessage } from "../core/errors.js";
import type { LoomLogger } from "../core/logger.js";
import { evaluateExpression, formatValue, isRecord } from "./expression.js";

export type ContextValues = Record<string, unknown>;

/** `{expression}` tokens; braces do not nest. */
const PLACEHOLDER = /\{([^}]+)\}/g;

/** Marks an argument that names a context key rather than a value to substitute. */
export const REF_SIGIL = "$";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Shared key/value store threaded through a chain.
 *
 * Keys are added by `update()` and by step completion; nothing is ever deleted.
 * Template resolution never throws: a token that fails to evaluate stays in the
 * output verbatim and a warning goes to the logger.
 */
export class ChainContext {
  private readonly values = new Map<string, unknown>();
  private readonly logger: LoomLogger;

  constructor(initial: ContextValues = {}, opts: { logger?: LoomLogger } = {}) {
    this.logger = opts.logger ?? {};
    this.update(initial);
  }

  update(pairs: ContextValues): void {
    for (const [key, value] of Object.entries(pairs)) {
      this.values.set(key, value);
    }
  }

  set(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  getValue(key: string): unknown {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get size(): number {
    return this.values.size;
  }

  toJSON(): ContextValues {
    return Object.fromEntries(this.values);
  }

  resolvePlaceholders(value: string): string;
  resolvePlaceholders(value: readonly unknown[]): unknown[];
  resolvePlaceholders(value: Readonly<Record<string, unknown>>): Record<string, unknown>;
  resolvePlaceholders(value: unknown): unknown;
  resolvePlaceholders(value: unknown): unknown {
    if (typeof value === "string") return this.resolveTemplate(value);
    if (Array.isArray(value)) return value.map((v: unknown) => this.resolvePlaceholders(v));
    if (isPlainObject(value)) {
      const out: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(value)) out[k] = this.resolvePlaceholders(v);
      return out;
    }
    return value;
  }

  resolveRef(value: string): string;
  resolveRef(value: unknown): unknown;
  resolveRef(value: unknown): unknown {
    if (typeof value === "string" && value.startsWith(REF_SIGIL)) {
      return value.slice(REF_SIGIL.length);
    }
    return value;
  }

  private resolveTemplate(template: string): string {
    return template.replace(PLACEHOLDER, (token: string, expression: string) => {
      try {
        return formatValue(evaluateExpression(expression, this.values));
      } catch (e) {
        this.logger.warn?.(`failed to resolve placeholder: ${token}`, { error: errorMessage(e) });
        return token;
      }
    });
  }
}
