export class LoomError extends Error {
  code: string;
  details?: unknown;
  constructor(code: string, message: string, details?: unknown) {
    super(message);
    this.name = "LoomError";
    this.code = code;
    this.details = details;
  }
}

export const ERR = {
  MATRIX_SHAPE: "LOOM_MATRIX_SHAPE",
  MATRIX_INDEX: "LOOM_MATRIX_INDEX",
  EXPRESSION_SYNTAX: "LOOM_EXPRESSION_SYNTAX",
  EXPRESSION_EVAL: "LOOM_EXPRESSION_EVAL",
  INVALID_ORDER: "LOOM_INVALID_ORDER",
  UNKNOWN_AGENT: "LOOM_UNKNOWN_AGENT",
  UNKNOWN_METHOD: "LOOM_UNKNOWN_METHOD",
  UNKNOWN_CHAIN: "LOOM_UNKNOWN_CHAIN",
  CHAIN_EXISTS: "LOOM_CHAIN_EXISTS",
  INVALID_CHECKPOINT: "LOOM_INVALID_CHECKPOINT",
} as const;

export type ErrorCode = (typeof ERR)[keyof typeof ERR];

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
