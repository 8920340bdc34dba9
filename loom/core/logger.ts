export type LoomLogger = {
  debug?: (msg: string, meta?: unknown) => void;
  info?: (msg: string, meta?: unknown) => void;
  warn?: (msg: string, meta?: unknown) => void;
  error?: (msg: string, meta?: unknown) => void;
};

/** Prefixed console sink for scripts; library code never logs unless handed a logger. */
export function consoleLogger(prefix = "loom"): LoomLogger {
  const fmt = (msg: string) => `[${prefix}] ${msg}`;
  return {
    info: (msg, meta) => (meta === undefined ? console.log(fmt(msg)) : console.log(fmt(msg), meta)),
    warn: (msg, meta) => (meta === undefined ? console.warn(fmt(msg)) : console.warn(fmt(msg), meta)),
    error: (msg, meta) => (meta === undefined ? console.error(fmt(msg)) : console.error(fmt(msg), meta)),
  };
}
