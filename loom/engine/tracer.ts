import { errorMessage } from "../core/errors.js";
import type { LoomLogger } from "../core/logger.js";
import { nowMs } from "../core/time.js";

export type TraceEventType =
  | "chain.built"
  | "column.skipped"
  | "step.started"
  | "step.completed"
  | "step.failed"
  | "chain.completed";

export type TraceEvent = {
  type: TraceEventType;
  ts: number;
  payload: Record<string, unknown>;
};

/**
 * Observability sink handed to a chain explicitly. Events are only recorded
 * between `start()` and `stop()`.
 */
export interface ChainTracer {
  start(): void;
  stop(): void;
  record(type: TraceEventType, payload: Record<string, unknown>): Promise<void>;
}

/** A failed write is logged and dropped; it never fails the step being traced. */
export abstract class TracerBase implements ChainTracer {
  private running = false;

  constructor(protected readonly logger: LoomLogger = {}) {}

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
  }

  async record(type: TraceEventType, payload: Record<string, unknown>): Promise<void> {
    if (!this.running) return;
    try {
      await this.write(type, payload);
    } catch (e) {
      this.logger.warn?.(`trace write failed: ${type}`, { error: errorMessage(e) });
    }
  }

  protected abstract write(type: TraceEventType, payload: Record<string, unknown>): Promise<void>;
}

export class MemoryTracer extends TracerBase {
  readonly events: TraceEvent[] = [];

  constructor(
    private readonly clock: () => number = nowMs,
    logger?: LoomLogger,
  ) {
    super(logger);
  }

  ofType(type: TraceEventType): TraceEvent[] {
    return this.events.filter((e) => e.type === type);
  }

  protected async write(type: TraceEventType, payload: Record<string, unknown>): Promise<void> {
    this.events.push({ type, ts: this.clock(), payload });
  }
}
