import type { LoomLogger } from "../core/logger.js";
import type { SqlClient } from "../db/db.js";
import { emitEvent } from "./events.js";
import { TracerBase } from "./tracer.js";
import type { TraceEventType } from "./tracer.js";

/** Tracer that appends to the `chain_events` table under one chain id. */
export class EventLogTracer extends TracerBase {
  constructor(
    private readonly db: SqlClient,
    readonly chainId: string,
    logger?: LoomLogger,
  ) {
    super(logger);
  }

  protected async write(type: TraceEventType, payload: Record<string, unknown>): Promise<void> {
    await emitEvent(this.db, this.chainId, type, payload);
  }
}
