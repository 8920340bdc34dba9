import { and, asc, eq, gt, lt } from "drizzle-orm";
import { randomId } from "../core/ids.js";
import { nowMs } from "../core/time.js";
import type { SqlClient } from "../db/db.js";
import { chainEvents } from "../db/schema.js";

export type EventRow = {
  seq: number;
  id: string;
  ts: number;
  chain_id: string;
  type: string;
  payload: unknown;
};

export async function emitEvent(db: SqlClient, chainId: string, type: string, payload: unknown): Promise<void> {
  await db.insert(chainEvents).values({
    id: randomId("evt"),
    ts: nowMs(),
    chain_id: chainId,
    type,
    payload,
  });
}

export async function readEvents(
  db: SqlClient,
  opts: { chainId?: string; afterSeq: number; limit: number },
): Promise<EventRow[]> {
  const conditions = [gt(chainEvents.seq, opts.afterSeq)];
  if (opts.chainId !== undefined) conditions.push(eq(chainEvents.chain_id, opts.chainId));

  const rows = await db
    .select()
    .from(chainEvents)
    .where(and(...conditions))
    .orderBy(asc(chainEvents.seq))
    .limit(opts.limit);

  return rows.map((r) => ({
    seq: r.seq,
    id: r.id,
    ts: r.ts,
    chain_id: r.chain_id,
    type: r.type,
    payload: r.payload,
  }));
}

export async function gcEventsByTtl(db: SqlClient, ttlMs: number): Promise<number> {
  const cutoff = nowMs() - ttlMs;
  const deleted = await db.delete(chainEvents).where(lt(chainEvents.ts, cutoff)).returning({ seq: chainEvents.seq });
  return deleted.length;
}
