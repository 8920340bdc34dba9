import { eq } from "drizzle-orm";
import { nowMs } from "../core/time.js";
import type { SqlClient } from "../db/db.js";
import { chainCheckpoints } from "../db/schema.js";
import type { ChainStatus } from "../chains/matrix.js";
import type { MatrixSnapshot } from "../chains/snapshot.js";

export type CheckpointRow = {
  chain_id: string;
  status: string;
  cursor: number;
  step_count: number;
  snapshot: unknown;
  last_error: string | null;
  attempt: number;
  created_ts: number;
  updated_ts: number;
};

export async function saveCheckpoint(
  db: SqlClient,
  chainId: string,
  state: { status: ChainStatus; snapshot: MatrixSnapshot; lastError?: string | null; attempt?: number },
): Promise<void> {
  const now = nowMs();
  const values = {
    status: state.status,
    cursor: state.snapshot.cursor,
    step_count: state.snapshot.steps.length,
    snapshot: state.snapshot,
    last_error: state.lastError ?? null,
    attempt: state.attempt ?? 0,
    updated_ts: now,
  };

  await db
    .insert(chainCheckpoints)
    .values({ chain_id: chainId, created_ts: now, ...values })
    .onConflictDoUpdate({ target: chainCheckpoints.chain_id, set: values });
}

export async function loadCheckpoint(db: SqlClient, chainId: string): Promise<CheckpointRow | null> {
  const rows = await db.select().from(chainCheckpoints).where(eq(chainCheckpoints.chain_id, chainId)).limit(1);
  const row = rows[0];
  if (!row) return null;
  return {
    chain_id: row.chain_id,
    status: row.status,
    cursor: row.cursor,
    step_count: row.step_count,
    snapshot: row.snapshot,
    last_error: row.last_error,
    attempt: row.attempt,
    created_ts: row.created_ts,
    updated_ts: row.updated_ts,
  };
}

export async function deleteCheckpoint(db: SqlClient, chainId: string): Promise<void> {
  await db.delete(chainCheckpoints).where(eq(chainCheckpoints.chain_id, chainId));
}
