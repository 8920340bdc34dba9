import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";

// Keep in sync with schema.sql, which is what migrate() applies.

export const chainCheckpoints = sqliteTable(
  "chain_checkpoints",
  {
    chain_id: text("chain_id").primaryKey(),
    status: text("status").notNull(),
    cursor: integer("cursor").notNull(),
    step_count: integer("step_count").notNull(),
    snapshot: text("snapshot", { mode: "json" }).notNull(),
    last_error: text("last_error"),
    attempt: integer("attempt").notNull().default(0),
    created_ts: integer("created_ts").notNull(),
    updated_ts: integer("updated_ts").notNull(),
  },
  (t) => ({
    idx_checkpoints_status: index("idx_checkpoints_status").on(t.status),
  }),
);

export const chainEvents = sqliteTable(
  "chain_events",
  {
    seq: integer("seq").primaryKey({ autoIncrement: true }),
    id: text("id").notNull(),
    ts: integer("ts").notNull(),
    chain_id: text("chain_id").notNull(),
    type: text("type").notNull(),
    payload: text("payload", { mode: "json" }).notNull(),
  },
  (t) => ({
    idx_events_id: uniqueIndex("idx_chain_events_id").on(t.id),
    idx_events_ts: index("idx_chain_events_ts").on(t.ts),
    idx_events_chain_seq: index("idx_chain_events_chain_seq").on(t.chain_id, t.seq),
  }),
);
