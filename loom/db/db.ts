import type { LibSQLDatabase } from "drizzle-orm/libsql";
import { sql } from "drizzle-orm";

export type SqlClient = LibSQLDatabase;

/** Apply a multi-statement DDL script, one statement at a time. */
export async function applySchema(db: SqlClient, script: string): Promise<void> {
  const statements = script
    .split(/;\s*(?:\r?\n|$)/)
    .map((s) => s.replace(/^\s*--.*$/gm, "").trim())
    .filter((s) => s.length > 0);
  for (const statement of statements) {
    await db.run(sql.raw(statement));
  }
}
