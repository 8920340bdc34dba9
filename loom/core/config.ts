import { z } from "zod";

export type LoomConfig = {
  databaseUrl: string;
  authToken?: string;
  model: string;
  eventsTtlMs?: number;
};

const EnvSchema = z.object({
  LOOM_DATABASE_URL: z.string().min(1).optional(),
  LIBSQL_URL: z.string().min(1).optional(),
  LOOM_AUTH_TOKEN: z.string().min(1).optional(),
  LIBSQL_AUTH_TOKEN: z.string().min(1).optional(),
  LOOM_MODEL: z.string().min(1).default("gpt-5-nano"),
  LOOM_EVENTS_TTL_MS: z.coerce.number().int().positive().optional(),
});

export const DEFAULT_DATABASE_URL = "file:./loom.db";

export function loadConfig(env: Record<string, string | undefined> = process.env): LoomConfig {
  // Unset and empty variables are treated the same.
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = EnvSchema.parse(present);
  return {
    databaseUrl: parsed.LOOM_DATABASE_URL ?? parsed.LIBSQL_URL ?? DEFAULT_DATABASE_URL,
    authToken: parsed.LOOM_AUTH_TOKEN ?? parsed.LIBSQL_AUTH_TOKEN,
    model: parsed.LOOM_MODEL,
    eventsTtlMs: parsed.LOOM_EVENTS_TTL_MS,
  };
}
