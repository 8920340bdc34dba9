import { randomUUID } from "node:crypto";

export function randomId(prefix: string): string {
  return `${prefix}_${Date.now().toString(36)}_${randomUUID().replace(/-/g, "").slice(0, 10)}`;
}
