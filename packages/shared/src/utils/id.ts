import { randomUUID } from "node:crypto";

/**
 * Generate a unique ID using crypto.randomUUID()
 */
export function createId(): string {
  return randomUUID();
}

/**
 * First eight characters of an id, for log lines.
 */
export function shortId(id: string | undefined): string {
  return id ? id.slice(0, 8) : "none";
}
