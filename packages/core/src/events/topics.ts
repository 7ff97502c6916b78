// ============================================
// Topic Definitions
// ============================================

import { z } from "zod";

/**
 * A named topic with the schema its payloads satisfy.
 */
export interface TopicDefinition<T> {
  readonly name: string;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Factory for type-safe topic definitions.
 *
 * @example
 * ```typescript
 * const chapterQueued = defineTopic("scheduler.queued", z.object({ chapter: z.number() }));
 *
 * bus.on(chapterQueued, (payload) => {
 *   // payload is typed as { chapter: number }
 * });
 * ```
 */
export function defineTopic<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): TopicDefinition<T> {
  return { name, schema };
}

/** Replies to bus.request() calls land here */
export const BUS_INBOX = "bus.inbox";

/** Published when a pending request is abandoned by its caller */
export const BUS_CANCEL = "bus.cancel";

export const requestCancelled = defineTopic(
  BUS_CANCEL,
  z.object({
    correlationId: z.string(),
    reason: z.string(),
  })
);

/**
 * Request topic served by the named worker.
 */
export function workerRequestTopic(workerName: string): string {
  return `worker.${workerName}.request`;
}
