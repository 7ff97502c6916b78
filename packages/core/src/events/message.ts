// ============================================
// Bus Message Envelope
// ============================================

import { createId } from "@quillwork/shared";
import { z } from "zod";

/**
 * Routing metadata carried alongside a payload.
 */
export interface MessageHeaders {
  /** Absolute deadline (epoch ms) for request messages */
  readonly deadline?: number;
  readonly chapter?: number;
  readonly scene?: number;
  /** Logical sender, used in log lines */
  readonly source?: string;
}

/**
 * Immutable envelope routed by the MessageBus.
 */
export interface Message<T = unknown> {
  readonly id: string;
  readonly topic: string;
  readonly payload: T;
  /** Set on requests and echoed on their replies */
  readonly correlationId?: string;
  /** Topic the reply should be published on */
  readonly replyTo?: string;
  readonly createdAt: Date;
  readonly headers: MessageHeaders;
}

export interface CreateMessageOptions {
  correlationId?: string;
  replyTo?: string;
  headers?: MessageHeaders;
}

export const MessageHeadersSchema = z.object({
  deadline: z.number().int().nonnegative().optional(),
  chapter: z.number().int().positive().optional(),
  scene: z.number().int().nonnegative().optional(),
  source: z.string().min(1).optional(),
});

export const MessageSchema = z.object({
  id: z.string().min(1),
  topic: z.string().min(1),
  payload: z.unknown(),
  correlationId: z.string().min(1).optional(),
  replyTo: z.string().min(1).optional(),
  createdAt: z.date(),
  headers: MessageHeadersSchema,
});

/**
 * Build a frozen message with a fresh id.
 *
 * @example
 * ```typescript
 * const msg = createMessage("worker.planner.request", { chapter: 3 }, {
 *   headers: { chapter: 3, source: "orchestrator" },
 * });
 * ```
 */
export function createMessage<T>(
  topic: string,
  payload: T,
  options: CreateMessageOptions = {}
): Message<T> {
  const message: Message<T> = {
    id: createId(),
    topic,
    payload,
    createdAt: new Date(),
    headers: Object.freeze({ ...options.headers }),
    ...(options.correlationId !== undefined && { correlationId: options.correlationId }),
    ...(options.replyTo !== undefined && { replyTo: options.replyTo }),
  };
  return Object.freeze(message);
}

/**
 * Build the reply to `request`, addressed to its replyTo topic and carrying
 * its correlation id. Chapter and scene headers are inherited.
 *
 * @throws Error if the request has no replyTo
 */
export function createReply<T>(
  request: Message,
  payload: T,
  headers: MessageHeaders = {}
): Message<T> {
  if (request.replyTo === undefined) {
    throw new Error(`Message ${request.id} on "${request.topic}" has no replyTo`);
  }

  return createMessage(request.replyTo, payload, {
    correlationId: request.correlationId ?? request.id,
    headers: {
      ...(request.headers.chapter !== undefined && { chapter: request.headers.chapter }),
      ...(request.headers.scene !== undefined && { scene: request.headers.scene }),
      ...headers,
    },
  });
}
