// ============================================
// Worker Types
// ============================================

import { z } from "zod";
import type { WorkerFailureKind } from "../errors/index.js";

/**
 * What a collaborator receives besides its request.
 */
export interface InvokeContext {
  /** Epoch ms after which the reply is no longer wanted */
  readonly deadline: number;
  /** Fires on deadline or when the caller cancels */
  readonly signal: AbortSignal;
  readonly chapter?: number;
}

/**
 * Opaque boundary to a content-generation worker. Implementations report
 * failures by throwing WorkerFailure; anything else counts as a provider error.
 */
export interface WorkerCollaborator<TRequest = unknown, TResponse = unknown> {
  invoke(request: TRequest, context: InvokeContext): Promise<TResponse>;
}

export const WorkerFailureKindSchema = z.enum([
  "provider_error",
  "rate_limited",
  "invalid_response",
  "deadline_exceeded",
  "invalid_request",
  "cancelled",
]) satisfies z.ZodType<WorkerFailureKind>;

/**
 * Envelope every adapter replies with, so callers resolve on failure instead
 * of waiting for a timeout.
 */
export const WorkerReplySchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), value: z.unknown() }),
  z.object({
    ok: z.literal(false),
    error: z.object({ kind: WorkerFailureKindSchema, message: z.string() }),
  }),
]);

export type WorkerReply = z.infer<typeof WorkerReplySchema>;

/**
 * The parts of an adapter the registry manages, independent of request type.
 */
export interface ManagedWorker {
  readonly name: string;
  readonly topic: string;
  readonly provider?: string;
  readonly inFlight: number;
  readonly isRunning: boolean;
  start(): void;
  stop(): void;
  /** Abort the in-flight call for `correlationId`; false if none */
  cancel(correlationId: string, reason: string): boolean;
}
