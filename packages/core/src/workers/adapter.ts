// ============================================
// Worker Adapter
// Bus-facing wrapper around one worker collaborator
// ============================================

import { shortId } from "@quillwork/shared";
import type { z } from "zod";
import {
  CancelledError,
  ErrorCode,
  QuillworkError,
  withDeadline,
  WorkerFailure,
  type WorkerFailureKind,
} from "../errors/index.js";
import {
  createReply,
  type Message,
  type MessageBus,
  requestCancelled,
  type Subscription,
  workerRequestTopic,
} from "../events/index.js";
import type { Logger } from "../logger/index.js";
import type { RateLimiter } from "../rate-limit/index.js";
import type { ManagedWorker, WorkerCollaborator, WorkerReply } from "./types.js";

const DEFAULT_WORKER_TIMEOUT_MS = 120_000;

export interface WorkerAdapterOptions<TRequest> {
  name: string;
  bus: MessageBus;
  collaborator: WorkerCollaborator<TRequest>;
  /** Request payloads failing this schema get an invalid_request reply */
  schema: z.ZodType<TRequest, z.ZodTypeDef, unknown>;
  /** Rate-limit bucket to draw from before each call */
  provider?: string;
  rateLimiter?: RateLimiter;
  /** Used when a request carries no deadline header (default: 120000) */
  defaultTimeoutMs?: number;
  /**
   * Subscribe to cancellation notices directly (default: true). The
   * WorkerRegistry turns this off and routes notices itself.
   */
  listenForCancel?: boolean;
  logger?: Logger;
}

/**
 * Subscribes to `worker.<name>.request`, runs the collaborator under the
 * request's deadline and replies with a WorkerReply envelope. Requests are
 * handled concurrently.
 *
 * @example
 * ```typescript
 * const adapter = new WorkerAdapter({
 *   name: "planner",
 *   bus,
 *   collaborator: plannerClient,
 *   schema: PlannerRequestSchema,
 *   provider: "anthropic",
 *   rateLimiter,
 * });
 * adapter.start();
 * ```
 */
export class WorkerAdapter<TRequest = unknown> implements ManagedWorker {
  readonly name: string;
  readonly topic: string;
  readonly provider?: string;

  private readonly bus: MessageBus;
  private readonly collaborator: WorkerCollaborator<TRequest>;
  private readonly schema: z.ZodType<TRequest, z.ZodTypeDef, unknown>;
  private readonly rateLimiter?: RateLimiter;
  private readonly defaultTimeoutMs: number;
  private readonly listenForCancel: boolean;
  private readonly logger?: Logger;
  private readonly active = new Map<string, AbortController>();
  private subscriptions: Subscription[] = [];

  constructor(options: WorkerAdapterOptions<TRequest>) {
    this.name = options.name;
    this.topic = workerRequestTopic(options.name);
    this.provider = options.provider;
    this.bus = options.bus;
    this.collaborator = options.collaborator;
    this.schema = options.schema;
    this.rateLimiter = options.rateLimiter;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_WORKER_TIMEOUT_MS;
    this.listenForCancel = options.listenForCancel ?? true;
    this.logger = options.logger?.forWorker(options.name);
  }

  get inFlight(): number {
    return this.active.size;
  }

  get isRunning(): boolean {
    return this.subscriptions.length > 0;
  }

  start(): void {
    if (this.isRunning) {
      return;
    }

    this.subscriptions.push(
      this.bus.subscribe(this.topic, async (message) => {
        const reply = await this.handle(message);
        if (reply) {
          this.bus.publish(reply);
        }
      })
    );

    if (this.listenForCancel) {
      this.subscriptions.push(
        this.bus.on(requestCancelled, ({ correlationId, reason }) => {
          this.cancel(correlationId, reason);
        })
      );
    }
  }

  /**
   * Unsubscribes and aborts every in-flight call.
   */
  stop(): void {
    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.subscriptions = [];

    for (const controller of this.active.values()) {
      controller.abort();
    }
  }

  cancel(correlationId: string, reason: string): boolean {
    const controller = this.active.get(correlationId);
    if (!controller) {
      return false;
    }

    this.logger?.info(`Cancelling call ${shortId(correlationId)}`, { reason });
    controller.abort();
    return true;
  }

  /**
   * Run one request. Returns the reply to publish, or undefined for
   * fire-and-forget requests.
   */
  async handle(request: Message): Promise<Message<WorkerReply> | undefined> {
    const reply = await this.execute(request);

    if (request.replyTo === undefined) {
      this.logger?.debug(`Completed fire-and-forget request ${shortId(request.id)}`, {
        ok: reply.ok,
      });
      return undefined;
    }

    return createReply(request, reply, { source: this.name });
  }

  private async execute(request: Message): Promise<WorkerReply> {
    const parsed = this.schema.safeParse(request.payload);
    if (!parsed.success) {
      return this.failure("invalid_request", `Invalid request: ${parsed.error.message}`);
    }
    const payload = parsed.data;

    const deadline = request.headers.deadline ?? Date.now() + this.defaultTimeoutMs;
    if (deadline <= Date.now()) {
      return this.failure("deadline_exceeded", "Request arrived after its deadline");
    }

    const key = request.correlationId ?? request.id;
    const controller = new AbortController();
    this.active.set(key, controller);
    const timer = this.logger?.time(`${this.name} call`);

    try {
      const value = await withDeadline(
        async (signal) => {
          if (this.rateLimiter && this.provider !== undefined) {
            await this.rateLimiter.acquire(this.provider, 1, signal);
          }
          return this.collaborator.invoke(payload, {
            deadline,
            signal,
            chapter: request.headers.chapter,
          });
        },
        deadline,
        {
          parent: controller.signal,
          onDeadline: (budgetMs) =>
            new WorkerFailure(this.name, "deadline_exceeded", `No result within ${budgetMs}ms`),
        }
      );
      timer?.end(`${this.name} call completed`);
      return { ok: true, value };
    } catch (error) {
      return this.failureFrom(error);
    } finally {
      this.active.delete(key);
    }
  }

  private failureFrom(error: unknown): WorkerReply {
    if (error instanceof WorkerFailure) {
      return this.failure(error.kind, error.message);
    }
    if (error instanceof CancelledError) {
      return this.failure("cancelled", error.message);
    }
    if (error instanceof QuillworkError && error.code === ErrorCode.WORKER_RATE_LIMITED) {
      return this.failure("rate_limited", error.message);
    }
    return this.failure("provider_error", error instanceof Error ? error.message : String(error));
  }

  private failure(kind: WorkerFailureKind, message: string): WorkerReply {
    this.logger?.warn(`${this.name} failed: ${kind}`, { message });
    return { ok: false, error: { kind, message } };
  }
}
