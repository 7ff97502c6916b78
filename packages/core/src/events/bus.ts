// ============================================
// Quillwork Message Bus
// Topic routing with request/response correlation
// ============================================

import { createId, shortId } from "@quillwork/shared";
import { CancelledError, ConfigurationError, ErrorCode, TimeoutError } from "../errors/index.js";
import type { Logger } from "../logger/index.js";
import { createMessage, type Message, type MessageHeaders, MessageSchema } from "./message.js";
import {
  type BusMiddleware,
  type DeliveryDirection,
  type DeliveryOutcome,
  MiddlewareChain,
} from "./middleware.js";
import { type MessageHandler, type Subscription, SubscriptionRegistry } from "./registry.js";
import { BUS_CANCEL, BUS_INBOX, type TopicDefinition } from "./topics.js";

/**
 * How the handlers of one message are run.
 *
 * - `parallel`: all handlers start together; the next message on the topic is
 *   dispatched without waiting for them
 * - `sequential`: handlers run one after another, and the next message on the
 *   topic waits until the last handler has finished
 */
export type DispatchMode = "parallel" | "sequential";

export interface MessageBusOptions {
  dispatch?: DispatchMode;
  /** Reject a second subscriber on any topic */
  singleHandlerTopics?: boolean;
  logger?: Logger;
  middleware?: BusMiddleware[];
  /**
   * When true, validates message shape on publish and payloads on emit.
   * Useful for development/testing.
   */
  debug?: boolean;
  /** Deadline for request() when the caller gives none (default: 60000) */
  defaultTimeoutMs?: number;
}

export interface SubscribeOptions {
  /** Higher runs first (default: 0) */
  priority?: number;
}

export interface RequestOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  headers?: Omit<MessageHeaders, "deadline">;
}

export interface BusStats {
  published: number;
  handlerFailures: number;
  repliesMatched: number;
  repliesDiscarded: number;
  timedOut: number;
  cancelled: number;
  pending: number;
}

interface PendingRequest {
  readonly correlationId: string;
  readonly topic: string;
  readonly deadline: number;
  readonly timeoutMs: number;
  readonly timer: ReturnType<typeof setTimeout>;
  readonly resolve: (payload: unknown) => void;
  readonly reject: (error: Error) => void;
  readonly detach: () => void;
}

const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Asynchronous topic router. Publishing never blocks on handlers and never
 * surfaces handler errors; request() layers correlated replies on top.
 *
 * @example
 * ```typescript
 * const bus = new MessageBus({ logger });
 *
 * bus.subscribe("worker.planner.request", async (msg) => {
 *   bus.publish(createReply(msg, { ok: true, value: outline }));
 * });
 *
 * const reply = await bus.request("worker.planner.request", { chapter: 1 }, {
 *   timeoutMs: 30_000,
 * });
 * ```
 */
export class MessageBus {
  private readonly registry: SubscriptionRegistry;
  private readonly chain: MiddlewareChain;
  private readonly dispatch: DispatchMode;
  private readonly debug: boolean;
  private readonly defaultTimeoutMs: number;
  private readonly logger?: Logger;

  private readonly pending = new Map<string, PendingRequest>();
  private readonly topicTails = new Map<string, Promise<void>>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly counters = {
    published: 0,
    handlerFailures: 0,
    repliesMatched: 0,
    repliesDiscarded: 0,
    timedOut: 0,
    cancelled: 0,
  };
  private disposed = false;

  constructor(options: MessageBusOptions = {}) {
    this.dispatch = options.dispatch ?? "parallel";
    this.debug = options.debug ?? false;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger;
    this.registry = new SubscriptionRegistry({ singleHandlerTopics: options.singleHandlerTopics });
    this.chain = new MiddlewareChain(options.logger);

    for (const middleware of options.middleware ?? []) {
      this.chain.use(middleware);
    }

    this.registry.add(BUS_INBOX, (message) => {
      this.settleReply(message);
    });
  }

  // ============================================
  // Subscriptions
  // ============================================

  /**
   * @throws DuplicateSubscriptionError when single-handler topics are enforced
   */
  subscribe(topic: string, handler: MessageHandler, options: SubscribeOptions = {}): Subscription {
    this.ensureActive();
    return this.registry.add(topic, handler, options.priority);
  }

  /**
   * Typed subscription. Payloads that fail the topic schema are logged and
   * not passed to the handler.
   */
  on<T>(
    topic: TopicDefinition<T>,
    handler: (payload: T, message: Message) => void | Promise<void>,
    options: SubscribeOptions = {}
  ): Subscription {
    return this.subscribe(
      topic.name,
      (message) => {
        const parsed = topic.schema.safeParse(message.payload);
        if (!parsed.success) {
          this.logger?.warn(`Dropped invalid payload on ${topic.name}`, {
            id: shortId(message.id),
            error: parsed.error.message,
          });
          return;
        }
        return handler(parsed.data, message);
      },
      options
    );
  }

  use(middleware: BusMiddleware): void {
    this.chain.use(middleware);
  }

  hasSubscribers(topic: string): boolean {
    return this.registry.has(topic);
  }

  // ============================================
  // Publishing
  // ============================================

  /**
   * Fire-and-forget. Returns before any handler runs.
   *
   * @throws Error if the bus is disposed, or in debug mode when the message is malformed
   */
  publish(message: Message): void {
    this.ensureActive();

    if (this.debug) {
      const result = MessageSchema.safeParse(message);
      if (!result.success) {
        throw new Error(`MessageBus rejected malformed message on "${message.topic}": ${result.error.message}`);
      }
    }

    const direction: DeliveryDirection = message.topic === BUS_INBOX ? "reply" : "publish";
    this.counters.published++;
    this.chain.runBefore(message, direction);

    const handlers = this.registry.handlersFor(message.topic);
    if (handlers.length === 0) {
      this.logger?.trace(`No subscribers for ${message.topic}`, { id: shortId(message.id) });
      this.chain.runAfter(message, { direction, delivered: 0, failed: 0, durationMs: 0 });
      return;
    }

    const topic = message.topic;
    const previous = this.topicTails.get(topic) ?? Promise.resolve();
    const tail = previous.then(() => this.deliver(message, handlers, direction));
    this.topicTails.set(topic, tail);
    this.track(tail);
    void tail.then(() => {
      if (this.topicTails.get(topic) === tail) {
        this.topicTails.delete(topic);
      }
    });
  }

  /**
   * Typed publish.
   *
   * @throws Error if debug mode is enabled and payload fails schema validation
   */
  emit<T>(topic: TopicDefinition<T>, payload: T, headers: MessageHeaders = {}): Message<T> {
    if (this.debug) {
      const result = topic.schema.safeParse(payload);
      if (!result.success) {
        throw new Error(`MessageBus validation failed for topic "${topic.name}": ${result.error.message}`);
      }
    }

    const message = createMessage(topic.name, payload, { headers });
    this.publish(message);
    return message;
  }

  // ============================================
  // Request / Response
  // ============================================

  /**
   * Publish a correlated request and wait for the first reply.
   *
   * @returns the reply payload, unvalidated
   * @throws ConfigurationError if nothing subscribes to `topic`
   * @throws TimeoutError if no reply arrives within the timeout
   * @throws CancelledError if `signal` aborts or the bus is disposed first
   */
  request(topic: string, payload: unknown, options: RequestOptions = {}): Promise<unknown> {
    this.ensureActive();

    if (!this.registry.has(topic)) {
      return Promise.reject(
        new ConfigurationError(
          `No subscriber for "${topic}"`,
          [{ path: topic, message: "no handler registered for request topic" }],
          ErrorCode.BUS_NO_SUBSCRIBER
        )
      );
    }

    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new CancelledError(`Request on "${topic}" cancelled before send`));
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const correlationId = createId();
    const deadline = Date.now() + timeoutMs;
    const message = createMessage(topic, payload, {
      correlationId,
      replyTo: BUS_INBOX,
      headers: { ...options.headers, deadline },
    });

    return new Promise<unknown>((resolve, reject) => {
      const onAbort = (): void => {
        this.cancelPending(correlationId, "aborted by caller");
      };

      const timer = setTimeout(() => {
        this.expirePending(correlationId);
      }, timeoutMs);

      this.pending.set(correlationId, {
        correlationId,
        topic,
        deadline,
        timeoutMs,
        timer,
        resolve,
        reject,
        detach: () => signal?.removeEventListener("abort", onAbort),
      });
      signal?.addEventListener("abort", onAbort, { once: true });

      this.publish(message);
    });
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  stats(): BusStats {
    return { ...this.counters, pending: this.pending.size };
  }

  /**
   * Resolves once no delivery is in flight, including deliveries started
   * while waiting.
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  /**
   * Rejects every pending request with CancelledError and drops all
   * subscriptions. Further publishes throw.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;

    for (const correlationId of [...this.pending.keys()]) {
      const entry = this.takePending(correlationId);
      entry?.reject(new CancelledError(`Request on "${entry.topic}" cancelled: bus disposed`));
    }
    this.registry.clear();
  }

  // ============================================
  // Internals
  // ============================================

  private deliver(
    message: Message,
    handlers: readonly MessageHandler[],
    direction: DeliveryDirection
  ): Promise<void> {
    const startedAt = performance.now();
    const finish = (results: boolean[]): void => {
      const delivered = results.filter(Boolean).length;
      const outcome: DeliveryOutcome = {
        direction,
        delivered,
        failed: results.length - delivered,
        durationMs: performance.now() - startedAt,
      };
      this.chain.runAfter(message, outcome);
    };

    if (this.dispatch === "sequential") {
      return (async () => {
        const results: boolean[] = [];
        for (const handler of handlers) {
          results.push(await this.invoke(handler, message));
        }
        finish(results);
      })();
    }

    const completion = Promise.all(handlers.map((handler) => this.invoke(handler, message))).then(
      finish
    );
    this.track(completion);
    return Promise.resolve();
  }

  private async invoke(handler: MessageHandler, message: Message): Promise<boolean> {
    try {
      await handler(message);
      return true;
    } catch (error) {
      this.counters.handlerFailures++;
      this.logger?.error(`Handler failed on ${message.topic}`, {
        id: shortId(message.id),
        correlation: shortId(message.correlationId),
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private track(promise: Promise<void>): void {
    this.inFlight.add(promise);
    void promise.then(() => {
      this.inFlight.delete(promise);
    });
  }

  private takePending(correlationId: string): PendingRequest | undefined {
    const entry = this.pending.get(correlationId);
    if (!entry) {
      return undefined;
    }
    this.pending.delete(correlationId);
    clearTimeout(entry.timer);
    entry.detach();
    return entry;
  }

  private settleReply(message: Message): void {
    const entry =
      message.correlationId !== undefined ? this.takePending(message.correlationId) : undefined;

    if (!entry) {
      this.counters.repliesDiscarded++;
      this.logger?.warn("Discarded late or duplicate reply", {
        correlation: shortId(message.correlationId),
        source: message.headers.source,
      });
      return;
    }

    this.counters.repliesMatched++;
    entry.resolve(message.payload);
  }

  private expirePending(correlationId: string): void {
    const entry = this.takePending(correlationId);
    if (!entry) {
      return;
    }

    this.counters.timedOut++;
    this.logger?.warn(`Request on ${entry.topic} timed out after ${entry.timeoutMs}ms`, {
      correlation: shortId(correlationId),
    });
    entry.reject(new TimeoutError(entry.topic, entry.timeoutMs, { context: { correlationId } }));
  }

  private cancelPending(correlationId: string, reason: string): void {
    const entry = this.takePending(correlationId);
    if (!entry) {
      return;
    }

    this.counters.cancelled++;
    entry.reject(new CancelledError(`Request on "${entry.topic}" cancelled: ${reason}`));

    if (!this.disposed) {
      this.publish(createMessage(BUS_CANCEL, { correlationId, reason }, { headers: { source: "bus" } }));
    }
  }

  private ensureActive(): void {
    if (this.disposed) {
      throw new Error("MessageBus is disposed");
    }
  }
}
