// ============================================
// Worker Registry
// ============================================

import type { z } from "zod";
import { ConfigurationError, ErrorCode } from "../errors/index.js";
import { type MessageBus, requestCancelled, type Subscription, workerRequestTopic } from "../events/index.js";
import type { Logger } from "../logger/index.js";
import type { RateLimiter } from "../rate-limit/index.js";
import { WorkerAdapter } from "./adapter.js";
import type { ManagedWorker, WorkerCollaborator } from "./types.js";

export interface WorkerRegistryOptions {
  rateLimiter?: RateLimiter;
  /** Fallback deadline for requests without a deadline header */
  defaultTimeoutMs?: number;
  logger?: Logger;
}

export interface WorkerRegistration<TRequest> {
  schema: z.ZodType<TRequest, z.ZodTypeDef, unknown>;
  provider?: string;
  timeoutMs?: number;
}

/**
 * Dispatch table from worker name to running adapter, filled at startup.
 * Routes cancellation notices to whichever adapter owns the call, so it works
 * on buses that allow a single handler per topic.
 *
 * @example
 * ```typescript
 * const workers = new WorkerRegistry(bus, { rateLimiter, logger });
 * workers.register("planner", plannerClient, { schema: z.unknown(), provider: "anthropic" });
 * workers.assertRegistered(["planner", "composer"]); // throws ConfigurationError
 * ```
 */
export class WorkerRegistry {
  private readonly adapters = new Map<string, ManagedWorker>();
  private cancelSubscription?: Subscription;

  constructor(
    private readonly bus: MessageBus,
    private readonly options: WorkerRegistryOptions = {}
  ) {}

  /**
   * Create and start the adapter serving `worker.<name>.request`.
   *
   * @throws ConfigurationError if `name` is already registered
   */
  register<TRequest>(
    name: string,
    collaborator: WorkerCollaborator<TRequest>,
    registration: WorkerRegistration<TRequest>
  ): WorkerAdapter<TRequest> {
    if (this.adapters.has(name)) {
      throw new ConfigurationError(`Worker "${name}" is already registered`, [
        { path: `workers.${name}`, message: "duplicate registration" },
      ]);
    }

    const adapter = new WorkerAdapter<TRequest>({
      name,
      bus: this.bus,
      collaborator,
      schema: registration.schema,
      provider: registration.provider,
      rateLimiter: this.options.rateLimiter,
      defaultTimeoutMs: registration.timeoutMs ?? this.options.defaultTimeoutMs,
      listenForCancel: false,
      logger: this.options.logger,
    });

    this.ensureCancelRouting();
    adapter.start();
    this.adapters.set(name, adapter);
    this.options.logger?.debug(`Registered worker ${name}`, { provider: registration.provider });
    return adapter;
  }

  topicFor(name: string): string {
    return workerRequestTopic(name);
  }

  has(name: string): boolean {
    return this.adapters.has(name);
  }

  get(name: string): ManagedWorker | undefined {
    return this.adapters.get(name);
  }

  names(): string[] {
    return [...this.adapters.keys()];
  }

  /**
   * @throws ConfigurationError listing every name without an adapter
   */
  assertRegistered(names: Iterable<string>): void {
    const missing = [...new Set(names)].filter((name) => !this.adapters.has(name));
    if (missing.length === 0) {
      return;
    }

    throw new ConfigurationError(
      `Missing worker adapters: ${missing.join(", ")}`,
      missing.map((name) => ({ path: `workers.${name}`, message: "no adapter registered" })),
      ErrorCode.CONFIG_MISSING_WORKER
    );
  }

  stopAll(): void {
    for (const adapter of this.adapters.values()) {
      adapter.stop();
    }
    this.adapters.clear();
    this.cancelSubscription?.unsubscribe();
    this.cancelSubscription = undefined;
  }

  private ensureCancelRouting(): void {
    if (this.cancelSubscription) {
      return;
    }

    this.cancelSubscription = this.bus.on(requestCancelled, ({ correlationId, reason }) => {
      for (const adapter of this.adapters.values()) {
        if (adapter.cancel(correlationId, reason)) {
          return;
        }
      }
    });
  }
}
