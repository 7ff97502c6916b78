// ============================================
// Bus Middleware
// ============================================

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { shortId } from "@quillwork/shared";
import type { Logger } from "../logger/index.js";
import type { Message } from "./message.js";

/** Whether a message is an ordinary publish or a reply to the bus inbox */
export type DeliveryDirection = "publish" | "reply";

/**
 * What happened when a message was dispatched.
 */
export interface DeliveryOutcome {
  readonly direction: DeliveryDirection;
  /** Handlers that completed */
  readonly delivered: number;
  /** Handlers that threw */
  readonly failed: number;
  readonly durationMs: number;
}

/**
 * Observer wrapped around every dispatch. `before` hooks run in registration
 * order, `after` hooks in reverse. Middleware cannot alter or drop messages.
 */
export interface BusMiddleware {
  readonly name: string;
  before?(message: Message, direction: DeliveryDirection): void;
  after?(message: Message, outcome: DeliveryOutcome): void;
}

/**
 * Ordered middleware list. A throwing hook is logged and skipped.
 */
export class MiddlewareChain {
  private readonly entries: BusMiddleware[] = [];

  constructor(private readonly logger?: Logger) {}

  use(middleware: BusMiddleware): void {
    this.entries.push(middleware);
  }

  runBefore(message: Message, direction: DeliveryDirection): void {
    for (const middleware of this.entries) {
      this.guard(middleware, "before", () => middleware.before?.(message, direction));
    }
  }

  runAfter(message: Message, outcome: DeliveryOutcome): void {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const middleware = this.entries[i];
      if (middleware) {
        this.guard(middleware, "after", () => middleware.after?.(message, outcome));
      }
    }
  }

  private guard(middleware: BusMiddleware, hook: "before" | "after", fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.logger?.warn(`Middleware "${middleware.name}" failed in ${hook}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

// ============================================
// Built-in middleware
// ============================================

/**
 * Debug-level trace of every message; warns when handlers fail.
 */
export class LoggingMiddleware implements BusMiddleware {
  readonly name = "logging";

  constructor(private readonly logger: Logger) {}

  before(message: Message, direction: DeliveryDirection): void {
    const source = message.headers.source ?? "bus";
    this.logger.debug(`[${source}] ${direction === "reply" ? "<-" : "->"} ${message.topic}`, {
      id: shortId(message.id),
      correlation: shortId(message.correlationId),
      chapter: message.headers.chapter,
    });
  }

  after(message: Message, outcome: DeliveryOutcome): void {
    if (outcome.failed > 0) {
      this.logger.warn(`${outcome.failed} handler(s) failed on ${message.topic}`, {
        id: shortId(message.id),
        delivered: outcome.delivered,
      });
    }
  }
}

export interface TopicMetrics {
  published: number;
  delivered: number;
  failed: number;
  totalDurationMs: number;
}

/**
 * Per-topic counters.
 */
export class MetricsMiddleware implements BusMiddleware {
  readonly name = "metrics";
  private readonly topics = new Map<string, TopicMetrics>();

  before(message: Message): void {
    this.entry(message.topic).published++;
  }

  after(message: Message, outcome: DeliveryOutcome): void {
    const metrics = this.entry(message.topic);
    metrics.delivered += outcome.delivered;
    metrics.failed += outcome.failed;
    metrics.totalDurationMs += outcome.durationMs;
  }

  snapshot(): Record<string, TopicMetrics> {
    const result: Record<string, TopicMetrics> = {};
    for (const [topic, metrics] of this.topics) {
      result[topic] = { ...metrics };
    }
    return result;
  }

  reset(): void {
    this.topics.clear();
  }

  private entry(topic: string): TopicMetrics {
    let metrics = this.topics.get(topic);
    if (!metrics) {
      metrics = { published: 0, delivered: 0, failed: 0, totalDurationMs: 0 };
      this.topics.set(topic, metrics);
    }
    return metrics;
  }
}

export interface JournalFilter {
  topic?: string;
  chapter?: number;
  correlationId?: string;
}

/**
 * In-memory record of dispatched messages, oldest first.
 */
export class MessageJournal implements BusMiddleware {
  readonly name = "journal";
  private readonly records: Message[] = [];

  /** @param maxEntries - oldest records are dropped past this size (0 = unbounded) */
  constructor(private readonly maxEntries = 0) {}

  before(message: Message): void {
    this.records.push(message);
    if (this.maxEntries > 0 && this.records.length > this.maxEntries) {
      this.records.splice(0, this.records.length - this.maxEntries);
    }
  }

  entries(filter: JournalFilter = {}): Message[] {
    return this.records.filter(
      (m) =>
        (filter.topic === undefined || m.topic === filter.topic) &&
        (filter.chapter === undefined || m.headers.chapter === filter.chapter) &&
        (filter.correlationId === undefined || m.correlationId === filter.correlationId)
    );
  }

  get size(): number {
    return this.records.length;
  }

  clear(): void {
    this.records.length = 0;
  }
}

/**
 * Appends one JSON line per message to `filePath`. Parent directories are
 * created on construction.
 */
export class JsonlJournalMiddleware implements BusMiddleware {
  readonly name = "jsonl-journal";

  constructor(private readonly filePath: string) {
    mkdirSync(dirname(filePath), { recursive: true });
  }

  before(message: Message, direction: DeliveryDirection): void {
    const record = {
      time: message.createdAt.toISOString(),
      direction,
      id: message.id,
      topic: message.topic,
      correlationId: message.correlationId,
      replyTo: message.replyTo,
      headers: message.headers,
      payload: message.payload,
    };
    appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }
}
