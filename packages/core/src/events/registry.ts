// ============================================
// Subscription Registry
// ============================================

import { createId } from "@quillwork/shared";
import { DuplicateSubscriptionError } from "../errors/index.js";
import type { Message } from "./message.js";

export type MessageHandler = (message: Message) => void | Promise<void>;

/**
 * Handle returned from subscribe(). Unsubscribing twice is a no-op.
 */
export interface Subscription {
  readonly id: string;
  readonly topic: string;
  readonly priority: number;
  unsubscribe(): void;
}

export interface SubscriptionRegistryOptions {
  /** Reject a second handler on any topic */
  singleHandlerTopics?: boolean;
}

interface Entry {
  readonly id: string;
  readonly topic: string;
  readonly priority: number;
  readonly sequence: number;
  readonly handler: MessageHandler;
}

/**
 * Topic to handler index. Handlers are kept sorted by priority (higher first),
 * then by registration order.
 */
export class SubscriptionRegistry {
  private readonly byTopic = new Map<string, Entry[]>();
  private readonly byId = new Map<string, Entry>();
  private sequence = 0;
  private readonly singleHandlerTopics: boolean;

  constructor(options: SubscriptionRegistryOptions = {}) {
    this.singleHandlerTopics = options.singleHandlerTopics ?? false;
  }

  /**
   * @throws DuplicateSubscriptionError in single-handler mode when the topic is taken
   */
  add(topic: string, handler: MessageHandler, priority = 0): Subscription {
    const entries = this.byTopic.get(topic) ?? [];
    if (this.singleHandlerTopics && entries.length > 0) {
      throw new DuplicateSubscriptionError(topic);
    }

    const entry: Entry = { id: createId(), topic, priority, sequence: this.sequence++, handler };
    const index = entries.findIndex((existing) => existing.priority < priority);
    if (index === -1) {
      entries.push(entry);
    } else {
      entries.splice(index, 0, entry);
    }

    this.byTopic.set(topic, entries);
    this.byId.set(entry.id, entry);

    return {
      id: entry.id,
      topic,
      priority,
      unsubscribe: () => {
        this.remove(entry.id);
      },
    };
  }

  remove(subscriptionId: string): boolean {
    const entry = this.byId.get(subscriptionId);
    if (!entry) {
      return false;
    }

    this.byId.delete(subscriptionId);
    const remaining = (this.byTopic.get(entry.topic) ?? []).filter((e) => e.id !== subscriptionId);
    if (remaining.length === 0) {
      this.byTopic.delete(entry.topic);
    } else {
      this.byTopic.set(entry.topic, remaining);
    }
    return true;
  }

  /**
   * Snapshot of handlers for `topic` in delivery order.
   */
  handlersFor(topic: string): readonly MessageHandler[] {
    return (this.byTopic.get(topic) ?? []).map((entry) => entry.handler);
  }

  has(topic: string): boolean {
    return this.byTopic.has(topic);
  }

  topics(): string[] {
    return [...this.byTopic.keys()];
  }

  get size(): number {
    return this.byId.size;
  }

  clear(): void {
    this.byTopic.clear();
    this.byId.clear();
  }
}
