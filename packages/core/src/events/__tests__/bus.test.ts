import { setTimeout as delay } from "node:timers/promises";
import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import {
  CancelledError,
  ConfigurationError,
  DuplicateSubscriptionError,
  TimeoutError,
} from "../../errors/index.js";
import { Logger, MemoryTransport } from "../../logger/index.js";
import { MessageBus } from "../bus.js";
import { createMessage, createReply, type Message } from "../message.js";
import type { BusMiddleware } from "../middleware.js";
import { BUS_CANCEL, defineTopic } from "../topics.js";

function createTestLogger(): { logger: Logger; memory: MemoryTransport } {
  const memory = new MemoryTransport();
  return { logger: new Logger({ level: "debug", transports: [memory] }), memory };
}

describe("MessageBus", () => {
  describe("publish()", () => {
    it("delivers asynchronously", async () => {
      const bus = new MessageBus();
      const handler = vi.fn();
      bus.subscribe("t", handler);

      bus.publish(createMessage("t", 1));
      expect(handler).not.toHaveBeenCalled();

      await bus.idle();
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it("keeps handler failures away from the publisher and siblings", async () => {
      const { logger, memory } = createTestLogger();
      const bus = new MessageBus({ logger });
      const sibling = vi.fn();

      bus.subscribe("t", () => {
        throw new Error("sync boom");
      });
      bus.subscribe("t", async () => {
        throw new Error("async boom");
      });
      bus.subscribe("t", sibling);

      expect(() => bus.publish(createMessage("t", "x"))).not.toThrow();
      await bus.idle();

      expect(sibling).toHaveBeenCalledTimes(1);
      expect(bus.stats().handlerFailures).toBe(2);
      expect(memory.filter("error").map((e) => e.message)).toEqual([
        "Handler failed on t",
        "Handler failed on t",
      ]);
    });

    it("delivers messages on one topic in publish order", async () => {
      const bus = new MessageBus();
      const seen: number[] = [];
      bus.subscribe("t", (msg) => {
        if (typeof msg.payload === "number") seen.push(msg.payload);
      });

      for (let i = 1; i <= 5; i++) {
        bus.publish(createMessage("t", i));
      }
      await bus.idle();

      expect(seen).toEqual([1, 2, 3, 4, 5]);
    });

    it("starts all handlers together in parallel dispatch", async () => {
      const bus = new MessageBus({ dispatch: "parallel" });
      const log: string[] = [];

      bus.subscribe("t", async () => {
        await delay(20);
        log.push("slow");
      });
      bus.subscribe("t", () => {
        log.push("fast");
      });

      bus.publish(createMessage("t", null));
      await bus.idle();

      expect(log).toEqual(["fast", "slow"]);
    });

    it("runs handlers one after another in sequential dispatch", async () => {
      const bus = new MessageBus({ dispatch: "sequential" });
      const log: string[] = [];

      bus.subscribe("t", async (msg) => {
        if (msg.payload === 1) await delay(20);
        log.push(`a:${String(msg.payload)}`);
      });
      bus.subscribe("t", (msg) => {
        log.push(`b:${String(msg.payload)}`);
      });

      bus.publish(createMessage("t", 1));
      bus.publish(createMessage("t", 2));
      await bus.idle();

      expect(log).toEqual(["a:1", "b:1", "a:2", "b:2"]);
    });

    it("rejects duplicate subscribers when single-handler topics are enforced", () => {
      const bus = new MessageBus({ singleHandlerTopics: true });
      bus.subscribe("worker.planner.request", vi.fn());

      expect(() => bus.subscribe("worker.planner.request", vi.fn())).toThrow(
        DuplicateSubscriptionError
      );
    });
  });

  describe("middleware", () => {
    it("runs before hooks in order and after hooks in reverse", async () => {
      const order: string[] = [];
      const make = (name: string): BusMiddleware => ({
        name,
        before: () => order.push(`${name}:before`),
        after: () => order.push(`${name}:after`),
      });

      const bus = new MessageBus({ middleware: [make("outer")] });
      bus.use(make("inner"));
      bus.subscribe("t", () => {
        order.push("handler");
      });

      bus.publish(createMessage("t", null));
      await bus.idle();

      expect(order).toEqual([
        "outer:before",
        "inner:before",
        "handler",
        "inner:after",
        "outer:after",
      ]);
    });

    it("reports delivery counts to after hooks", async () => {
      const after = vi.fn();
      const bus = new MessageBus({ middleware: [{ name: "probe", after }] });
      bus.subscribe("t", () => undefined);
      bus.subscribe("t", () => {
        throw new Error("nope");
      });

      bus.publish(createMessage("t", null));
      await bus.idle();

      expect(after).toHaveBeenCalledWith(
        expect.objectContaining({ topic: "t" }),
        expect.objectContaining({ direction: "publish", delivered: 1, failed: 1 })
      );
    });

    it("survives a throwing middleware", async () => {
      const handler = vi.fn();
      const bus = new MessageBus({
        middleware: [
          {
            name: "broken",
            before: () => {
              throw new Error("middleware bug");
            },
          },
        ],
      });
      bus.subscribe("t", handler);

      bus.publish(createMessage("t", null));
      await bus.idle();

      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  describe("emit() / on()", () => {
    const sceneDone = defineTopic("scene.done", z.object({ scene: z.number() }));

    it("delivers typed payloads", async () => {
      const bus = new MessageBus();
      const handler = vi.fn();
      bus.on(sceneDone, handler);

      bus.emit(sceneDone, { scene: 2 }, { chapter: 1 });
      await bus.idle();

      expect(handler).toHaveBeenCalledWith({ scene: 2 }, expect.objectContaining({ topic: "scene.done" }));
    });

    it("validates payloads in debug mode", () => {
      const bus = new MessageBus({ debug: true });

      expect(() => bus.emit(sceneDone, { scene: 1 })).not.toThrow();
      expect(() => bus.emit(sceneDone, { scene: Number.NaN })).toThrow(
        /MessageBus validation failed for topic "scene.done"/
      );
    });

    it("drops payloads that fail the subscriber's schema", async () => {
      const { logger, memory } = createTestLogger();
      const bus = new MessageBus({ logger });
      const handler = vi.fn();
      bus.on(sceneDone, handler);

      bus.publish(createMessage("scene.done", { scene: "two" }));
      await bus.idle();

      expect(handler).not.toHaveBeenCalled();
      expect(memory.filter("warn").map((e) => e.message)).toEqual(["Dropped invalid payload on scene.done"]);
    });
  });

  describe("request()", () => {
    it("resolves with the correlated reply", async () => {
      const bus = new MessageBus();
      bus.subscribe("worker.planner.request", (msg) => {
        bus.publish(createReply(msg, { outline: `chapter ${String(msg.payload)}` }));
      });

      await expect(bus.request("worker.planner.request", 3)).resolves.toEqual({
        outline: "chapter 3",
      });
      expect(bus.pendingCount).toBe(0);
    });

    it("stamps a deadline header on the request", async () => {
      const bus = new MessageBus();
      let received: Message | undefined;
      bus.subscribe("worker.planner.request", (msg) => {
        received = msg;
        bus.publish(createReply(msg, null));
      });

      const before = Date.now();
      await bus.request("worker.planner.request", null, { timeoutMs: 5_000, headers: { chapter: 2 } });

      expect(received?.replyTo).toBe("bus.inbox");
      expect(received?.headers.chapter).toBe(2);
      expect(received?.headers.deadline).toBeGreaterThanOrEqual(before + 5_000);
    });

    it("keeps the first reply and discards duplicates", async () => {
      const { logger, memory } = createTestLogger();
      const bus = new MessageBus({ logger });
      bus.subscribe("worker.planner.request", (msg) => {
        bus.publish(createReply(msg, "first"));
        bus.publish(createReply(msg, "second"));
      });

      await expect(bus.request("worker.planner.request", null)).resolves.toBe("first");
      await bus.idle();

      expect(bus.stats()).toMatchObject({ repliesMatched: 1, repliesDiscarded: 1, pending: 0 });
      expect(memory.filter("warn").map((e) => e.message)).toEqual(["Discarded late or duplicate reply"]);
    });

    it("rejects with TimeoutError and leaves no pending entry", async () => {
      const bus = new MessageBus();
      bus.subscribe("worker.slow.request", () => undefined);

      const requests = Array.from({ length: 20 }, () =>
        bus.request("worker.slow.request", null, { timeoutMs: 10 })
      );
      const results = await Promise.allSettled(requests);

      expect(results.every((r) => r.status === "rejected" && r.reason instanceof TimeoutError)).toBe(true);
      expect(bus.pendingCount).toBe(0);
      expect(bus.stats().timedOut).toBe(20);
    });

    it("discards a reply that arrives after the timeout", async () => {
      const bus = new MessageBus();
      bus.subscribe("worker.slow.request", async (msg) => {
        await delay(40);
        bus.publish(createReply(msg, "too late"));
      });

      await expect(bus.request("worker.slow.request", null, { timeoutMs: 10 })).rejects.toThrow(
        'No response on "worker.slow.request" within 10ms'
      );
      await bus.idle();

      expect(bus.stats()).toMatchObject({ repliesMatched: 0, repliesDiscarded: 1, pending: 0 });
    });

    it("cancels on abort and publishes a cancellation notice", async () => {
      const bus = new MessageBus();
      let request: Message | undefined;
      const onCancel = vi.fn();
      bus.subscribe("worker.composer.request", (msg) => {
        request = msg;
      });
      bus.subscribe(BUS_CANCEL, onCancel);

      const controller = new AbortController();
      const pending = bus.request("worker.composer.request", null, { signal: controller.signal });
      await bus.idle();
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
      await bus.idle();

      expect(bus.pendingCount).toBe(0);
      expect(onCancel).toHaveBeenCalledTimes(1);
      expect(onCancel.mock.calls[0]?.[0]).toMatchObject({
        topic: BUS_CANCEL,
        payload: { correlationId: request?.correlationId, reason: "aborted by caller" },
      });
    });

    it("rejects immediately with an already-aborted signal", async () => {
      const bus = new MessageBus();
      bus.subscribe("worker.composer.request", vi.fn());

      await expect(
        bus.request("worker.composer.request", null, { signal: AbortSignal.abort() })
      ).rejects.toBeInstanceOf(CancelledError);
      expect(bus.pendingCount).toBe(0);
    });

    it("fails fast with ConfigurationError when nobody serves the topic", async () => {
      const bus = new MessageBus();

      await expect(bus.request("worker.missing.request", null)).rejects.toBeInstanceOf(
        ConfigurationError
      );
    });
  });

  describe("dispose()", () => {
    it("cancels pending requests and refuses further publishes", async () => {
      const bus = new MessageBus();
      bus.subscribe("worker.slow.request", () => undefined);

      const pending = bus.request("worker.slow.request", null, { timeoutMs: 10_000 });
      bus.dispose();

      await expect(pending).rejects.toThrow('Request on "worker.slow.request" cancelled: bus disposed');
      expect(bus.pendingCount).toBe(0);
      expect(() => bus.publish(createMessage("t", null))).toThrow("MessageBus is disposed");
    });
  });
});
