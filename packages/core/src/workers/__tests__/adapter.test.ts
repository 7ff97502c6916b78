import { setTimeout as delay } from "node:timers/promises";
import { afterEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { CancelledError, WorkerFailure } from "../../errors/index.js";
import { BUS_INBOX, createMessage, MessageBus } from "../../events/index.js";
import { RateLimiter } from "../../rate-limit/index.js";
import { WorkerAdapter } from "../adapter.js";
import type { InvokeContext, WorkerCollaborator } from "../types.js";

const PlanRequestSchema = z.object({ chapter: z.number().int().positive() });
type PlanRequest = z.infer<typeof PlanRequestSchema>;

function collaborator(impl: (request: PlanRequest, context: InvokeContext) => Promise<unknown>) {
  return { invoke: vi.fn(impl) };
}

describe("WorkerAdapter", () => {
  const adapters: WorkerAdapter<PlanRequest>[] = [];

  function start(
    bus: MessageBus,
    worker: WorkerCollaborator<PlanRequest>,
    extra: { rateLimiter?: RateLimiter; provider?: string } = {}
  ): WorkerAdapter<PlanRequest> {
    const adapter = new WorkerAdapter({
      name: "planner",
      bus,
      collaborator: worker,
      schema: PlanRequestSchema,
      ...extra,
    });
    adapter.start();
    adapters.push(adapter);
    return adapter;
  }

  afterEach(() => {
    for (const adapter of adapters.splice(0)) {
      adapter.stop();
    }
  });

  it("replies with the collaborator's value", async () => {
    const bus = new MessageBus();
    const worker = collaborator(async (req) => ({ title: `Chapter ${req.chapter}` }));
    start(bus, worker);

    const reply = await bus.request("worker.planner.request", { chapter: 2 }, { headers: { chapter: 2 } });

    expect(reply).toEqual({ ok: true, value: { title: "Chapter 2" } });
    expect(worker.invoke).toHaveBeenCalledWith(
      { chapter: 2 },
      expect.objectContaining({ chapter: 2, deadline: expect.any(Number) })
    );
  });

  it("reports WorkerFailure kinds", async () => {
    const bus = new MessageBus();
    start(
      bus,
      collaborator(async () => {
        throw new WorkerFailure("planner", "rate_limited", "quota exhausted");
      })
    );

    await expect(bus.request("worker.planner.request", { chapter: 1 })).resolves.toEqual({
      ok: false,
      error: { kind: "rate_limited", message: "quota exhausted" },
    });
  });

  it("treats other errors as provider errors", async () => {
    const bus = new MessageBus();
    start(
      bus,
      collaborator(async () => {
        throw new Error("socket hang up");
      })
    );

    await expect(bus.request("worker.planner.request", { chapter: 1 })).resolves.toEqual({
      ok: false,
      error: { kind: "provider_error", message: "socket hang up" },
    });
  });

  it("rejects payloads that fail the schema without calling the collaborator", async () => {
    const bus = new MessageBus();
    const worker = collaborator(async () => "unused");
    start(bus, worker);

    const reply = await bus.request("worker.planner.request", { chapter: "one" });

    expect(reply).toMatchObject({ ok: false, error: { kind: "invalid_request" } });
    expect(worker.invoke).not.toHaveBeenCalled();
  });

  it("replies deadline_exceeded and aborts the collaborator signal", async () => {
    const bus = new MessageBus();
    let seen: AbortSignal | undefined;
    const adapter = new WorkerAdapter({
      name: "planner",
      bus,
      schema: PlanRequestSchema,
      collaborator: collaborator(async (_req, ctx) => {
        seen = ctx.signal;
        await delay(50);
        return "late";
      }),
    });

    const request = createMessage("worker.planner.request", { chapter: 1 }, {
      correlationId: "corr-1",
      replyTo: BUS_INBOX,
      headers: { deadline: Date.now() + 10 },
    });
    const reply = await adapter.handle(request);

    expect(reply?.topic).toBe(BUS_INBOX);
    expect(reply?.correlationId).toBe("corr-1");
    expect(reply?.payload).toMatchObject({ ok: false, error: { kind: "deadline_exceeded" } });
    expect(seen?.aborted).toBe(true);
    expect(adapter.inFlight).toBe(0);
  });

  it("counts rate-limit waiting toward the deadline", async () => {
    const bus = new MessageBus();
    const limiter = new RateLimiter({ providers: { anthropic: { requestsPerMinute: 60, burst: 1 } } });
    const worker = collaborator(async () => "ok");
    const adapter = new WorkerAdapter({
      name: "planner",
      bus,
      schema: PlanRequestSchema,
      collaborator: worker,
      provider: "anthropic",
      rateLimiter: limiter,
    });

    const first = await adapter.handle(
      createMessage("worker.planner.request", { chapter: 1 }, { replyTo: BUS_INBOX })
    );
    const second = await adapter.handle(
      createMessage("worker.planner.request", { chapter: 2 }, {
        replyTo: BUS_INBOX,
        headers: { deadline: Date.now() + 30 },
      })
    );

    expect(first?.payload).toEqual({ ok: true, value: "ok" });
    expect(second?.payload).toMatchObject({ ok: false, error: { kind: "deadline_exceeded" } });
    expect(worker.invoke).toHaveBeenCalledTimes(1);
    limiter.dispose();
  });

  it("aborts the call when the caller cancels", async () => {
    const bus = new MessageBus();
    let seen: AbortSignal | undefined;
    const adapter = start(
      bus,
      collaborator(
        (_req, ctx) =>
          new Promise((_resolve, reject) => {
            seen = ctx.signal;
            ctx.signal.addEventListener("abort", () => reject(new CancelledError("stopped")));
          })
      )
    );

    const controller = new AbortController();
    const pending = bus.request("worker.planner.request", { chapter: 1 }, { signal: controller.signal });
    await vi.waitFor(() => expect(adapter.inFlight).toBe(1));

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    await vi.waitFor(() => expect(seen?.aborted).toBe(true));
    await bus.idle();
    expect(adapter.inFlight).toBe(0);
    expect(bus.stats().repliesDiscarded).toBe(1);
  });

  it("runs fire-and-forget requests without replying", async () => {
    const bus = new MessageBus();
    const worker = collaborator(async () => "done");
    const adapter = new WorkerAdapter({ name: "planner", bus, schema: PlanRequestSchema, collaborator: worker });

    const reply = await adapter.handle(createMessage("worker.planner.request", { chapter: 3 }));

    expect(reply).toBeUndefined();
    expect(worker.invoke).toHaveBeenCalledTimes(1);
  });

  it("handles requests concurrently", async () => {
    const bus = new MessageBus();
    let active = 0;
    let peak = 0;
    start(
      bus,
      collaborator(async (req) => {
        active++;
        peak = Math.max(peak, active);
        await delay(20);
        active--;
        return req.chapter;
      })
    );

    const replies = await Promise.all([
      bus.request("worker.planner.request", { chapter: 1 }),
      bus.request("worker.planner.request", { chapter: 2 }),
    ]);

    expect(replies).toEqual([
      { ok: true, value: 1 },
      { ok: true, value: 2 },
    ]);
    expect(peak).toBe(2);
  });

  it("stops listening after stop()", async () => {
    const bus = new MessageBus();
    const adapter = start(bus, collaborator(async () => "x"));

    adapter.stop();

    expect(adapter.isRunning).toBe(false);
    expect(bus.hasSubscribers("worker.planner.request")).toBe(false);
  });
});
