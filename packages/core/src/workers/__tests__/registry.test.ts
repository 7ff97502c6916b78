import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { CancelledError, ConfigurationError, ErrorCode } from "../../errors/index.js";
import { MessageBus } from "../../events/index.js";
import { WorkerRegistry } from "../registry.js";
import type { InvokeContext } from "../types.js";

const echo = { invoke: async (request: unknown) => request };

describe("WorkerRegistry", () => {
  it("registers adapters on worker request topics", async () => {
    const bus = new MessageBus();
    const registry = new WorkerRegistry(bus);

    registry.register("composer", echo, { schema: z.unknown() });

    expect(registry.topicFor("composer")).toBe("worker.composer.request");
    expect(registry.has("composer")).toBe(true);
    expect(registry.names()).toEqual(["composer"]);
    expect(registry.get("composer")?.isRunning).toBe(true);
    await expect(bus.request("worker.composer.request", "draft")).resolves.toEqual({
      ok: true,
      value: "draft",
    });
  });

  it("refuses duplicate names", () => {
    const registry = new WorkerRegistry(new MessageBus());
    registry.register("composer", echo, { schema: z.unknown() });

    expect(() => registry.register("composer", echo, { schema: z.unknown() })).toThrow(
      'Worker "composer" is already registered'
    );
  });

  it("lists every missing worker", () => {
    const registry = new WorkerRegistry(new MessageBus());
    registry.register("planner", echo, { schema: z.unknown() });

    let caught: unknown;
    try {
      registry.assertRegistered(["planner", "composer", "reviser", "composer"]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      message: "Missing worker adapters: composer, reviser",
      code: ErrorCode.CONFIG_MISSING_WORKER,
      issues: [
        { path: "workers.composer", message: "no adapter registered" },
        { path: "workers.reviser", message: "no adapter registered" },
      ],
    });
  });

  it("routes cancellation on a single-handler bus", async () => {
    const bus = new MessageBus({ singleHandlerTopics: true });
    const registry = new WorkerRegistry(bus);
    let seen: AbortSignal | undefined;

    registry.register("planner", echo, { schema: z.unknown() });
    const composer = registry.register(
      "composer",
      {
        invoke: (_request: unknown, context: InvokeContext) =>
          new Promise((_resolve, reject) => {
            seen = context.signal;
            context.signal.addEventListener("abort", () => reject(new CancelledError()));
          }),
      },
      { schema: z.unknown() }
    );

    const controller = new AbortController();
    const pending = bus.request("worker.composer.request", null, { signal: controller.signal });
    await vi.waitFor(() => expect(composer.inFlight).toBe(1));
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    await vi.waitFor(() => expect(seen?.aborted).toBe(true));
  });

  it("stops every adapter", async () => {
    const bus = new MessageBus();
    const registry = new WorkerRegistry(bus);
    registry.register("planner", echo, { schema: z.unknown() });

    registry.stopAll();

    expect(registry.names()).toEqual([]);
    await expect(bus.request("worker.planner.request", null)).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});
