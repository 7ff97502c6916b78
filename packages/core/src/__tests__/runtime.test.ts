import { afterEach, describe, expect, it, vi } from "vitest";
import { QuillworkConfigSchema } from "../config/index.js";
import { ConfigurationError, ErrorCode } from "../errors/index.js";
import { Logger, MemoryTransport } from "../logger/index.js";
import { InMemoryChapterStore } from "../persistence/index.js";
import { ComposeRequestSchema } from "../pipeline/index.js";
import { createPipelineRuntime, type PipelineRuntime } from "../runtime.js";
import type { WorkerCollaborator } from "../workers/index.js";

function collaborators(): Record<string, WorkerCollaborator> {
  return {
    planner: { invoke: vi.fn(async () => ({ title: "Crossing", scenes: [{ summary: "The ford" }] })) },
    "world-validator": { invoke: async () => ({ notes: ["Low water"] }) },
    composer: {
      invoke: async (payload) => ({ text: `Chapter ${ComposeRequestSchema.parse(payload).chapter}` }),
    },
    "consistency-reviewer": { invoke: async () => ({ findings: [] }) },
    "quality-reviewer": { invoke: async () => ({ findings: [] }) },
    reviser: { invoke: async () => ({ scenes: [] }) },
  };
}

describe("createPipelineRuntime", () => {
  const runtimes: PipelineRuntime[] = [];
  const logger = new Logger({ level: "warn", transports: [new MemoryTransport()] });

  afterEach(() => {
    for (const runtime of runtimes.splice(0)) {
      runtime.dispose();
    }
  });

  it("runs chapters end to end with default settings", async () => {
    const store = new InMemoryChapterStore();
    const runtime = createPipelineRuntime({ workers: collaborators(), persistence: store, logger });
    runtimes.push(runtime);

    const report = await runtime.run([1, 2]);
    await runtime.bus.idle();

    expect(report.counts).toEqual({ done: 2, completed_with_warnings: 0, failed: 0, skipped: 0 });
    expect(store.latest(2)?.snapshot.text).toBe("## Chapter 2: Crossing\n\nChapter 2");
    expect(runtime.journal?.entries({ topic: "pipeline.phase", chapter: 1 })).toHaveLength(7);
    expect(runtime.metrics.snapshot()["pipeline.phase"]?.published).toBe(14);
    expect(runtime.metrics.snapshot()["scheduler.chapter"]?.published).toBe(2);
  });

  it("validates worker requests against the role's schema", async () => {
    const workers = collaborators();
    const runtime = createPipelineRuntime({ workers, logger });
    runtimes.push(runtime);

    const reply = await runtime.bus.request("worker.planner.request", { chapter: "one" });

    expect(reply).toMatchObject({ ok: false, error: { kind: "invalid_request" } });
    expect(workers.planner?.invoke).not.toHaveBeenCalled();
  });

  it("rejects a configuration whose workers are missing", () => {
    const { reviser: _reviser, ...workers } = collaborators();
    const config = QuillworkConfigSchema.parse({ characters: [{ name: "Mira" }] });

    let thrown: unknown;
    try {
      createPipelineRuntime({ config, workers, logger });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigurationError);
    expect(thrown).toMatchObject({
      code: ErrorCode.CONFIG_MISSING_WORKER,
      message: "Missing worker adapters: reviser, character:Mira",
    });
  });

  it("requires collaborators for configured worker settings", () => {
    const config = QuillworkConfigSchema.parse({ workers: { illustrator: { timeoutMs: 1000 } } });

    expect(() => createPipelineRuntime({ config, workers: collaborators(), logger })).toThrow(
      "Missing worker adapters: illustrator"
    );
  });

  it("stops accepting work after dispose", () => {
    const runtime = createPipelineRuntime({ workers: collaborators(), logger });
    runtime.dispose();

    expect(runtime.workers.names()).toEqual([]);
    expect(() => runtime.bus.subscribe("pipeline.phase", () => {})).toThrow("MessageBus is disposed");
  });
});
