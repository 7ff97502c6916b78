// ============================================
// Stage Execution
// ============================================

import type { z } from "zod";
import {
  CancelledError,
  ConfigurationError,
  TimeoutError,
  type WorkerFailureKind,
} from "../errors/index.js";
import { type MessageBus, type MessageHeaders, workerRequestTopic } from "../events/index.js";
import type { Logger } from "../logger/index.js";
import { WorkerReplySchema } from "../workers/index.js";

export type StagePolicy = "sequential" | "parallel";
export type StageStatus = "success" | "partial" | "failure";

/**
 * One worker request inside a stage.
 */
export interface StageCall<TOut> {
  /** Output key; unique within the stage */
  readonly key: string;
  readonly worker: string;
  readonly timeoutMs?: number;
  /**
   * Payload for this call. Sequential stages pass the previous successful
   * output; parallel stages always pass undefined.
   */
  buildPayload(previous: TOut | undefined): unknown;
  /** Validates the worker's value into the stage output type */
  readonly parse: z.ZodType<TOut, z.ZodTypeDef, unknown>;
  readonly headers?: Pick<MessageHeaders, "scene">;
}

export interface StageDefinition<TOut> {
  readonly name: string;
  readonly policy: StagePolicy;
  /** Failed calls become issues instead of failing the stage */
  readonly bestEffort: boolean;
  readonly calls: readonly StageCall<TOut>[];
}

/**
 * A call that produced no output.
 */
export interface StageIssue {
  readonly stage: string;
  readonly key: string;
  readonly worker: string;
  /** "TimeoutError", "WorkerFailure", or the thrown error's name */
  readonly errorName: string;
  readonly kind?: WorkerFailureKind;
  readonly message: string;
}

export interface StageResult<TOut> {
  readonly stageName: string;
  readonly status: StageStatus;
  /** Successful outputs keyed by call key, in declaration order */
  readonly outputs: Readonly<Record<string, TOut>>;
  /** In declaration order */
  readonly issues: readonly StageIssue[];
}

export interface StageRunContext {
  signal?: AbortSignal;
  chapter?: number;
}

export interface StageRunnerOptions {
  logger?: Logger;
  /** Per-call timeout when the call names none (default: 60000) */
  defaultTimeoutMs?: number;
}

type CallOutcome<TOut> = { ok: true; value: TOut } | { ok: false; issue: StageIssue };

const DEFAULT_CALL_TIMEOUT_MS = 60_000;

/**
 * Runs stage definitions over the bus. Merging is deterministic: outputs and
 * issues follow call declaration order regardless of completion order.
 *
 * @example
 * ```typescript
 * const runner = new StageRunner(bus, { logger });
 * const result = await runner.run({
 *   name: "reviews",
 *   policy: "parallel",
 *   bestEffort: true,
 *   calls: [consistencyCall, qualityCall],
 * }, { chapter: 4, signal });
 * ```
 */
export class StageRunner {
  private readonly logger?: Logger;
  private readonly defaultTimeoutMs: number;

  constructor(
    private readonly bus: MessageBus,
    options: StageRunnerOptions = {}
  ) {
    this.logger = options.logger;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
  }

  /**
   * @throws CancelledError if the context signal aborts
   * @throws ConfigurationError if a call targets a worker with no adapter
   */
  async run<TOut>(stage: StageDefinition<TOut>, context: StageRunContext = {}): Promise<StageResult<TOut>> {
    if (context.signal?.aborted) {
      throw new CancelledError(`Stage ${stage.name} cancelled`);
    }

    const timer = this.logger?.forStage(stage.name).time(`stage ${stage.name}`);
    const outcomes =
      stage.policy === "parallel"
        ? await Promise.all(stage.calls.map((call) => this.call(stage, call, undefined, context)))
        : await this.runSequential(stage, context);

    const outputs: Record<string, TOut> = {};
    const issues: StageIssue[] = [];
    for (const [index, outcome] of outcomes.entries()) {
      const call = stage.calls[index];
      if (!call) continue;
      if (outcome.ok) {
        outputs[call.key] = outcome.value;
      } else {
        issues.push(outcome.issue);
      }
    }

    const status = this.statusOf(stage, outcomes);
    timer?.end(`Stage ${stage.name} finished: ${status}`, { calls: stage.calls.length, issues: issues.length });
    return { stageName: stage.name, status, outputs, issues };
  }

  private async runSequential<TOut>(
    stage: StageDefinition<TOut>,
    context: StageRunContext
  ): Promise<CallOutcome<TOut>[]> {
    const outcomes: CallOutcome<TOut>[] = [];
    let previous: TOut | undefined;

    for (const call of stage.calls) {
      const outcome = await this.call(stage, call, previous, context);
      outcomes.push(outcome);

      if (outcome.ok) {
        previous = outcome.value;
      } else if (!stage.bestEffort) {
        break;
      }
    }
    return outcomes;
  }

  private statusOf<TOut>(stage: StageDefinition<TOut>, outcomes: readonly CallOutcome<TOut>[]): StageStatus {
    const failures = outcomes.filter((o) => !o.ok).length;
    const completed = outcomes.length - failures;

    if (failures === 0 && outcomes.length === stage.calls.length) {
      return "success";
    }
    if (!stage.bestEffort || completed === 0) {
      return "failure";
    }
    return "partial";
  }

  private async call<TOut>(
    stage: StageDefinition<TOut>,
    call: StageCall<TOut>,
    previous: TOut | undefined,
    context: StageRunContext
  ): Promise<CallOutcome<TOut>> {
    const issue = (errorName: string, message: string, kind?: WorkerFailureKind): CallOutcome<TOut> => {
      this.logger?.warn(`${stage.name}/${call.key} failed: ${message}`, { worker: call.worker, errorName });
      return {
        ok: false,
        issue: {
          stage: stage.name,
          key: call.key,
          worker: call.worker,
          errorName,
          ...(kind !== undefined && { kind }),
          message,
        },
      };
    };

    let raw: unknown;
    try {
      raw = await this.bus.request(workerRequestTopic(call.worker), call.buildPayload(previous), {
        timeoutMs: call.timeoutMs ?? this.defaultTimeoutMs,
        signal: context.signal,
        headers: { chapter: context.chapter, source: stage.name, ...call.headers },
      });
    } catch (error) {
      if (error instanceof CancelledError || error instanceof ConfigurationError) {
        throw error;
      }
      if (error instanceof TimeoutError) {
        return issue("TimeoutError", error.message, "deadline_exceeded");
      }
      const err = error instanceof Error ? error : new Error(String(error));
      return issue(err.name, err.message, "provider_error");
    }

    const reply = WorkerReplySchema.safeParse(raw);
    if (!reply.success) {
      return issue("WorkerFailure", "Malformed reply envelope", "invalid_response");
    }

    if (!reply.data.ok) {
      const { kind, message } = reply.data.error;
      if (kind === "cancelled" && context.signal?.aborted) {
        throw new CancelledError(`Stage ${stage.name} cancelled`);
      }
      return issue(kind === "deadline_exceeded" ? "TimeoutError" : "WorkerFailure", message, kind);
    }

    const parsed = call.parse.safeParse(reply.data.value);
    if (!parsed.success) {
      return issue("WorkerFailure", `Invalid output: ${parsed.error.message}`, "invalid_response");
    }
    return { ok: true, value: parsed.data };
  }
}
