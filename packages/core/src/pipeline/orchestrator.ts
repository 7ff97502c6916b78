// ============================================
// Chapter Pipeline Orchestrator
// ============================================

import {
  AssemblyError,
  CancelledError,
  ConfigurationError,
  PersistenceError,
} from "../errors/index.js";
import type { MessageBus, TopicDefinition } from "../events/index.js";
import type { Logger } from "../logger/index.js";
import type { PersistenceCollaborator } from "../persistence/index.js";
import { assembleChapter } from "./assembler.js";
import {
  type ChapterOutline,
  type ChapterPhase,
  type ChapterSnapshot,
  type ChapterState,
  type ChapterStatus,
  type CharacterReaction,
  canTransition,
  createChapterState,
  type PhaseTransition,
  type ReviewFinding,
  snapshotChapter,
  unresolvedFindings,
} from "./chapter-state.js";
import { CharacterResolver } from "./character-resolver.js";
import {
  CharacterReplySchema,
  type CharacterRequest,
  type ComposeReply,
  ComposeReplySchema,
  type ComposeRequest,
  PlannerReplySchema,
  type PlannerRequest,
  ReviewReplySchema,
  type ReviewRequest,
  ReviseReplySchema,
  type ReviseRequest,
  WorldCheckReplySchema,
  type WorldCheckRequest,
} from "./contracts.js";
import { phaseChanged, stageCompleted } from "./events.js";
import {
  type StageCall,
  type StageDefinition,
  type StageIssue,
  type StageResult,
  StageRunner,
} from "./stage.js";
import { type PipelineSummary, PipelineTracker } from "./tracker.js";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Worker names serving each pipeline role.
 */
export interface RoleWorkers {
  readonly planner: string;
  readonly worldValidator: string;
  readonly composer: string;
  readonly consistencyReviewer: string;
  readonly qualityReviewer: string;
  readonly reviser: string;
}

export const DEFAULT_ROLES: RoleWorkers = {
  planner: "planner",
  worldValidator: "world-validator",
  composer: "composer",
  consistencyReviewer: "consistency-reviewer",
  qualityReviewer: "quality-reviewer",
  reviser: "reviser",
};

export interface CharacterProfile {
  readonly name: string;
  /** Defaults to `character:<name>` */
  readonly worker?: string;
  readonly description?: string;
}

export function characterWorkerName(profile: CharacterProfile): string {
  return profile.worker ?? `character:${profile.name}`;
}

/** Per-call timeouts in ms */
export interface StageTimeouts {
  readonly planning: number;
  readonly world: number;
  readonly character: number;
  readonly composing: number;
  readonly review: number;
  readonly revision: number;
}

export const DEFAULT_STAGE_TIMEOUTS: StageTimeouts = {
  planning: 120_000,
  world: 60_000,
  character: 60_000,
  composing: 180_000,
  review: 90_000,
  revision: 180_000,
};

export interface OrchestratorOptions {
  bus: MessageBus;
  persistence: PersistenceCollaborator;
  roles?: Partial<RoleWorkers>;
  characters?: readonly CharacterProfile[];
  /** Upper bound on revision rounds (default: 2) */
  maxRevisionRounds?: number;
  timeouts?: Partial<StageTimeouts>;
  /** Fan-out policy for the two multi-call stages (default: both parallel) */
  parallel?: { worldAndCharacters?: boolean; reviews?: boolean };
  logger?: Logger;
}

export interface RunChapterOptions {
  /** Finalized predecessor, used for continuity */
  previous?: ChapterSnapshot;
  signal?: AbortSignal;
}

// =============================================================================
// Result
// =============================================================================

export type ChapterFailureReason =
  | "cancelled"
  | "stage_failed"
  | "assembly"
  | "persistence"
  | "fatal_finding"
  | "configuration"
  | "error";

export interface ChapterFailure {
  /** Phase the chapter was in when it failed */
  readonly phase: ChapterPhase;
  readonly reason: ChapterFailureReason;
  readonly message: string;
  readonly error: Error;
}

export interface ChapterRunResult {
  readonly chapterNumber: number;
  readonly status: ChapterStatus;
  readonly phase: ChapterPhase;
  readonly failure?: ChapterFailure;
  readonly issues: readonly StageIssue[];
  readonly unresolvedFindings: readonly ReviewFinding[];
  readonly stageResults: readonly StageResult<unknown>[];
  /** Set once FINALIZING is reached, including when the commit failed */
  readonly snapshot?: ChapterSnapshot;
  readonly revisionRounds: number;
  readonly history: readonly PhaseTransition[];
  readonly timings: PipelineSummary;
}

// =============================================================================
// Internals
// =============================================================================

/**
 * Ends a run early with a specific reason.
 */
class ChapterAbort extends Error {
  constructor(
    readonly reason: ChapterFailureReason,
    message: string,
    readonly underlying?: Error
  ) {
    super(message);
    this.name = "ChapterAbort";
  }
}

interface RunContext {
  readonly state: ChapterState;
  readonly tracker: PipelineTracker;
  readonly stageResults: StageResult<unknown>[];
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
  snapshot?: ChapterSnapshot;
}

type ContextOutput =
  | { kind: "world"; notes: string[] }
  | { kind: "reaction"; reaction: CharacterReaction };

function describeIssues(result: StageResult<unknown>): string {
  return result.issues.map((issue) => `${issue.key}: ${issue.message}`).join("; ") || "no output";
}

// =============================================================================
// Orchestrator
// =============================================================================

/**
 * Drives one chapter through PLANNING → WORLD_AND_CHARACTERS → COMPOSING →
 * ASSEMBLING → REVIEWING → FINALIZING → DONE. Any phase may end in FAILED;
 * run() reports that in the result rather than throwing.
 *
 * @example
 * ```typescript
 * const orchestrator = new ChapterOrchestrator({ bus, persistence: store, logger });
 * const result = await orchestrator.run(3, { previous: chapterTwo.snapshot });
 *
 * if (result.failure?.reason === "persistence") {
 *   await orchestrator.retryFinalize(result);
 * }
 * ```
 */
export class ChapterOrchestrator {
  private readonly bus: MessageBus;
  private readonly persistence: PersistenceCollaborator;
  private readonly roles: RoleWorkers;
  private readonly characters: readonly CharacterProfile[];
  private readonly maxRevisionRounds: number;
  private readonly timeouts: StageTimeouts;
  private readonly parallelContext: boolean;
  private readonly parallelReviews: boolean;
  private readonly stages: StageRunner;
  private readonly logger?: Logger;

  constructor(options: OrchestratorOptions) {
    this.bus = options.bus;
    this.persistence = options.persistence;
    this.roles = { ...DEFAULT_ROLES, ...options.roles };
    this.characters = options.characters ?? [];
    this.maxRevisionRounds = options.maxRevisionRounds ?? 2;
    this.timeouts = { ...DEFAULT_STAGE_TIMEOUTS, ...options.timeouts };
    this.parallelContext = options.parallel?.worldAndCharacters ?? true;
    this.parallelReviews = options.parallel?.reviews ?? true;
    this.logger = options.logger;
    this.stages = new StageRunner(options.bus, { logger: options.logger });
  }

  /**
   * Every worker name this orchestrator may call.
   */
  requiredWorkers(): string[] {
    return [
      ...new Set([...Object.values(this.roles), ...this.characters.map(characterWorkerName)]),
    ];
  }

  async run(chapterNumber: number, options: RunChapterOptions = {}): Promise<ChapterRunResult> {
    const logger = this.logger?.forChapter(chapterNumber);
    const run: RunContext = {
      state: createChapterState(chapterNumber, options.previous),
      tracker: new PipelineTracker(),
      stageResults: [],
      signal: options.signal,
      logger,
    };

    logger?.info(`Chapter ${chapterNumber} started`);
    this.announce(phaseChanged, { chapter: chapterNumber, from: null, to: "PLANNING" }, chapterNumber);

    try {
      await this.plan(run);

      this.transition(run, "WORLD_AND_CHARACTERS");
      await this.gatherContext(run);

      this.transition(run, "COMPOSING");
      await this.compose(run);

      this.transition(run, "ASSEMBLING");
      this.assemble(run);

      this.transition(run, "REVIEWING");
      const status = await this.review(run);

      this.transition(run, "FINALIZING");
      run.snapshot = snapshotChapter(run.state, status);
      await this.commit(run, run.snapshot);

      run.state.status = status;
      this.transition(run, "DONE");
      logger?.info(`Chapter ${chapterNumber} finished: ${status}`, {
        revisionRounds: run.state.revisionRound,
        issues: run.state.issues.length,
      });
      return this.result(run);
    } catch (error) {
      return this.fail(run, error);
    }
  }

  /**
   * Re-commit the snapshot of a chapter whose FINALIZING failed. The snapshot
   * is committed unchanged.
   *
   * @throws Error if `result` did not fail in persistence
   */
  async retryFinalize(result: ChapterRunResult): Promise<ChapterRunResult> {
    const { snapshot, chapterNumber } = result;
    if (result.failure?.reason !== "persistence" || !snapshot) {
      throw new Error(`Chapter ${chapterNumber} has no snapshot awaiting persistence`);
    }

    const history = [...result.history];
    const move = (from: ChapterPhase, to: ChapterPhase, reason?: string): void => {
      history.push({ from, to, at: new Date(), ...(reason !== undefined && { reason }) });
      this.announce(phaseChanged, { chapter: chapterNumber, from, to, reason }, chapterNumber);
    };

    move("FAILED", "FINALIZING", "retry");
    try {
      await this.persistence.commit(chapterNumber, snapshot);
    } catch (error) {
      const failure = this.persistenceFailure(chapterNumber, error);
      move("FINALIZING", "FAILED", "persistence");
      this.logger?.error(`Chapter ${chapterNumber} retry failed: ${failure.message}`);
      return {
        ...result,
        failure: { phase: "FINALIZING", reason: "persistence", message: failure.message, error: failure },
        history,
      };
    }

    move("FINALIZING", "DONE");
    this.logger?.info(`Chapter ${chapterNumber} committed on retry`);
    return {
      chapterNumber,
      status: snapshot.status,
      phase: "DONE",
      issues: result.issues,
      unresolvedFindings: result.unresolvedFindings,
      stageResults: result.stageResults,
      snapshot,
      revisionRounds: result.revisionRounds,
      history,
      timings: result.timings,
    };
  }

  // ===========================================================================
  // Phases
  // ===========================================================================

  private async plan(run: RunContext): Promise<void> {
    const { state } = run;
    const result = await this.runStage(run, {
      name: "planning",
      policy: "sequential",
      bestEffort: false,
      calls: [
        {
          key: "outline",
          worker: this.roles.planner,
          timeoutMs: this.timeouts.planning,
          parse: PlannerReplySchema,
          buildPayload: () =>
            ({
              chapter: state.chapterNumber,
              characters: this.characters.map((c) => c.name),
              previousTitle: state.previous?.title,
              previousSummary: state.previous?.summary,
            }) satisfies PlannerRequest,
        },
      ],
    });

    const outline = result.outputs.outline;
    if (!outline) {
      throw new ChapterAbort("stage_failed", `Planning failed: ${describeIssues(result)}`);
    }

    state.outline = outline;
    if (this.characters.length > 0) {
      const resolver = new CharacterResolver(
        this.characters.map((c) => c.name),
        run.logger
      );
      state.activeCharacters = resolver.resolveAll([
        ...outline.characters,
        ...outline.scenes.flatMap((scene) => scene.characters),
      ]);
    }
  }

  private async gatherContext(run: RunContext): Promise<void> {
    const { state } = run;
    const outline = this.requireOutline(state);

    const calls: StageCall<ContextOutput>[] = [
      {
        key: "world",
        worker: this.roles.worldValidator,
        timeoutMs: this.timeouts.world,
        parse: WorldCheckReplySchema.transform((reply): ContextOutput => ({ kind: "world", notes: reply.notes })),
        buildPayload: () =>
          ({
            chapter: state.chapterNumber,
            outline,
            previousSummary: state.previous?.summary,
          }) satisfies WorldCheckRequest,
      },
    ];

    for (const name of state.activeCharacters) {
      const profile = this.characters.find((c) => c.name === name) ?? { name };
      calls.push({
        key: `character:${name}`,
        worker: characterWorkerName(profile),
        timeoutMs: this.timeouts.character,
        parse: CharacterReplySchema.transform(
          (reply): ContextOutput => ({
            kind: "reaction",
            reaction: { character: name, reaction: reply.reaction, intent: reply.intent },
          })
        ),
        buildPayload: () =>
          ({
            chapter: state.chapterNumber,
            character: name,
            description: profile.description,
            outline,
          }) satisfies CharacterRequest,
      });
    }

    const result = await this.runStage(run, {
      name: "world_and_characters",
      policy: this.parallelContext ? "parallel" : "sequential",
      bestEffort: true,
      calls,
    });

    for (const output of Object.values(result.outputs)) {
      if (output.kind === "world") {
        state.worldNotes = output.notes;
      } else {
        state.reactions[output.reaction.character] = output.reaction;
      }
    }

    if (result.status !== "success") {
      run.logger?.warn(`Continuing with partial context (${result.issues.length} missing)`);
    }
  }

  private async compose(run: RunContext): Promise<void> {
    const { state } = run;
    const outline = this.requireOutline(state);
    const reactions = Object.values(state.reactions);

    const result = await this.runStage(run, {
      name: "composing",
      policy: "sequential",
      bestEffort: false,
      calls: outline.scenes.map((scene, index): StageCall<ComposeReply> => ({
        key: `scene:${index}`,
        worker: this.roles.composer,
        timeoutMs: this.timeouts.composing,
        headers: { scene: index },
        parse: ComposeReplySchema,
        buildPayload: (previous) =>
          ({
            chapter: state.chapterNumber,
            sceneIndex: index,
            title: outline.title,
            scene,
            worldNotes: state.worldNotes,
            reactions,
            previousSceneText: previous?.text,
            previousChapterSummary: index === 0 ? state.previous?.summary : undefined,
          }) satisfies ComposeRequest,
      })),
    });

    if (result.status !== "success") {
      throw new ChapterAbort("stage_failed", `Composing failed: ${describeIssues(result)}`);
    }

    state.scenes = outline.scenes.flatMap((_scene, index) => {
      const composed = result.outputs[`scene:${index}`];
      return composed ? [{ index, text: composed.text }] : [];
    });
  }

  private assemble(run: RunContext): void {
    const { state } = run;
    const record = run.tracker.start(`assembling:${state.revisionRound}`);
    try {
      state.draft = assembleChapter(state.chapterNumber, this.requireOutline(state), state.scenes);
      run.tracker.complete(record);
    } catch (error) {
      run.tracker.fail(record, error instanceof Error ? error.message : String(error));
      throw error;
    }
  }

  /**
   * Review, revise and re-review until clean or out of budget.
   */
  private async review(run: RunContext): Promise<Exclude<ChapterStatus, "failed">> {
    const { state } = run;

    for (;;) {
      const { findings, complete } = await this.runReviews(run);
      state.findings = findings;
      const open = unresolvedFindings(findings);

      if (open.length === 0) {
        if (complete) return "done";
        run.logger?.warn("Finalizing without a complete review", { round: state.revisionRound });
        return "completed_with_warnings";
      }

      const budgetLeft = state.revisionRound < this.maxRevisionRounds;
      if (!budgetLeft || !(await this.revise(run, open))) {
        const fatal = open.find((finding) => finding.severity === "fatal");
        if (fatal) {
          throw new ChapterAbort("fatal_finding", `Unresolved fatal finding: ${fatal.description}`);
        }
        run.logger?.warn(`Finalizing with ${open.length} unresolved finding(s)`, {
          rounds: state.revisionRound,
        });
        return "completed_with_warnings";
      }

      this.transition(run, "ASSEMBLING", `revision ${state.revisionRound}`);
      this.assemble(run);
      this.transition(run, "REVIEWING");
    }
  }

  /**
   * `complete` is false when a reviewer failed or timed out.
   */
  private async runReviews(run: RunContext): Promise<{ findings: ReviewFinding[]; complete: boolean }> {
    const { state } = run;
    const outline = this.requireOutline(state);
    const draft = state.draft ?? "";

    const reviewCall = (key: string, worker: string): StageCall<ReviewFinding[]> => ({
      key,
      worker,
      timeoutMs: this.timeouts.review,
      parse: ReviewReplySchema.transform((reply) =>
        reply.findings.map((finding): ReviewFinding => ({ ...finding, sourceStage: key }))
      ),
      buildPayload: () =>
        ({
          chapter: state.chapterNumber,
          round: state.revisionRound,
          draft,
          outline,
        }) satisfies ReviewRequest,
    });

    const result = await this.runStage(run, {
      name: `reviewing:${state.revisionRound}`,
      policy: this.parallelReviews ? "parallel" : "sequential",
      bestEffort: true,
      calls: [
        reviewCall("consistency", this.roles.consistencyReviewer),
        reviewCall("quality", this.roles.qualityReviewer),
      ],
    });

    return { findings: Object.values(result.outputs).flat(), complete: result.status === "success" };
  }

  /**
   * One revision call with whole-scene replacements. Returns false when the
   * reviser produced nothing usable.
   */
  private async revise(run: RunContext, open: readonly ReviewFinding[]): Promise<boolean> {
    const { state } = run;
    const round = state.revisionRound + 1;
    const targeted = open.every((finding) => finding.sceneIndex !== undefined);
    const affected = new Set(
      targeted ? open.map((finding) => finding.sceneIndex) : state.scenes.map((scene) => scene.index)
    );

    const result = await this.runStage(run, {
      name: `revision:${round}`,
      policy: "sequential",
      bestEffort: false,
      calls: [
        {
          key: "revision",
          worker: this.roles.reviser,
          timeoutMs: this.timeouts.revision,
          parse: ReviseReplySchema,
          buildPayload: () =>
            ({
              chapter: state.chapterNumber,
              round,
              findings: [...open],
              scenes: state.scenes.filter((scene) => affected.has(scene.index)),
            }) satisfies ReviseRequest,
        },
      ],
    });

    const revision = result.outputs.revision;
    if (!revision) {
      return false;
    }

    const replacements = new Map<number, string>();
    for (const scene of revision.scenes) {
      if (scene.index < state.scenes.length) {
        replacements.set(scene.index, scene.text);
      } else {
        run.logger?.warn(`Reviser returned unknown scene ${scene.index}`);
      }
    }

    state.scenes = state.scenes.map((scene) => {
      const text = replacements.get(scene.index);
      return text === undefined ? scene : { index: scene.index, text };
    });
    state.revisionRound = round;
    return true;
  }

  private async commit(run: RunContext, snapshot: ChapterSnapshot): Promise<void> {
    this.throwIfCancelled(run);
    const record = run.tracker.start("finalizing");

    try {
      await this.persistence.commit(snapshot.chapterNumber, snapshot);
      run.tracker.complete(record);
    } catch (error) {
      const failure = this.persistenceFailure(snapshot.chapterNumber, error);
      run.tracker.fail(record, failure.message);
      throw new ChapterAbort("persistence", failure.message, failure);
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async runStage<TOut>(
    run: RunContext,
    definition: StageDefinition<TOut>
  ): Promise<StageResult<TOut>> {
    this.throwIfCancelled(run);
    const { state } = run;
    const record = run.tracker.start(definition.name);

    let result: StageResult<TOut>;
    try {
      result = await this.stages.run(definition, { signal: run.signal, chapter: state.chapterNumber });
    } catch (error) {
      run.tracker.fail(record, error instanceof Error ? error.message : String(error));
      throw error;
    }

    run.tracker.complete(record, result.status);
    run.stageResults.push(result);
    state.issues.push(...result.issues);
    this.announce(
      stageCompleted,
      {
        chapter: state.chapterNumber,
        stage: definition.name,
        status: result.status,
        issueCount: result.issues.length,
      },
      state.chapterNumber
    );
    return result;
  }

  private transition(run: RunContext, to: ChapterPhase, reason?: string): void {
    const { state } = run;
    const from = state.phase;
    if (!canTransition(from, to)) {
      throw new Error(`Invalid phase transition ${from} -> ${to}`);
    }

    state.phase = to;
    state.history.push({ from, to, at: new Date(), ...(reason !== undefined && { reason }) });
    run.logger?.debug(`${from} -> ${to}`, reason !== undefined ? { reason } : undefined);
    this.announce(phaseChanged, { chapter: state.chapterNumber, from, to, reason }, state.chapterNumber);
  }

  /**
   * Fire-and-forget lifecycle notice. A bus that refuses the message does not
   * affect the chapter.
   */
  private announce<T>(topic: TopicDefinition<T>, payload: T, chapter: number): void {
    try {
      this.bus.emit(topic, payload, { chapter, source: "orchestrator" });
    } catch (error) {
      this.logger?.warn(`Could not publish ${topic.name}`, {
        chapter,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private fail(run: RunContext, error: unknown): ChapterRunResult {
    const { state } = run;
    const phase = state.phase;
    const failure = this.classify(phase, error);

    state.status = "failed";
    if (canTransition(phase, "FAILED")) {
      this.transition(run, "FAILED", failure.reason);
    }

    run.logger?.error(`Chapter ${state.chapterNumber} failed in ${phase}: ${failure.message}`, {
      reason: failure.reason,
    });
    return this.result(run, failure);
  }

  private classify(phase: ChapterPhase, error: unknown): ChapterFailure {
    if (error instanceof ChapterAbort) {
      return { phase, reason: error.reason, message: error.message, error: error.underlying ?? error };
    }

    const err = error instanceof Error ? error : new Error(String(error));
    const reason: ChapterFailureReason =
      err instanceof CancelledError
        ? "cancelled"
        : err instanceof AssemblyError
          ? "assembly"
          : err instanceof ConfigurationError
            ? "configuration"
            : err instanceof PersistenceError
              ? "persistence"
              : "error";
    return { phase, reason, message: err.message, error: err };
  }

  private persistenceFailure(chapterNumber: number, error: unknown): PersistenceError {
    if (error instanceof PersistenceError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new PersistenceError(chapterNumber, `Commit failed: ${message}`, { cause: error });
  }

  private result(run: RunContext, failure?: ChapterFailure): ChapterRunResult {
    const { state } = run;
    return {
      chapterNumber: state.chapterNumber,
      status: state.status ?? "failed",
      phase: state.phase,
      ...(failure && { failure }),
      issues: [...state.issues],
      unresolvedFindings: unresolvedFindings(state.findings),
      stageResults: [...run.stageResults],
      ...(run.snapshot && { snapshot: run.snapshot }),
      revisionRounds: state.revisionRound,
      history: [...state.history],
      timings: run.tracker.summary(),
    };
  }

  private requireOutline(state: ChapterState): ChapterOutline {
    if (!state.outline) {
      throw new Error(`Chapter ${state.chapterNumber} has no outline in ${state.phase}`);
    }
    return state.outline;
  }

  private throwIfCancelled(run: RunContext): void {
    if (run.signal?.aborted) {
      throw new CancelledError(`Chapter ${run.state.chapterNumber} cancelled`);
    }
  }
}
