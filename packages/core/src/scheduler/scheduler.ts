// ============================================
// Chapter Scheduler
// ============================================

import { ConfigurationError, ErrorCode, PersistenceError, withRetry } from "../errors/index.js";
import type { MessageBus } from "../events/index.js";
import type { Logger } from "../logger/index.js";
import {
  type ChapterOrchestrator,
  type ChapterRunResult,
  type ChapterSnapshot,
  type ChapterStatus,
  chapterSettled,
} from "../pipeline/index.js";

// =============================================================================
// Types
// =============================================================================

/**
 * A chapter number, or a chapter with explicit dependencies.
 */
export type ChapterJob = number | { readonly chapter: number; readonly dependsOn?: readonly number[] };

export type ChapterOutcome = ChapterStatus | "skipped";

export interface ChapterReportEntry {
  readonly chapter: number;
  readonly outcome: ChapterOutcome;
  /** Absent for skipped chapters */
  readonly result?: ChapterRunResult;
  /** Dependency that failed or was skipped */
  readonly blockedBy?: number;
}

export interface SchedulerReport {
  /** In input order */
  readonly chapters: readonly ChapterReportEntry[];
  readonly counts: Readonly<Record<ChapterOutcome, number>>;
  readonly durationMs: number;
}

/** The part of the orchestrator the scheduler drives */
export type ChapterRunner = Pick<ChapterOrchestrator, "run" | "retryFinalize">;

export interface ChapterSchedulerOptions {
  orchestrator: ChapterRunner;
  /** Receives `scheduler.chapter` notices when set */
  bus?: MessageBus;
  /** Chapter N depends on N-1 when both are in the run (default: true) */
  continuity?: boolean;
  /** Default for run() (default: 1) */
  concurrency?: number;
  /** Extra commit attempts after a PersistenceError (default: 0) */
  persistenceRetries?: number;
  /** Base backoff between commit attempts (default: 500) */
  retryDelayMs?: number;
  /** Default per-chapter budget for run() */
  chapterTimeoutMs?: number;
  logger?: Logger;
}

export interface ScheduleRunOptions {
  concurrency?: number;
  signal?: AbortSignal;
  chapterTimeoutMs?: number;
}

interface PlannedChapter {
  readonly chapter: number;
  readonly dependsOn: readonly number[];
}

// =============================================================================
// Planning
// =============================================================================

/**
 * Normalize jobs into a dependency list. Dependencies outside the run are
 * dropped, since they count as satisfied.
 *
 * @throws ConfigurationError on duplicate chapters or a dependency cycle
 */
export function planChapters(jobs: readonly ChapterJob[], continuity = true): PlannedChapter[] {
  const numbers = jobs.map((job) => (typeof job === "number" ? job : job.chapter));
  const inRun = new Set(numbers);

  if (inRun.size !== numbers.length) {
    const duplicate = numbers.find((n, index) => numbers.indexOf(n) !== index);
    throw new ConfigurationError(`Chapter ${duplicate} is scheduled more than once`, [
      { path: "jobs", message: `duplicate chapter ${duplicate}` },
    ]);
  }

  const planned = jobs.map((job): PlannedChapter => {
    if (typeof job === "number") {
      return { chapter: job, dependsOn: continuity && inRun.has(job - 1) ? [job - 1] : [] };
    }
    const dependsOn = [...new Set(job.dependsOn ?? [])].filter((dep) => inRun.has(dep));
    return { chapter: job.chapter, dependsOn };
  });

  assertAcyclic(planned);
  return planned;
}

function assertAcyclic(planned: readonly PlannedChapter[]): void {
  const edges = new Map(planned.map((p) => [p.chapter, p.dependsOn]));
  const done = new Set<number>();
  const path: number[] = [];

  const visit = (chapter: number): void => {
    if (done.has(chapter)) return;

    const start = path.indexOf(chapter);
    if (start !== -1) {
      const cycle = [...path.slice(start), chapter];
      throw new ConfigurationError(
        `Dependency cycle: ${cycle.join(" -> ")}`,
        [{ path: "jobs", message: `chapters ${cycle.slice(0, -1).join(", ")} depend on each other` }],
        ErrorCode.PIPELINE_DEPENDENCY_CYCLE
      );
    }

    path.push(chapter);
    for (const dep of edges.get(chapter) ?? []) {
      visit(dep);
    }
    path.pop();
    done.add(chapter);
  };

  for (const { chapter } of planned) {
    visit(chapter);
  }
}

// =============================================================================
// Scheduler
// =============================================================================

/**
 * Runs many chapters under a concurrency cap. A chapter starts once all its
 * dependencies have settled and gets its predecessor's snapshot; a failed or
 * skipped dependency skips it. Independent chapters are unaffected.
 *
 * @example
 * ```typescript
 * const scheduler = new ChapterScheduler({ orchestrator, bus, persistenceRetries: 2 });
 * const report = await scheduler.run([1, 2, 3, { chapter: 10, dependsOn: [] }], {
 *   concurrency: 2,
 * });
 * report.counts; // { done: 3, completed_with_warnings: 1, failed: 0, skipped: 0 }
 * ```
 */
export class ChapterScheduler {
  private readonly orchestrator: ChapterRunner;
  private readonly bus?: MessageBus;
  private readonly continuity: boolean;
  private readonly concurrency: number;
  private readonly persistenceRetries: number;
  private readonly retryDelayMs: number;
  private readonly chapterTimeoutMs?: number;
  private readonly logger?: Logger;

  constructor(options: ChapterSchedulerOptions) {
    this.orchestrator = options.orchestrator;
    this.bus = options.bus;
    this.continuity = options.continuity ?? true;
    this.concurrency = options.concurrency ?? 1;
    this.persistenceRetries = options.persistenceRetries ?? 0;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.chapterTimeoutMs = options.chapterTimeoutMs;
    this.logger = options.logger;
  }

  /**
   * @throws ConfigurationError on a dependency cycle or a bad concurrency
   */
  async run(jobs: readonly ChapterJob[], options: ScheduleRunOptions = {}): Promise<SchedulerReport> {
    const concurrency = options.concurrency ?? this.concurrency;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`Concurrency must be a positive integer, got ${concurrency}`, [
        { path: "concurrency", message: "must be >= 1" },
      ]);
    }

    const planned = planChapters(jobs, this.continuity);
    const startedAt = performance.now();
    const settled = new Map<number, ChapterReportEntry>();
    const running = new Map<number, Promise<void>>();
    const waiting = [...planned];

    this.logger?.info(`Scheduling ${planned.length} chapter(s)`, { concurrency });

    while (waiting.length > 0 || running.size > 0) {
      for (let i = 0; i < waiting.length; ) {
        const job = waiting[i];
        if (!job || !job.dependsOn.every((dep) => settled.has(dep))) {
          i++;
          continue;
        }

        const blockedBy = job.dependsOn.find((dep) => {
          const outcome = settled.get(dep)?.outcome;
          return outcome === "failed" || outcome === "skipped";
        });

        if (blockedBy !== undefined) {
          waiting.splice(i, 1);
          this.settle(settled, { chapter: job.chapter, outcome: "skipped", blockedBy });
          // A skip may unblock earlier entries
          i = 0;
          continue;
        }

        if (running.size >= concurrency) {
          i++;
          continue;
        }

        waiting.splice(i, 1);
        const previous = this.predecessorSnapshot(job, settled);
        const task = this.runChapter(job.chapter, previous, options).then((entry) => {
          running.delete(job.chapter);
          this.settle(settled, entry);
        });
        running.set(job.chapter, task);
      }

      if (running.size === 0) {
        break;
      }
      await Promise.race(running.values());
    }

    const chapters = planned.flatMap((job) => {
      const entry = settled.get(job.chapter);
      return entry ? [entry] : [];
    });
    const counts: Record<ChapterOutcome, number> = {
      done: 0,
      completed_with_warnings: 0,
      failed: 0,
      skipped: 0,
    };
    for (const entry of chapters) {
      counts[entry.outcome]++;
    }

    const report = { chapters, counts, durationMs: performance.now() - startedAt };
    this.logger?.info("Run finished", { ...counts });
    return report;
  }

  private predecessorSnapshot(
    job: PlannedChapter,
    settled: ReadonlyMap<number, ChapterReportEntry>
  ): ChapterSnapshot | undefined {
    const predecessor = job.dependsOn.includes(job.chapter - 1) ? job.chapter - 1 : job.dependsOn.at(-1);
    return predecessor === undefined ? undefined : settled.get(predecessor)?.result?.snapshot;
  }

  private async runChapter(
    chapter: number,
    previous: ChapterSnapshot | undefined,
    options: ScheduleRunOptions
  ): Promise<ChapterReportEntry> {
    const timeoutMs = options.chapterTimeoutMs ?? this.chapterTimeoutMs;
    const signals = [
      ...(options.signal ? [options.signal] : []),
      ...(timeoutMs !== undefined ? [AbortSignal.timeout(timeoutMs)] : []),
    ];
    const signal = signals.length > 0 ? AbortSignal.any(signals) : undefined;

    let result = await this.orchestrator.run(chapter, { previous, signal });
    if (result.failure?.reason === "persistence" && this.persistenceRetries > 0) {
      result = await this.retryPersistence(result, options.signal);
    }
    return { chapter, outcome: result.status, result };
  }

  private async retryPersistence(failed: ChapterRunResult, signal?: AbortSignal): Promise<ChapterRunResult> {
    let latest = failed;
    try {
      return await withRetry(
        async () => {
          latest = await this.orchestrator.retryFinalize(latest);
          if (latest.failure?.reason === "persistence") {
            throw latest.failure.error;
          }
          return latest;
        },
        {
          maxRetries: this.persistenceRetries - 1,
          baseDelay: this.retryDelayMs,
          shouldRetry: (error) => error instanceof PersistenceError,
          onRetry: (_error, attempt, delay) =>
            this.logger?.warn(`Retrying commit of chapter ${failed.chapterNumber}`, { attempt, delay }),
          signal,
        }
      );
    } catch (error) {
      this.logger?.error(`Chapter ${failed.chapterNumber} could not be committed`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return latest;
    }
  }

  private settle(settled: Map<number, ChapterReportEntry>, entry: ChapterReportEntry): void {
    settled.set(entry.chapter, entry);

    if (entry.outcome === "skipped") {
      this.logger?.warn(`Chapter ${entry.chapter} skipped`, { blockedBy: entry.blockedBy });
    } else {
      this.logger?.info(`Chapter ${entry.chapter} settled: ${entry.outcome}`);
    }

    if (!this.bus) return;
    try {
      this.bus.emit(
        chapterSettled,
        { chapter: entry.chapter, outcome: entry.outcome, blockedBy: entry.blockedBy },
        { chapter: entry.chapter, source: "scheduler" }
      );
    } catch (error) {
      this.logger?.warn("Could not publish scheduler.chapter", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
