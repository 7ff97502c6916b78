// ============================================
// Pipeline Runtime
// Wires bus, workers, orchestrator and scheduler from one config
// ============================================

import { z } from "zod";
import { type QuillworkConfig, QuillworkConfigSchema } from "./config/index.js";
import {
  JsonlJournalMiddleware,
  LoggingMiddleware,
  MessageBus,
  MessageJournal,
  MetricsMiddleware,
} from "./events/index.js";
import { createLogger, type Logger } from "./logger/index.js";
import { InMemoryChapterStore, type PersistenceCollaborator } from "./persistence/index.js";
import {
  ChapterOrchestrator,
  CharacterRequestSchema,
  characterWorkerName,
  ComposeRequestSchema,
  PlannerRequestSchema,
  ReviewRequestSchema,
  ReviseRequestSchema,
  WorldCheckRequestSchema,
} from "./pipeline/index.js";
import { RateLimiter } from "./rate-limit/index.js";
import {
  type ChapterJob,
  ChapterScheduler,
  type ScheduleRunOptions,
  type SchedulerReport,
} from "./scheduler/index.js";
import { type WorkerCollaborator, WorkerRegistry } from "./workers/index.js";

export interface PipelineRuntimeOptions {
  /** Validated config; defaults apply when omitted */
  config?: QuillworkConfig;
  /** Collaborators keyed by worker name */
  workers: Readonly<Record<string, WorkerCollaborator>>;
  /** Defaults to an InMemoryChapterStore */
  persistence?: PersistenceCollaborator;
  /** Defaults to a logger built from `config.logging` */
  logger?: Logger;
}

export interface PipelineRuntime {
  readonly config: QuillworkConfig;
  readonly logger: Logger;
  readonly bus: MessageBus;
  readonly metrics: MetricsMiddleware;
  /** Absent when `bus.journalMaxEntries` is 0 */
  readonly journal?: MessageJournal;
  readonly rateLimiter: RateLimiter;
  readonly workers: WorkerRegistry;
  readonly persistence: PersistenceCollaborator;
  readonly orchestrator: ChapterOrchestrator;
  readonly scheduler: ChapterScheduler;
  run(jobs: readonly ChapterJob[], options?: ScheduleRunOptions): Promise<SchedulerReport>;
  /** Stops adapters, the rate limiter and the bus */
  dispose(): void;
}

/**
 * Request schema each worker validates against, by role.
 */
function requestSchemas(config: QuillworkConfig): Map<string, z.ZodType<unknown, z.ZodTypeDef, unknown>> {
  const { roles } = config;
  const schemas = new Map<string, z.ZodType<unknown, z.ZodTypeDef, unknown>>([
    [roles.planner, PlannerRequestSchema],
    [roles.worldValidator, WorldCheckRequestSchema],
    [roles.composer, ComposeRequestSchema],
    [roles.consistencyReviewer, ReviewRequestSchema],
    [roles.qualityReviewer, ReviewRequestSchema],
    [roles.reviser, ReviseRequestSchema],
  ]);
  for (const character of config.characters) {
    schemas.set(characterWorkerName(character), CharacterRequestSchema);
  }
  return schemas;
}

/**
 * Build a ready-to-run pipeline.
 *
 * @throws ConfigurationError if a worker the config names has no collaborator
 *
 * @example
 * ```typescript
 * const config = unwrap(loadConfig());
 * const runtime = createPipelineRuntime({
 *   config,
 *   workers: { planner, "world-validator": world, composer, ...reviewers, reviser },
 *   persistence: store,
 * });
 * try {
 *   const report = await runtime.run([1, 2, 3]);
 * } finally {
 *   runtime.dispose();
 * }
 * ```
 */
export function createPipelineRuntime(options: PipelineRuntimeOptions): PipelineRuntime {
  const config = options.config ?? QuillworkConfigSchema.parse({});
  const logger =
    options.logger ??
    createLogger({ name: config.logging.name, level: config.logging.level, json: config.logging.json });

  const metrics = new MetricsMiddleware();
  const journal =
    config.bus.journalMaxEntries > 0 ? new MessageJournal(config.bus.journalMaxEntries) : undefined;
  const bus = new MessageBus({
    dispatch: config.bus.dispatch,
    singleHandlerTopics: config.bus.singleHandlerTopics,
    debug: config.bus.debug,
    defaultTimeoutMs: config.bus.defaultTimeoutMs,
    logger: logger.forComponent("bus"),
    middleware: [
      new LoggingMiddleware(logger.forComponent("bus")),
      metrics,
      ...(journal ? [journal] : []),
      ...(config.bus.journalPath ? [new JsonlJournalMiddleware(config.bus.journalPath)] : []),
    ],
  });

  const rateLimiter = new RateLimiter(
    { providers: config.rateLimits, maxWaitMs: config.maxRateLimitWaitMs },
    logger.forComponent("rate-limit")
  );
  const workers = new WorkerRegistry(bus, { rateLimiter, logger });
  const persistence = options.persistence ?? new InMemoryChapterStore(logger);

  const orchestrator = new ChapterOrchestrator({
    bus,
    persistence,
    roles: config.roles,
    characters: config.characters,
    maxRevisionRounds: config.maxRevisionRounds,
    timeouts: config.timeouts,
    parallel: config.parallel,
    logger,
  });

  const dispose = (): void => {
    workers.stopAll();
    rateLimiter.dispose();
    bus.dispose();
  };

  try {
    const schemas = requestSchemas(config);
    for (const [name, collaborator] of Object.entries(options.workers)) {
      const settings = config.workers[name];
      workers.register(name, collaborator, {
        schema: schemas.get(name) ?? z.unknown(),
        provider: settings?.provider,
        timeoutMs: settings?.timeoutMs,
      });
    }
    workers.assertRegistered([...orchestrator.requiredWorkers(), ...Object.keys(config.workers)]);
  } catch (error) {
    dispose();
    throw error;
  }

  const scheduler = new ChapterScheduler({
    orchestrator,
    bus,
    continuity: config.continuity,
    concurrency: config.concurrency,
    persistenceRetries: config.persistenceRetries,
    chapterTimeoutMs: config.chapterTimeoutMs,
    logger,
  });

  logger.info("Pipeline ready", { workers: workers.names().length, concurrency: config.concurrency });

  return {
    config,
    logger,
    bus,
    metrics,
    journal,
    rateLimiter,
    workers,
    persistence,
    orchestrator,
    scheduler,
    run: (jobs, runOptions) => scheduler.run(jobs, runOptions),
    dispose,
  };
}
