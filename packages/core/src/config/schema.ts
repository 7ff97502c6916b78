import { z } from "zod";

// ============================================
// Pipeline Configuration Schema
// ============================================

const PositiveInt = z.number().int().positive();

/**
 * Per-call timeouts in ms for each pipeline stage
 */
export const TimeoutsSchema = z.object({
  planning: PositiveInt.default(120_000),
  world: PositiveInt.default(60_000),
  character: PositiveInt.default(60_000),
  composing: PositiveInt.default(180_000),
  review: PositiveInt.default(90_000),
  revision: PositiveInt.default(180_000),
});

export const ParallelSchema = z.object({
  worldAndCharacters: z.boolean().default(true),
  reviews: z.boolean().default(true),
});

export const BusConfigSchema = z.object({
  dispatch: z.enum(["parallel", "sequential"]).default("parallel"),
  singleHandlerTopics: z.boolean().default(false),
  /** Validate messages on publish and payloads on emit */
  debug: z.boolean().default(false),
  defaultTimeoutMs: PositiveInt.default(60_000),
  /** Append every delivery to this JSONL file */
  journalPath: z.string().min(1).optional(),
  /** In-memory journal size (0 disables it) */
  journalMaxEntries: z.number().int().nonnegative().default(1000),
});

/**
 * Worker names serving each role
 */
export const RolesSchema = z.object({
  planner: z.string().min(1).default("planner"),
  worldValidator: z.string().min(1).default("world-validator"),
  composer: z.string().min(1).default("composer"),
  consistencyReviewer: z.string().min(1).default("consistency-reviewer"),
  qualityReviewer: z.string().min(1).default("quality-reviewer"),
  reviser: z.string().min(1).default("reviser"),
});

export const CharacterConfigSchema = z.object({
  name: z.string().min(1),
  /** Defaults to `character:<name>` */
  worker: z.string().min(1).optional(),
  description: z.string().optional(),
});

export type CharacterConfig = z.infer<typeof CharacterConfigSchema>;

export const WorkerConfigSchema = z.object({
  /** Rate-limit bucket the worker draws from */
  provider: z.string().min(1).optional(),
  timeoutMs: PositiveInt.optional(),
});

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;

export const RateLimitConfigSchema = z.object({
  requestsPerMinute: z.number().positive(),
  burst: PositiveInt.optional(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  json: z.boolean().default(false),
  name: z.string().optional(),
});

// ============================================
// Root Schema
// ============================================

export const QuillworkConfigSchema = z
  .object({
    /** Chapters running at once */
    concurrency: PositiveInt.default(1),
    maxRevisionRounds: z.number().int().nonnegative().default(2),
    /** Chapter N waits for N-1 and receives its snapshot */
    continuity: z.boolean().default(true),
    chapterTimeoutMs: PositiveInt.optional(),
    /** Extra commit attempts after a persistence failure */
    persistenceRetries: z.number().int().nonnegative().default(0),
    timeouts: TimeoutsSchema.default({}),
    parallel: ParallelSchema.default({}),
    bus: BusConfigSchema.default({}),
    roles: RolesSchema.default({}),
    characters: z.array(CharacterConfigSchema).default([]),
    workers: z.record(WorkerConfigSchema).default({}),
    rateLimits: z.record(RateLimitConfigSchema).default({}),
    maxRateLimitWaitMs: PositiveInt.default(60_000),
    logging: LoggingConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    for (const [index, character] of config.characters.entries()) {
      const key = character.name.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["characters", index, "name"],
          message: `Duplicate character "${character.name}"`,
        });
      }
      seen.add(key);
    }
  });

export type QuillworkConfig = z.infer<typeof QuillworkConfigSchema>;

/** What files, environment and overrides may set */
export type PartialQuillworkConfig = z.input<typeof QuillworkConfigSchema>;
