// ============================================
// Pipeline Lifecycle Topics
// ============================================

import { z } from "zod";
import { defineTopic } from "../events/index.js";
import { ChapterPhaseSchema } from "./chapter-state.js";

export const phaseChanged = defineTopic(
  "pipeline.phase",
  z.object({
    chapter: z.number().int().positive(),
    from: ChapterPhaseSchema.nullable(),
    to: ChapterPhaseSchema,
    reason: z.string().optional(),
  })
);

export const stageCompleted = defineTopic(
  "pipeline.stage",
  z.object({
    chapter: z.number().int().positive(),
    stage: z.string(),
    status: z.enum(["success", "partial", "failure"]),
    issueCount: z.number().int().nonnegative(),
  })
);

export const chapterSettled = defineTopic(
  "scheduler.chapter",
  z.object({
    chapter: z.number().int().positive(),
    outcome: z.enum(["done", "completed_with_warnings", "failed", "skipped"]),
    blockedBy: z.number().int().positive().optional(),
  })
);
