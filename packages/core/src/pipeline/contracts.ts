// ============================================
// Worker Contracts
// Request and reply payloads for each pipeline role
// ============================================

import { z } from "zod";
import { ChapterOutlineSchema, FindingSeveritySchema, ScenePlanSchema } from "./chapter-state.js";

const ChapterNumber = z.number().int().positive();

export const CharacterReactionSchema = z.object({
  character: z.string().min(1),
  reaction: z.string(),
  intent: z.string().optional(),
});

export const ComposedSceneSchema = z.object({
  index: z.number().int().nonnegative(),
  text: z.string(),
});

export const ReviewFindingSchema = z.object({
  severity: FindingSeveritySchema,
  sourceStage: z.string(),
  description: z.string(),
  sceneIndex: z.number().int().nonnegative().optional(),
});

// =============================================================================
// Planner
// =============================================================================

export const PlannerRequestSchema = z.object({
  chapter: ChapterNumber,
  /** Registered cast the outline may draw on */
  characters: z.array(z.string()),
  previousTitle: z.string().optional(),
  previousSummary: z.string().optional(),
});
export type PlannerRequest = z.infer<typeof PlannerRequestSchema>;

export const PlannerReplySchema = ChapterOutlineSchema;

// =============================================================================
// World validation and characters
// =============================================================================

export const WorldCheckRequestSchema = z.object({
  chapter: ChapterNumber,
  outline: ChapterOutlineSchema,
  previousSummary: z.string().optional(),
});
export type WorldCheckRequest = z.infer<typeof WorldCheckRequestSchema>;

export const WorldCheckReplySchema = z.object({
  notes: z.array(z.string()).default([]),
});

export const CharacterRequestSchema = z.object({
  chapter: ChapterNumber,
  character: z.string().min(1),
  description: z.string().optional(),
  outline: ChapterOutlineSchema,
});
export type CharacterRequest = z.infer<typeof CharacterRequestSchema>;

export const CharacterReplySchema = z.object({
  reaction: z.string().min(1),
  intent: z.string().optional(),
});

// =============================================================================
// Composer
// =============================================================================

export const ComposeRequestSchema = z.object({
  chapter: ChapterNumber,
  sceneIndex: z.number().int().nonnegative(),
  title: z.string(),
  scene: ScenePlanSchema,
  worldNotes: z.array(z.string()),
  reactions: z.array(CharacterReactionSchema),
  previousSceneText: z.string().optional(),
  previousChapterSummary: z.string().optional(),
});
export type ComposeRequest = z.infer<typeof ComposeRequestSchema>;

export const ComposeReplySchema = z.object({
  text: z.string().min(1),
});
export type ComposeReply = z.infer<typeof ComposeReplySchema>;

// =============================================================================
// Reviewers and reviser
// =============================================================================

export const ReviewRequestSchema = z.object({
  chapter: ChapterNumber,
  round: z.number().int().nonnegative(),
  draft: z.string(),
  outline: ChapterOutlineSchema,
});
export type ReviewRequest = z.infer<typeof ReviewRequestSchema>;

export const ReviewReplySchema = z.object({
  findings: z
    .array(
      z.object({
        severity: FindingSeveritySchema,
        description: z.string().min(1),
        sceneIndex: z.number().int().nonnegative().optional(),
      })
    )
    .default([]),
});

export const ReviseRequestSchema = z.object({
  chapter: ChapterNumber,
  round: z.number().int().positive(),
  findings: z.array(ReviewFindingSchema),
  /** Only the scenes the findings point at, or all of them */
  scenes: z.array(ComposedSceneSchema),
});
export type ReviseRequest = z.infer<typeof ReviseRequestSchema>;

/** Whole-scene replacements */
export const ReviseReplySchema = z.object({
  scenes: z.array(ComposedSceneSchema),
});
