// ============================================
// Chapter State
// ============================================

import { z } from "zod";
import type { StageIssue } from "./stage.js";

// =============================================================================
// Phases
// =============================================================================

export const CHAPTER_PHASES = [
  "PLANNING",
  "WORLD_AND_CHARACTERS",
  "COMPOSING",
  "ASSEMBLING",
  "REVIEWING",
  "FINALIZING",
  "DONE",
  "FAILED",
] as const;

export const ChapterPhaseSchema = z.enum(CHAPTER_PHASES);
export type ChapterPhase = z.infer<typeof ChapterPhaseSchema>;

/**
 * Forward transitions. FAILED is reachable from every non-terminal phase;
 * REVIEWING loops back to ASSEMBLING after a revision.
 */
export const PHASE_TRANSITIONS: Readonly<Record<ChapterPhase, readonly ChapterPhase[]>> = {
  PLANNING: ["WORLD_AND_CHARACTERS", "FAILED"],
  WORLD_AND_CHARACTERS: ["COMPOSING", "FAILED"],
  COMPOSING: ["ASSEMBLING", "FAILED"],
  ASSEMBLING: ["REVIEWING", "FAILED"],
  REVIEWING: ["ASSEMBLING", "FINALIZING", "FAILED"],
  FINALIZING: ["DONE", "FAILED"],
  DONE: [],
  // A failed finalize may be retried
  FAILED: ["FINALIZING"],
};

export function canTransition(from: ChapterPhase, to: ChapterPhase): boolean {
  return PHASE_TRANSITIONS[from].includes(to);
}

export const ChapterStatusSchema = z.enum(["done", "completed_with_warnings", "failed"]);
export type ChapterStatus = z.infer<typeof ChapterStatusSchema>;

// =============================================================================
// Content Types
// =============================================================================

export const ScenePlanSchema = z.object({
  title: z.string().optional(),
  summary: z.string().min(1),
  characters: z.array(z.string()).default([]),
  setting: z.string().optional(),
});
export type ScenePlan = z.infer<typeof ScenePlanSchema>;

export const ChapterOutlineSchema = z.object({
  title: z.string().min(1),
  summary: z.string().default(""),
  characters: z.array(z.string()).default([]),
  scenes: z.array(ScenePlanSchema).min(1),
});
export type ChapterOutline = z.infer<typeof ChapterOutlineSchema>;

export interface CharacterReaction {
  readonly character: string;
  readonly reaction: string;
  readonly intent?: string;
}

export interface ComposedScene {
  readonly index: number;
  readonly text: string;
}

export const FindingSeveritySchema = z.enum(["blocking", "advisory", "fatal"]);
export type FindingSeverity = z.infer<typeof FindingSeveritySchema>;

export interface ReviewFinding {
  readonly severity: FindingSeverity;
  /** Review that raised it, e.g. "consistency" */
  readonly sourceStage: string;
  readonly description: string;
  readonly sceneIndex?: number;
}

export interface PhaseTransition {
  readonly from: ChapterPhase | null;
  readonly to: ChapterPhase;
  readonly at: Date;
  readonly reason?: string;
}

// =============================================================================
// Mutable run state
// =============================================================================

/**
 * Working state of one chapter, owned by a single orchestrator run.
 */
export interface ChapterState {
  readonly chapterNumber: number;
  phase: ChapterPhase;
  outline?: ChapterOutline;
  /** Canonical names of the characters taking part */
  activeCharacters: string[];
  worldNotes: string[];
  reactions: Record<string, CharacterReaction>;
  scenes: ComposedScene[];
  draft?: string;
  findings: ReviewFinding[];
  revisionRound: number;
  status?: ChapterStatus;
  issues: StageIssue[];
  history: PhaseTransition[];
  readonly previous?: ChapterSnapshot;
}

export function createChapterState(chapterNumber: number, previous?: ChapterSnapshot): ChapterState {
  return {
    chapterNumber,
    phase: "PLANNING",
    activeCharacters: [],
    worldNotes: [],
    reactions: {},
    scenes: [],
    findings: [],
    revisionRound: 0,
    issues: [],
    history: [{ from: null, to: "PLANNING", at: new Date() }],
    previous,
  };
}

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Frozen view of a finished chapter, handed to persistence and to the next
 * chapter as continuity context.
 */
export interface ChapterSnapshot {
  readonly chapterNumber: number;
  readonly title: string;
  readonly text: string;
  readonly summary: string;
  readonly outline: ChapterOutline;
  readonly scenes: readonly ComposedScene[];
  readonly worldNotes: readonly string[];
  readonly characters: readonly string[];
  readonly status: Exclude<ChapterStatus, "failed">;
  readonly unresolvedFindings: readonly ReviewFinding[];
  readonly revisionRounds: number;
}

const SUMMARY_LENGTH = 500;

/**
 * Findings that still require a revision: blocking and fatal ones.
 */
export function unresolvedFindings(findings: readonly ReviewFinding[]): ReviewFinding[] {
  return findings.filter((finding) => finding.severity !== "advisory");
}

/**
 * Leading excerpt used as the previous-chapter summary.
 */
export function summarize(text: string, maxLength = SUMMARY_LENGTH): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Deep-frozen copy of the state's content.
 *
 * @throws Error if the chapter has no outline or draft yet
 */
export function snapshotChapter(
  state: ChapterState,
  status: Exclude<ChapterStatus, "failed">
): ChapterSnapshot {
  const { outline, draft } = state;
  if (!outline || draft === undefined) {
    throw new Error(`Chapter ${state.chapterNumber} has nothing to snapshot in ${state.phase}`);
  }

  return deepFreeze({
    chapterNumber: state.chapterNumber,
    title: outline.title,
    text: draft,
    summary: summarize(draft),
    outline: structuredClone(outline),
    scenes: state.scenes.map((scene) => ({ ...scene })),
    worldNotes: [...state.worldNotes],
    characters: [...state.activeCharacters],
    status,
    unresolvedFindings: unresolvedFindings(state.findings).map((finding) => ({ ...finding })),
    revisionRounds: state.revisionRound,
  });
}
