// ============================================
// Quillwork Pipeline - Barrel Export
// ============================================

export { assembleChapter } from "./assembler.js";
export type {
  ChapterOutline,
  ChapterPhase,
  ChapterSnapshot,
  ChapterState,
  ChapterStatus,
  CharacterReaction,
  ComposedScene,
  FindingSeverity,
  PhaseTransition,
  ReviewFinding,
  ScenePlan,
} from "./chapter-state.js";
export {
  CHAPTER_PHASES,
  ChapterOutlineSchema,
  ChapterPhaseSchema,
  ChapterStatusSchema,
  canTransition,
  createChapterState,
  FindingSeveritySchema,
  PHASE_TRANSITIONS,
  ScenePlanSchema,
  snapshotChapter,
  summarize,
  unresolvedFindings,
} from "./chapter-state.js";
export { CharacterResolver } from "./character-resolver.js";
export type {
  CharacterRequest,
  ComposeReply,
  ComposeRequest,
  PlannerRequest,
  ReviewRequest,
  ReviseRequest,
  WorldCheckRequest,
} from "./contracts.js";
export {
  CharacterReactionSchema,
  CharacterReplySchema,
  CharacterRequestSchema,
  ComposedSceneSchema,
  ComposeReplySchema,
  ComposeRequestSchema,
  PlannerReplySchema,
  PlannerRequestSchema,
  ReviewFindingSchema,
  ReviewReplySchema,
  ReviewRequestSchema,
  ReviseReplySchema,
  ReviseRequestSchema,
  WorldCheckReplySchema,
  WorldCheckRequestSchema,
} from "./contracts.js";
export { chapterSettled, phaseChanged, stageCompleted } from "./events.js";
export type {
  ChapterFailure,
  ChapterFailureReason,
  ChapterRunResult,
  CharacterProfile,
  OrchestratorOptions,
  RoleWorkers,
  RunChapterOptions,
  StageTimeouts,
} from "./orchestrator.js";
export {
  ChapterOrchestrator,
  characterWorkerName,
  DEFAULT_ROLES,
  DEFAULT_STAGE_TIMEOUTS,
} from "./orchestrator.js";
export type {
  StageCall,
  StageDefinition,
  StageIssue,
  StagePolicy,
  StageResult,
  StageRunContext,
  StageRunnerOptions,
  StageStatus,
} from "./stage.js";
export { StageRunner } from "./stage.js";
export type { PipelineSummary, StageRecord, StageRecordStatus } from "./tracker.js";
export { PipelineTracker } from "./tracker.js";
