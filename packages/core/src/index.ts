// ============================================
// Quillwork Core
// ============================================

/**
 * @module @quillwork/core
 *
 * Message bus with request/response correlation, worker adapters, staged
 * chapter orchestration and a dependency-aware chapter scheduler.
 */

export * from "./config/index.js";
export * from "./errors/index.js";
export * from "./events/index.js";
export * from "./logger/index.js";
export * from "./persistence/index.js";
export * from "./pipeline/index.js";
export * from "./rate-limit/index.js";
export type { PipelineRuntime, PipelineRuntimeOptions } from "./runtime.js";
export { createPipelineRuntime } from "./runtime.js";
export * from "./scheduler/index.js";
export * from "./workers/index.js";

export type { Result } from "@quillwork/shared";
export { Err, isErr, isOk, Ok, unwrap } from "@quillwork/shared";
