// ============================================
// Quillwork Shared Utilities
// ============================================

export type { ErrResult, OkResult, Result } from "./types/result.js";
export { Err, isErr, isOk, Ok, unwrap } from "./types/result.js";
export { createId, shortId } from "./utils/id.js";
