// ============================================
// Persistence Types
// ============================================

import type { ChapterSnapshot } from "../pipeline/chapter-state.js";

/**
 * Boundary to whatever stores finished chapters. `commit` must be idempotent:
 * committing the same snapshot twice leaves one artifact.
 */
export interface PersistenceCollaborator {
  commit(chapterNumber: number, snapshot: ChapterSnapshot): Promise<void>;
}

export interface StoredChapter {
  readonly chapterNumber: number;
  readonly version: number;
  /** SHA-256 of the chapter text */
  readonly contentHash: string;
  readonly snapshot: ChapterSnapshot;
  readonly storedAt: Date;
}
