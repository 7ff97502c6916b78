// ============================================
// In-Memory Chapter Store
// ============================================

import { createHash } from "node:crypto";
import type { Logger } from "../logger/index.js";
import type { ChapterSnapshot } from "../pipeline/chapter-state.js";
import type { PersistenceCollaborator, StoredChapter } from "./types.js";

export function contentHash(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

/**
 * Versioned chapter store keyed by chapter number and content hash.
 * Re-committing identical text is a no-op; changed text adds a version.
 *
 * @example
 * ```typescript
 * const store = new InMemoryChapterStore();
 * await store.commit(1, snapshot);
 * await store.commit(1, snapshot); // still one version
 * store.latest(1)?.version; // 1
 * ```
 */
export class InMemoryChapterStore implements PersistenceCollaborator {
  private readonly chapters = new Map<number, StoredChapter[]>();

  constructor(private readonly logger?: Logger) {}

  async commit(chapterNumber: number, snapshot: ChapterSnapshot): Promise<void> {
    const versions = this.chapters.get(chapterNumber) ?? [];
    const hash = contentHash(snapshot.text);

    if (versions.some((stored) => stored.contentHash === hash)) {
      this.logger?.debug(`Chapter ${chapterNumber} unchanged, skipping write`);
      return;
    }

    versions.push({
      chapterNumber,
      version: versions.length + 1,
      contentHash: hash,
      snapshot,
      storedAt: new Date(),
    });
    this.chapters.set(chapterNumber, versions);
    this.logger?.info(`Stored chapter ${chapterNumber} v${versions.length}`);
  }

  latest(chapterNumber: number): StoredChapter | undefined {
    return this.chapters.get(chapterNumber)?.at(-1);
  }

  versions(chapterNumber: number): readonly StoredChapter[] {
    return [...(this.chapters.get(chapterNumber) ?? [])];
  }

  chapterNumbers(): number[] {
    return [...this.chapters.keys()].sort((a, b) => a - b);
  }

  /** Total stored versions across chapters */
  get size(): number {
    let total = 0;
    for (const versions of this.chapters.values()) {
      total += versions.length;
    }
    return total;
  }
}
