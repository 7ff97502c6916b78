// ============================================
// Chapter Assembly
// ============================================

import { AssemblyError } from "../errors/index.js";
import type { ChapterOutline, ComposedScene } from "./chapter-state.js";

/**
 * Join composed scenes into chapter text in outline order:
 *
 * ```text
 * ## Chapter 3: The Ford
 *
 * <scene 0>
 *
 * <scene 1>
 * ```
 *
 * @throws AssemblyError if the scenes do not cover the outline exactly once
 */
export function assembleChapter(
  chapterNumber: number,
  outline: ChapterOutline,
  scenes: readonly ComposedScene[]
): string {
  const expected = outline.scenes.length;
  const byIndex = new Map(scenes.map((scene) => [scene.index, scene.text]));

  if (scenes.length !== expected || byIndex.size !== expected) {
    throw new AssemblyError(expected, byIndex.size);
  }

  const texts: string[] = [];
  for (let index = 0; index < expected; index++) {
    const text = byIndex.get(index);
    if (text === undefined) {
      throw new AssemblyError(expected, index);
    }
    texts.push(text.trim());
  }

  return `## Chapter ${chapterNumber}: ${outline.title}\n\n${texts.join("\n\n")}`;
}
