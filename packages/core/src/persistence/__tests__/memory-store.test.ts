import { describe, expect, it } from "vitest";
import type { ChapterSnapshot } from "../../pipeline/index.js";
import { contentHash, InMemoryChapterStore } from "../memory-store.js";

function snapshot(chapterNumber: number, text: string): ChapterSnapshot {
  return {
    chapterNumber,
    title: "The Ford",
    text,
    summary: text,
    outline: { title: "The Ford", summary: "", characters: [], scenes: [{ summary: "s", characters: [] }] },
    scenes: [{ index: 0, text }],
    worldNotes: [],
    characters: [],
    status: "done",
    unresolvedFindings: [],
    revisionRounds: 0,
  };
}

describe("contentHash", () => {
  it("is a sha256 hex digest", () => {
    expect(contentHash("")).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
  });
});

describe("InMemoryChapterStore", () => {
  it("ignores a repeated commit of the same text", async () => {
    const store = new InMemoryChapterStore();
    await store.commit(1, snapshot(1, "Mira waded in."));
    await store.commit(1, snapshot(1, "Mira waded in."));

    expect(store.versions(1)).toHaveLength(1);
    expect(store.latest(1)?.version).toBe(1);
  });

  it("adds a version when the text changes", async () => {
    const store = new InMemoryChapterStore();
    await store.commit(1, snapshot(1, "first"));
    await store.commit(1, snapshot(1, "second"));

    expect(store.versions(1).map((stored) => stored.version)).toEqual([1, 2]);
    expect(store.latest(1)?.snapshot.text).toBe("second");
    expect(store.latest(1)?.contentHash).toBe(contentHash("second"));
  });

  it("tracks chapters separately", async () => {
    const store = new InMemoryChapterStore();
    await store.commit(3, snapshot(3, "c"));
    await store.commit(1, snapshot(1, "a"));

    expect(store.chapterNumbers()).toEqual([1, 3]);
    expect(store.size).toBe(2);
    expect(store.latest(2)).toBeUndefined();
  });
});
