export { contentHash, InMemoryChapterStore } from "./memory-store.js";
export type { PersistenceCollaborator, StoredChapter } from "./types.js";
