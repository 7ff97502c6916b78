// ============================================
// Workers - Barrel Export
// ============================================

export type { WorkerAdapterOptions } from "./adapter.js";
export { WorkerAdapter } from "./adapter.js";
export type { WorkerRegistration, WorkerRegistryOptions } from "./registry.js";
export { WorkerRegistry } from "./registry.js";
export type { InvokeContext, ManagedWorker, WorkerCollaborator, WorkerReply } from "./types.js";
export { WorkerFailureKindSchema, WorkerReplySchema } from "./types.js";
