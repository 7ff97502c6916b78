// ============================================
// Quillwork Events - Barrel Export
// ============================================

export type {
  BusStats,
  DispatchMode,
  MessageBusOptions,
  RequestOptions,
  SubscribeOptions,
} from "./bus.js";
export { MessageBus } from "./bus.js";
export type { CreateMessageOptions, Message, MessageHeaders } from "./message.js";
export { createMessage, createReply, MessageHeadersSchema, MessageSchema } from "./message.js";
export type {
  BusMiddleware,
  DeliveryDirection,
  DeliveryOutcome,
  JournalFilter,
  TopicMetrics,
} from "./middleware.js";
export {
  JsonlJournalMiddleware,
  LoggingMiddleware,
  MessageJournal,
  MetricsMiddleware,
  MiddlewareChain,
} from "./middleware.js";
export type { MessageHandler, Subscription, SubscriptionRegistryOptions } from "./registry.js";
export { SubscriptionRegistry } from "./registry.js";
export type { TopicDefinition } from "./topics.js";
export { BUS_CANCEL, BUS_INBOX, defineTopic, requestCancelled, workerRequestTopic } from "./topics.js";
