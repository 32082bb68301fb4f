export { ChatSession, type ChatSessionOptions, type SessionSnapshot } from "./src/session.js";
export {
  Conversation,
  toDisplayMessage,
  type ConversationOptions,
  type ConversationSnapshot,
  type ConversationTuning,
  type LoadResult,
  type SendResult,
} from "./src/conversation.js";
export { MessageCache, type CacheEntry } from "./src/message-cache.js";
export { CorrelationRegistry } from "./src/correlation.js";
export {
  EventRouter,
  immediateDispatcher,
  microtaskDispatcher,
  type Dispatcher,
  type ErrorHandler,
  type EventHandler,
  type EventKind,
  type EventPayloads,
  type ScopeListener,
} from "./src/event-router.js";
export { decodeFrame, encodeEnvelope, parseServerDate } from "./src/protocol.js";
export {
  WsTransport,
  wsTransportFactory,
  type Transport,
  type TransportFactory,
  type TransportHandlers,
  type WsTransportOptions,
} from "./src/transport.js";
export {
  RestChatApi,
  findOrCreateDialog,
  type ChatApi,
  type MediaUpload,
  type RestChatApiOptions,
} from "./src/rest-client.js";
export {
  ClientConfigSchema,
  ConfigError,
  loadClientConfig,
  resolveClientConfig,
  type ClientConfig,
  type ClientConfigInput,
} from "./src/config.js";
export { resolveAccessToken, staticToken, type TokenProvider } from "./src/auth.js";
export { ApiError, ChatSessionError, type ChatSessionErrorCode } from "./src/errors.js";
export { createConsoleLog, type LogSink } from "./src/log.js";
export * from "./src/types.js";
