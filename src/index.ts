export { QwenChatClient } from "./client.js";
export type { ChatTurnOptions, ChatTurnOutcome, CreateQwenChatClientOptions, QwenChatClientOptions } from "./client.js";
export { getQwenConfig, loadQwenConfig } from "./config.js";
export type { QwenConfig } from "./config.js";
export { ConversationState } from "./conversation.js";
export type { ConversationSnapshot, CreateConversationResult } from "./conversation.js";
export { FileCredentialStore, MemoryCredentialStore } from "./credential-store.js";
export type { CredentialStore, SaveResult } from "./credential-store.js";
export { combineDebugListeners, createDebugLogger } from "./debug-log.js";
export { QwenChatError, formatChatError, isQwenChatError } from "./errors.js";
export type { QwenChatErrorCode } from "./errors.js";
export {
  buildChatTurnPayload,
  buildCreateConversationPayload,
  buildFeatureConfig,
  composePrompt,
  createTurnRequest,
} from "./request-builder.js";
export type { ChatTurnPayload, CreateConversationPayload, FeatureConfig } from "./request-builder.js";
export { SessionManager, serializeCookies } from "./session.js";
export type { EnsureSessionResult, LoginAccount, LoginProvider, SessionManagerOptions } from "./session.js";
export { StreamDecoder, decodeChatStream, normalizePhase, parseStreamLine } from "./stream-decoder.js";
export type { DecodeOutcome, DecodedTurn, DecoderState, StreamTermination } from "./stream-decoder.js";
export { QwenTransport, RequestGuard, readLines } from "./transport.js";
export type { QwenTransportOptions, StreamChatTurnResult } from "./transport.js";
export {
  defaultTokenLookupStrategies,
  directKeyStrategy,
  findToken,
  nestedKeyStrategy,
} from "./token-lookup.js";
export type { KeyValueReader, TokenLookupStrategy } from "./token-lookup.js";
export type {
  AccumulatedResult,
  ChatTurnRequest,
  ContentDelta,
  Credentials,
  DebugEvent,
  DebugListener,
  SessionPolicy,
  StreamEvent,
  StreamPhase,
  ThinkingSettings,
} from "./chat-types.js";
