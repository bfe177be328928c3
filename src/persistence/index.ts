// Types
export { DEFAULT_CONVERSATION_TITLE } from "./types.js";
export type {
  ArtifactRecord,
  Conversation,
  Message,
  MessageRole,
  SaveArtifactOpts,
} from "./types.js";

// Errors
export { StoreError } from "./errors.js";
export type { StoreErrorCode } from "./errors.js";

// Store interface
export type { ConversationStore } from "./store.js";

// Implementations
export { SqliteConversationStore } from "./sqlite.js";
