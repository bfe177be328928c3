import type {
  ArtifactRecord,
  Conversation,
  Message,
  MessageRole,
  SaveArtifactOpts,
} from "./types.js";

/**
 * Interface for conversation, message and artifact persistence.
 * Implementations: SqliteConversationStore (":memory:" in tests)
 */
export interface ConversationStore {
  createConversation(title?: string): Promise<Conversation>;

  /** Most recently updated first. */
  listConversations(): Promise<Conversation[]>;

  getConversation(id: string): Promise<Conversation | null>;

  updateConversationTitle(id: string, title: string): Promise<void>;

  touchConversation(id: string): Promise<void>;

  /** Appends a message and bumps the conversation's updated_at. */
  addMessage(
    conversation_id: string,
    role: MessageRole,
    content: string,
  ): Promise<Message>;

  /** Oldest first. */
  getMessages(conversation_id: string): Promise<Message[]>;

  saveArtifact(opts: SaveArtifactOpts): Promise<ArtifactRecord>;

  getArtifact(id: string): Promise<ArtifactRecord | null>;

  /** Opaque engine state captured when the artifact's run completed. */
  getArtifactState(id: string): Promise<Uint8Array | null>;

  /** In creation order. */
  listArtifacts(conversation_id: string): Promise<ArtifactRecord[]>;
}
