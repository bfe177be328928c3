export type MessageRole = "user" | "assistant";

export interface Conversation {
  id: string; // ULID, auto-generated
  title: string;
  created_at: string; // ISO 8601
  updated_at: string; // ISO 8601, bumped on every new message
}

export interface Message {
  id: string;
  conversation_id: string;
  role: MessageRole;
  content: string;
  created_at: string;
}

/**
 * Persisted outcome of one execute_code call. Immutable once written.
 * The engine state blob is stored alongside but only readable through
 * ConversationStore.getArtifactState().
 */
export interface ArtifactRecord {
  id: string;
  conversation_id: string;
  message_id: string | null;
  code: string;
  result_json: string | null;
  result_type: string | null;
  error: string | null;
  created_at: string;
}

export type SaveArtifactOpts = {
  conversation_id: string;
  message_id?: string | null;
  code: string;
  state?: Uint8Array | null;
  result_json?: string | null;
  result_type?: string | null;
  error?: string | null;
};

export const DEFAULT_CONVERSATION_TITLE = "New conversation";
