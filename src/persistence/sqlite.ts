import Database, {
  type Database as DatabaseType,
  type Statement,
} from "better-sqlite3";
import { monotonicFactory } from "ulid";
import { StoreError } from "./errors.js";
import type { ConversationStore } from "./store.js";
import {
  type ArtifactRecord,
  type Conversation,
  DEFAULT_CONVERSATION_TITLE,
  type Message,
  type MessageRole,
  type SaveArtifactOpts,
} from "./types.js";

const MESSAGE_ROLES: readonly MessageRole[] = ["user", "assistant"];

interface SqliteConversationStoreOptions {
  dbPath: string; // ":memory:" for tests, file path for production
}

interface ArtifactRow {
  id: string;
  conversation_id: string;
  message_id: string | null;
  code: string;
  result_json: string | null;
  result_type: string | null;
  error: string | null;
  created_at: string;
}

/**
 * SQLite implementation of ConversationStore.
 * IDs are monotonic ULIDs so id order matches insertion order within a millisecond.
 */
export class SqliteConversationStore implements ConversationStore {
  private db: DatabaseType;
  private nextId = monotonicFactory();
  private stmts: {
    insertConversation: Statement;
    listConversations: Statement;
    fetchConversation: Statement;
    updateTitle: Statement;
    touch: Statement;
    insertMessage: Statement;
    listMessages: Statement;
    insertArtifact: Statement;
    fetchArtifact: Statement;
    fetchArtifactState: Statement;
    listArtifacts: Statement;
  };

  constructor(opts: SqliteConversationStoreOptions) {
    this.db = new Database(opts.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 3000");
    this.db.pragma("foreign_keys = ON");
    this.initSchema();
    this.stmts = this.prepareStatements();
  }

  close(): void {
    this.db.close();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversations (
        id          TEXT PRIMARY KEY,
        title       TEXT NOT NULL DEFAULT '${DEFAULT_CONVERSATION_TITLE}',
        created_at  TEXT NOT NULL,
        updated_at  TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS messages (
        id               TEXT PRIMARY KEY,
        conversation_id  TEXT NOT NULL REFERENCES conversations(id),
        role             TEXT NOT NULL,
        content          TEXT NOT NULL,
        created_at       TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS artifacts (
        id               TEXT PRIMARY KEY,
        conversation_id  TEXT NOT NULL REFERENCES conversations(id),
        message_id       TEXT REFERENCES messages(id),
        code             TEXT NOT NULL,
        engine_state     BLOB,
        result_json      TEXT,
        result_type      TEXT,
        error            TEXT,
        created_at       TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_messages_conversation ON messages(conversation_id, id);
      CREATE INDEX IF NOT EXISTS idx_artifacts_conversation ON artifacts(conversation_id, id);
    `);
  }

  private prepareStatements() {
    return {
      insertConversation: this.db.prepare(`
        INSERT INTO conversations (id, title, created_at, updated_at)
        VALUES (@id, @title, @created_at, @updated_at)
      `),
      listConversations: this.db.prepare(`
        SELECT id, title, created_at, updated_at FROM conversations
        ORDER BY updated_at DESC, id DESC
      `),
      fetchConversation: this.db.prepare(`
        SELECT id, title, created_at, updated_at FROM conversations WHERE id = ?
      `),
      updateTitle: this.db.prepare(`
        UPDATE conversations SET title = ?, updated_at = ? WHERE id = ?
      `),
      touch: this.db.prepare(`
        UPDATE conversations SET updated_at = ? WHERE id = ?
      `),
      insertMessage: this.db.prepare(`
        INSERT INTO messages (id, conversation_id, role, content, created_at)
        VALUES (@id, @conversation_id, @role, @content, @created_at)
      `),
      listMessages: this.db.prepare(`
        SELECT id, conversation_id, role, content, created_at FROM messages
        WHERE conversation_id = ?
        ORDER BY created_at, id
      `),
      insertArtifact: this.db.prepare(`
        INSERT INTO artifacts (
          id, conversation_id, message_id, code, engine_state,
          result_json, result_type, error, created_at
        ) VALUES (
          @id, @conversation_id, @message_id, @code, @engine_state,
          @result_json, @result_type, @error, @created_at
        )
      `),
      fetchArtifact: this.db.prepare(`
        SELECT id, conversation_id, message_id, code, result_json, result_type, error, created_at
        FROM artifacts WHERE id = ?
      `),
      fetchArtifactState: this.db.prepare(`
        SELECT engine_state FROM artifacts WHERE id = ?
      `),
      listArtifacts: this.db.prepare(`
        SELECT id, conversation_id, message_id, code, result_json, result_type, error, created_at
        FROM artifacts WHERE conversation_id = ?
        ORDER BY created_at, id
      `),
    };
  }

  /** Map a foreign-key violation to NOT_FOUND; rethrow anything else */
  private rethrowConstraint(err: unknown, what: string): never {
    if (
      err instanceof Error &&
      err.message.includes("FOREIGN KEY constraint failed")
    ) {
      throw new StoreError("NOT_FOUND", `${what} not found`);
    }
    throw err;
  }

  async createConversation(
    title: string = DEFAULT_CONVERSATION_TITLE,
  ): Promise<Conversation> {
    if (title.trim() === "") {
      throw new StoreError("INVALID_REQUEST", "title must not be empty");
    }
    const now = new Date().toISOString();
    const conversation: Conversation = {
      id: this.nextId(),
      title,
      created_at: now,
      updated_at: now,
    };
    this.stmts.insertConversation.run(conversation);
    return conversation;
  }

  async listConversations(): Promise<Conversation[]> {
    return this.stmts.listConversations.all() as Conversation[];
  }

  async getConversation(id: string): Promise<Conversation | null> {
    const row = this.stmts.fetchConversation.get(id) as Conversation | undefined;
    return row ?? null;
  }

  async updateConversationTitle(id: string, title: string): Promise<void> {
    if (title.trim() === "") {
      throw new StoreError("INVALID_REQUEST", "title must not be empty");
    }
    const result = this.stmts.updateTitle.run(
      title,
      new Date().toISOString(),
      id,
    );
    if (result.changes === 0) {
      throw new StoreError("NOT_FOUND", `Conversation not found: ${id}`);
    }
  }

  async touchConversation(id: string): Promise<void> {
    this.stmts.touch.run(new Date().toISOString(), id);
  }

  async addMessage(
    conversation_id: string,
    role: MessageRole,
    content: string,
  ): Promise<Message> {
    if (!MESSAGE_ROLES.includes(role)) {
      throw new StoreError("INVALID_REQUEST", `Unknown message role: ${role}`);
    }
    const message: Message = {
      id: this.nextId(),
      conversation_id,
      role,
      content,
      created_at: new Date().toISOString(),
    };

    const tx = this.db.transaction(() => {
      this.stmts.insertMessage.run(message);
      this.stmts.touch.run(message.created_at, conversation_id);
    });
    try {
      tx();
    } catch (err) {
      this.rethrowConstraint(err, `Conversation ${conversation_id}`);
    }
    return message;
  }

  async getMessages(conversation_id: string): Promise<Message[]> {
    return this.stmts.listMessages.all(conversation_id) as Message[];
  }

  async saveArtifact(opts: SaveArtifactOpts): Promise<ArtifactRecord> {
    const record: ArtifactRecord = {
      id: this.nextId(),
      conversation_id: opts.conversation_id,
      message_id: opts.message_id ?? null,
      code: opts.code,
      result_json: opts.result_json ?? null,
      result_type: opts.result_type ?? null,
      error: opts.error ?? null,
      created_at: new Date().toISOString(),
    };

    try {
      this.stmts.insertArtifact.run({
        ...record,
        engine_state: opts.state ? Buffer.from(opts.state) : null,
      });
    } catch (err) {
      this.rethrowConstraint(err, `Conversation ${opts.conversation_id}`);
    }
    return record;
  }

  async getArtifact(id: string): Promise<ArtifactRecord | null> {
    const row = this.stmts.fetchArtifact.get(id) as ArtifactRow | undefined;
    return row ?? null;
  }

  async getArtifactState(id: string): Promise<Uint8Array | null> {
    const row = this.stmts.fetchArtifactState.get(id) as
      | { engine_state: Buffer | null }
      | undefined;
    if (!row) {
      throw new StoreError("NOT_FOUND", `Artifact not found: ${id}`);
    }
    return row.engine_state === null ? null : new Uint8Array(row.engine_state);
  }

  async listArtifacts(conversation_id: string): Promise<ArtifactRecord[]> {
    return this.stmts.listArtifacts.all(conversation_id) as ArtifactRow[];
  }
}
