import type { StreamingOrchestrator } from "../orchestrator/orchestrator.js";
import { StoreError } from "../persistence/errors.js";
import type { ConversationStore } from "../persistence/store.js";
import {
  type ArtifactRecord,
  type Conversation,
  DEFAULT_CONVERSATION_TITLE,
  type Message,
} from "../persistence/types.js";
import type { CodeExecutor } from "../sandbox/bridge.js";
import type { DonePayload, StreamEvent } from "../schemas/stream-event.js";

const TITLE_MAX_CHARS = 80;

export interface ChatRequest {
  conversation_id?: string | null; // absent: start a new conversation
  message: string;
}

export interface ChatTurn {
  conversation_id: string;
  events: AsyncGenerator<StreamEvent, void, undefined>;
}

export interface ConversationView {
  conversation: Conversation;
  messages: Message[];
  artifacts: ArtifactRecord[];
}

export interface ReplayResult {
  artifact_id: string;
  code: string;
  result_json: string | null;
  result_type: string;
  error: string | null;
}

export interface ChatServiceOpts {
  store: ConversationStore;
  orchestrator: Pick<StreamingOrchestrator, "stream">;
  executor: CodeExecutor;
}

/** Title from the first user message: at most 80 chars, "..." when cut */
export function titleFromMessage(message: string): string {
  const title = message.trim().slice(0, TITLE_MAX_CHARS);
  if (title.length >= TITLE_MAX_CHARS) {
    return `${title.slice(0, TITLE_MAX_CHARS - 3)}...`;
  }
  return title;
}

/**
 * One conversational turn end to end, independent of any transport:
 * persists the user message, relays the orchestrator's events and stores
 * the assistant's reply when the turn completes.
 */
export class ChatService {
  private readonly store: ConversationStore;
  private readonly orchestrator: Pick<StreamingOrchestrator, "stream">;
  private readonly executor: CodeExecutor;

  constructor(opts: ChatServiceOpts) {
    this.store = opts.store;
    this.orchestrator = opts.orchestrator;
    this.executor = opts.executor;
  }

  async chat(req: ChatRequest): Promise<ChatTurn> {
    if (req.message.trim() === "") {
      throw new StoreError("INVALID_REQUEST", "message must not be empty");
    }

    let conversationId = req.conversation_id;
    if (!conversationId) {
      const conversation = await this.store.createConversation();
      conversationId = conversation.id;
      console.info(`[chat] new conversation ${conversationId}`);
    } else if (!(await this.store.getConversation(conversationId))) {
      throw new StoreError(
        "NOT_FOUND",
        `Conversation not found: ${conversationId}`,
      );
    }

    await this.store.addMessage(conversationId, "user", req.message);

    return {
      conversation_id: conversationId,
      events: this.relay(conversationId, req.message),
    };
  }

  private async *relay(
    conversationId: string,
    message: string,
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const textParts: string[] = [];
    try {
      for await (const event of this.orchestrator.stream(
        conversationId,
        message,
      )) {
        if (event.type === "text") {
          textParts.push(event.data);
        } else if (event.type === "done") {
          await this.finalizeTurn(conversationId, message, textParts.join(""));
        }
        yield event;
      }
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      console.error(`[chat] stream failed for ${conversationId}: ${detail}`);
      const done: DonePayload = { error: detail };
      yield { type: "error", data: detail };
      yield { type: "done", data: JSON.stringify(done) };
    }
  }

  /** Store the assistant reply and title a conversation still on the default title. */
  private async finalizeTurn(
    conversationId: string,
    userMessage: string,
    reply: string,
  ): Promise<void> {
    if (reply.trim()) {
      await this.store.addMessage(conversationId, "assistant", reply);
    }
    const conversation = await this.store.getConversation(conversationId);
    if (conversation && conversation.title === DEFAULT_CONVERSATION_TITLE) {
      await this.store.updateConversationTitle(
        conversationId,
        titleFromMessage(userMessage),
      );
    }
  }

  listConversations(): Promise<Conversation[]> {
    return this.store.listConversations();
  }

  async getConversationView(id: string): Promise<ConversationView> {
    const conversation = await this.store.getConversation(id);
    if (!conversation) {
      throw new StoreError("NOT_FOUND", `Conversation not found: ${id}`);
    }
    const [messages, artifacts] = await Promise.all([
      this.store.getMessages(id),
      this.store.listArtifacts(id),
    ]);
    return { conversation, messages, artifacts };
  }

  async getArtifact(id: string): Promise<ArtifactRecord> {
    const artifact = await this.store.getArtifact(id);
    if (!artifact) {
      throw new StoreError("NOT_FOUND", `Artifact not found: ${id}`);
    }
    return artifact;
  }

  /** Re-run a stored artifact's code against the current data; nothing is persisted. */
  async replayArtifact(id: string): Promise<ReplayResult> {
    const artifact = await this.getArtifact(id);
    const outcome = await this.executor.run(artifact.code);
    return {
      artifact_id: artifact.id,
      code: artifact.code,
      result_json: outcome.output_json,
      result_type: outcome.output_type,
      error: outcome.error,
    };
  }
}
