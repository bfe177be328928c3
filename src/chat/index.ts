export { ChatService, titleFromMessage } from "./service.js";
export type {
  ChatRequest,
  ChatServiceOpts,
  ChatTurn,
  ConversationView,
  ReplayResult,
} from "./service.js";
