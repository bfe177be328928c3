// Contract
export type {
  AgentContentBlock,
  AgentMessage,
  AgentRunner,
  AgentRunOptions,
  AgentTool,
  ToolResult,
} from "./types.js";

// Prompts
export {
  buildPromptWithHistory,
  buildSystemPrompt,
  withoutCurrentMessage,
} from "./prompts.js";

// Tools
export {
  createAgentTools,
  EXECUTE_CODE_TOOL,
  executeCode,
  LOAD_RESULT_TOOL,
  loadResult,
} from "./tools.js";
export type { AgentToolDeps } from "./tools.js";
