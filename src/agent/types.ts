/**
 * Contract of the agent reasoning loop.
 *
 * The runner owns model calls and tool selection; this project only supplies
 * the prompt and the tools, and observes the structured messages it yields.
 * Tool handlers are invoked by the runner between its messages.
 */

export type AgentContentBlock =
  | { type: "text"; text: string }
  | {
      type: "tool_use";
      id: string;
      name: string;
      input: Record<string, unknown>;
    };

export type AgentMessage =
  | { type: "assistant"; content: AgentContentBlock[] }
  | {
      type: "tool_result";
      tool_use_id: string;
      content: string;
      is_error?: boolean;
    }
  | {
      type: "result";
      subtype: "success" | "error_max_turns" | "error_during_execution";
      num_turns: number;
    };

export interface ToolResult {
  content: string;
  is_error?: boolean;
}

export interface AgentTool {
  name: string;
  description: string;
  input_schema: Record<string, unknown>; // JSON Schema of the tool input
  handler(input: unknown): Promise<ToolResult>;
}

export interface AgentRunOptions {
  model: string;
  system_prompt: string;
  prompt: string;
  tools: AgentTool[];
  max_turns: number;
}

export interface AgentRunner {
  run(opts: AgentRunOptions): AsyncIterable<AgentMessage>;
}
