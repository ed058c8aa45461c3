import type { ChatMessageRecord } from "../sessions/types.js";

/**
 * Everything the agent gets for one turn.
 */
export interface AgentRequest {
  message: string;
  sessionKey: string;
  /** Directory the agent reads and writes files in for this turn. */
  workspaceDir: string;
  /** Earlier messages of the session, oldest first, excluding `message`. */
  history: ChatMessageRecord[];
}

/**
 * Boundary to the conversational agent. Returns the reply text, which may
 * be empty when the agent has nothing to say.
 */
export interface AgentInvoker {
  readonly name: string;
  invoke(request: AgentRequest): Promise<string>;
}

export type ChatRole = "system" | "user" | "assistant" | "tool";

export interface Message {
  role: ChatRole;
  content: string;
  toolCallId?: string;
  toolCalls?: ToolCall[];
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: string;
}

export interface ToolResult {
  toolCallId: string;
  content: string;
  isError?: boolean;
}

export interface AgentTool {
  name: string;
  description: string;
  /** JSON Schema of the arguments object. */
  parameters: Record<string, unknown>;
  execute: (args: Record<string, unknown>) => Promise<string>;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionRequest {
  model: string;
  messages: Message[];
  tools?: AgentTool[];
  maxTokens?: number;
  temperature?: number;
}

export interface CompletionResponse {
  message: Message;
  usage?: TokenUsage;
  finishReason: "stop" | "tool_calls" | "length";
}
