import type { Logger } from "tslog";
import { createLogger } from "../infra/logger.js";
import type { AIProvider } from "./providers.js";
import { ToolRegistry } from "./tools.js";
import { createWorkspaceTools } from "./workspace-tools.js";
import type {
  AgentInvoker,
  AgentRequest,
  AgentTool,
  CompletionResponse,
  Message,
} from "./types.js";

/**
 * Agent runtime: message -> model -> reply, with a bounded tool loop.
 * When the model asks for tools, they run against the request's workspace
 * and the conversation is re-sent with their results.
 */

export interface AgentRuntimeConfig {
  model: string;
  systemPrompt?: string;
  maxToolRounds?: number;
  maxTokens?: number;
  temperature?: number;
}

export type ToolFactory = (workspaceDir: string) => AgentTool[];

const DEFAULT_MAX_TOOL_ROUNDS = 10;

export const MAX_ROUNDS_REPLY =
  "I was unable to complete the task within the allowed number of tool execution rounds.";

export class AgentRuntime implements AgentInvoker {
  readonly name: string;
  private readonly provider: AIProvider;
  private readonly config: AgentRuntimeConfig;
  private readonly logger: Logger<unknown>;
  private readonly toolFactory: ToolFactory;

  constructor(
    provider: AIProvider,
    config: AgentRuntimeConfig,
    options?: { logger?: Logger<unknown>; tools?: ToolFactory },
  ) {
    this.name = provider.name;
    this.provider = provider;
    this.config = config;
    this.logger = options?.logger ?? createLogger("agent-runtime");
    this.toolFactory = options?.tools ?? createWorkspaceTools;
  }

  async invoke(request: AgentRequest): Promise<string> {
    const maxRounds = this.config.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    const tools = new ToolRegistry(this.toolFactory(request.workspaceDir));
    const availableTools = tools.list();

    const messages: Message[] = [];
    if (this.config.systemPrompt) {
      messages.push({ role: "system", content: this.config.systemPrompt });
    }
    for (const record of request.history) {
      messages.push({ role: record.role, content: record.content });
    }
    messages.push({ role: "user", content: request.message });

    for (let round = 1; round <= maxRounds; round++) {
      this.logger.debug(`Completion round ${round}, model: ${this.config.model}`);

      const response: CompletionResponse = await this.provider.complete({
        model: this.config.model,
        messages,
        tools: availableTools.length > 0 ? availableTools : undefined,
        maxTokens: this.config.maxTokens,
        temperature: this.config.temperature,
      });

      messages.push(response.message);

      const toolCalls = response.message.toolCalls;
      if (response.finishReason === "tool_calls" && toolCalls && toolCalls.length > 0) {
        this.logger.debug(`Tool calls requested: ${toolCalls.map((tc) => tc.name).join(", ")}`);
        const results = await tools.executeAll(toolCalls);
        for (const result of results) {
          messages.push({
            role: "tool",
            content: result.content,
            toolCallId: result.toolCallId,
          });
        }
        continue;
      }

      if (response.usage) {
        this.logger.debug(
          `Session ${request.sessionKey} used ${response.usage.totalTokens} tokens`,
        );
      }
      return response.message.content;
    }

    this.logger.warn(`Max tool rounds (${maxRounds}) exceeded for session ${request.sessionKey}`);
    return MAX_ROUNDS_REPLY;
  }
}
