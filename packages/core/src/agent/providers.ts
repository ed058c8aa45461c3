import { z } from "zod";
import { AgentError } from "../infra/errors.js";
import { fetchWithRetry, type RetryOptions } from "./retry.js";
import type { CompletionRequest, CompletionResponse, Message, TokenUsage } from "./types.js";

/**
 * Chat-completion provider. The gateway ships an OpenAI-compatible client,
 * which covers OpenRouter and most hosted model APIs.
 */
export interface AIProvider {
  readonly name: string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface OpenAICompatibleProviderOptions {
  name: string;
  apiKey: string;
  baseUrl: string;
  retry?: Partial<RetryOptions>;
}

const OpenAIResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string() }),
              }),
            )
            .nullish(),
        }),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .nullish(),
});

export function createOpenAICompatibleProvider(
  options: OpenAICompatibleProviderOptions,
): AIProvider {
  const baseUrl = options.baseUrl.replace(/\/+$/, "");

  return {
    name: options.name,
    async complete(request: CompletionRequest): Promise<CompletionResponse> {
      const body = {
        model: request.model,
        messages: request.messages.map(formatOpenAIMessage),
        ...(request.maxTokens !== undefined && { max_tokens: request.maxTokens }),
        ...(request.temperature !== undefined && {
          temperature: request.temperature,
        }),
        ...(request.tools && request.tools.length > 0 && {
          tools: request.tools.map((t) => ({
            type: "function" as const,
            function: {
              name: t.name,
              description: t.description,
              parameters: t.parameters,
            },
          })),
        }),
      };

      const response = await fetchWithRetry(
        `${baseUrl}/chat/completions`,
        {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${options.apiKey}`,
            "X-Title": "tidewire",
          },
          body: JSON.stringify(body),
        },
        options.retry,
      );

      const parsed = OpenAIResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new AgentError("Unexpected completion response shape", parsed.error);
      }

      const choice = parsed.data.choices[0];
      if (!choice) {
        throw new AgentError("No completion choice returned from provider");
      }

      const toolCalls = choice.message.tool_calls ?? [];
      const message: Message = {
        role: "assistant",
        content: choice.message.content ?? "",
        ...(toolCalls.length > 0 && {
          toolCalls: toolCalls.map((tc) => ({
            id: tc.id,
            name: tc.function.name,
            arguments: tc.function.arguments,
          })),
        }),
      };

      const usage: TokenUsage | undefined = parsed.data.usage
        ? {
            promptTokens: parsed.data.usage.prompt_tokens,
            completionTokens: parsed.data.usage.completion_tokens,
            totalTokens: parsed.data.usage.total_tokens,
          }
        : undefined;

      const finishReason =
        choice.finish_reason === "tool_calls" || toolCalls.length > 0 ? "tool_calls"
        : choice.finish_reason === "length" ? "length"
        : "stop";

      return { message, usage, finishReason };
    },
  };
}

function formatOpenAIMessage(msg: Message): Record<string, unknown> {
  const base: Record<string, unknown> = {
    role: msg.role,
    content: msg.content,
  };
  if (msg.toolCallId) base.tool_call_id = msg.toolCallId;
  if (msg.toolCalls) {
    base.tool_calls = msg.toolCalls.map((tc) => ({
      id: tc.id,
      type: "function",
      function: { name: tc.name, arguments: tc.arguments },
    }));
  }
  return base;
}
