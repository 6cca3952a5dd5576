/**
 * OpenAI-compatible chat completions provider.
 */

import { createSubsystemLogger } from "../logging/subsystem.js";
import type { ChatMessage, ChatOptions, ChatResponse, LLMProvider } from "./types.js";

const log = createSubsystemLogger("advisory").child("openai");

export interface OpenAIProviderOptions {
  apiKey: string;
  /** Default: https://api.openai.com/v1 */
  baseUrl?: string;
  /** Used when a chat call names no model. Default: gpt-4o */
  defaultModel?: string;
}

type ChatCompletionBody = {
  choices: Array<{ message: { content: string | null }; finish_reason: string }>;
  model: string;
  usage?: { prompt_tokens: number; completion_tokens: number };
};

export function createOpenAIProvider(options: OpenAIProviderOptions): LLMProvider {
  const baseUrl = (options.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
  const defaultModel = options.defaultModel ?? "gpt-4o";

  return {
    name: "openai",

    async chat(messages: ChatMessage[], chatOptions?: ChatOptions): Promise<ChatResponse> {
      const model = chatOptions?.model ?? defaultModel;
      log.debug(`chat request`, { model, messageCount: messages.length });

      const response = await fetch(`${baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${options.apiKey}`,
        },
        body: JSON.stringify({
          model,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          max_tokens: chatOptions?.maxTokens,
          temperature: chatOptions?.temperature,
          response_format:
            chatOptions?.responseFormat === "json" ? { type: "json_object" } : undefined,
        }),
        signal: chatOptions?.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`OpenAI API error: ${response.status} ${errorText}`);
      }

      const data = (await response.json()) as ChatCompletionBody;

      const choice = data.choices[0];
      if (!choice) {
        throw new Error("No response from OpenAI API");
      }

      return {
        text: choice.message.content ?? "",
        model: data.model,
        usage: data.usage
          ? {
              inputTokens: data.usage.prompt_tokens,
              outputTokens: data.usage.completion_tokens,
            }
          : undefined,
        stopReason: choice.finish_reason === "length" ? "length" : "stop",
      };
    },
  };
}
