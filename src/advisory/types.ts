/**
 * LLM provider abstraction for the advisory assistant.
 *
 * Providers are backend-agnostic: a hosted chat-completions API, an offline
 * responder, or a mock in tests.
 */

import type { EmissionsSummary } from "../emissions/types.js";
import type { OrganizationProfile } from "../frameworks/types.js";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatOptions {
  /** Model identifier (e.g., "gpt-4o") */
  model?: string;

  /** Temperature for response randomness (0-2) */
  temperature?: number;

  /** Maximum tokens in response */
  maxTokens?: number;

  /** Ask the backend for a JSON object instead of free text */
  responseFormat?: "text" | "json";

  /** Abort signal for cancellation */
  signal?: AbortSignal;
}

export interface ChatResponse {
  /** The assistant's response text */
  text: string;

  /** Model that generated the response */
  model: string;

  /** Token usage (if available) */
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };

  stopReason?: "stop" | "length" | "error";
}

export interface LLMProvider {
  /** Provider name for logging */
  readonly name: string;

  chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;
}

/** Organization facts passed along with a question. */
export type AdvisoryContext = {
  organization?: string;
  profile?: OrganizationProfile;
  summary?: EmissionsSummary;
  frameworks?: string[];
};

export interface AdvisoryClient {
  ask(query: string, context?: AdvisoryContext): Promise<string>;
}

export type EmissionsAnalysis = {
  insights: string[];
  recommendations: string[];
  dataQuality: string[];
};
