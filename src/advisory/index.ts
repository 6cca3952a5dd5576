/**
 * Sustainability advisor backed by an LLM provider.
 *
 * @module advisory
 */

export type {
  AdvisoryClient,
  AdvisoryContext,
  ChatMessage,
  ChatOptions,
  ChatResponse,
  EmissionsAnalysis,
  LLMProvider,
} from "./types.js";
export {
  createAdvisoryClient,
  type AdvisoryClientOptions,
  type SustainabilityAdvisor,
} from "./client.js";
export { createOpenAIProvider, type OpenAIProviderOptions } from "./openai-provider.js";
export { createOfflineProvider, offlineAnswer } from "./offline-provider.js";
export {
  buildAdvisorSystemPrompt,
  buildAdvisorUserPrompt,
  buildAnalysisSystemPrompt,
  buildAnalysisUserPrompt,
  parseAnalysisResponse,
  summarizeForPrompt,
} from "./prompts.js";
