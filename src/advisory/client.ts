/**
 * Advisory assistant: wraps one LLM call per question.
 */

import { AdvisoryError } from "../errors.js";
import type { EmissionsSummary } from "../emissions/types.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import {
  buildAdvisorSystemPrompt,
  buildAdvisorUserPrompt,
  buildAnalysisSystemPrompt,
  buildAnalysisUserPrompt,
  parseAnalysisResponse,
} from "./prompts.js";
import type {
  AdvisoryClient,
  AdvisoryContext,
  ChatMessage,
  ChatOptions,
  EmissionsAnalysis,
  LLMProvider,
} from "./types.js";

const log = createSubsystemLogger("advisory");

export interface AdvisoryClientOptions {
  provider: LLMProvider;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Per-request timeout. Default: 30s */
  timeoutMs?: number;
}

export interface SustainabilityAdvisor extends AdvisoryClient {
  analyzeEmissions(summary: EmissionsSummary): Promise<EmissionsAnalysis>;
}

export function createAdvisoryClient(options: AdvisoryClientOptions): SustainabilityAdvisor {
  const { provider, model, maxTokens = 800, temperature, timeoutMs = 30_000 } = options;

  async function complete(
    messages: ChatMessage[],
    extra: Pick<ChatOptions, "responseFormat" | "maxTokens"> = {},
  ): Promise<string> {
    let text: string;
    try {
      const response = await provider.chat(messages, {
        model,
        maxTokens: extra.maxTokens ?? maxTokens,
        temperature,
        responseFormat: extra.responseFormat,
        signal: AbortSignal.timeout(timeoutMs),
      });
      text = response.text;
      log.debug(`advisor response from ${provider.name}`, { model: response.model });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.warn(`advisor request via ${provider.name} failed: ${reason}`);
      throw new AdvisoryError(`Advisory request failed: ${reason}`, { cause: err });
    }

    if (!text.trim()) {
      throw new AdvisoryError(`Advisory provider ${provider.name} returned an empty response`);
    }
    return text.trim();
  }

  return {
    async ask(query: string, context?: AdvisoryContext): Promise<string> {
      const question = query.trim();
      if (!question) {
        throw new AdvisoryError("Question must not be empty");
      }
      return complete([
        { role: "system", content: buildAdvisorSystemPrompt() },
        { role: "user", content: buildAdvisorUserPrompt(question, context) },
      ]);
    },

    async analyzeEmissions(summary: EmissionsSummary): Promise<EmissionsAnalysis> {
      if (summary.grandTotal <= 0) {
        throw new AdvisoryError("Nothing to analyze: the emissions total is zero");
      }
      const text = await complete(
        [
          { role: "system", content: buildAnalysisSystemPrompt() },
          { role: "user", content: buildAnalysisUserPrompt(summary) },
        ],
        { responseFormat: "json", maxTokens: Math.max(maxTokens, 1000) },
      );
      const analysis = parseAnalysisResponse(text);
      if (!analysis) {
        throw new AdvisoryError("Advisory provider returned an analysis that is not valid JSON");
      }
      return analysis;
    },
  };
}
