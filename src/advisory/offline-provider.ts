/**
 * Keyword-based responder used when no API key is configured.
 */

import type { ChatMessage, ChatResponse, LLMProvider } from "./types.js";

const REDUCTION_ANSWER = `Focus reduction work on your largest sources first:
1. Switch purchased electricity to a renewable tariff or on-site generation; this can remove most Scope 2 emissions.
2. Electrify or right-size the vehicle fleet and heating to cut Scope 1 combustion.
3. Replace short-haul flights with rail or video calls to lower Scope 3 business travel.
Run "scopeledger emissions summarize" on your data to see which scope dominates.`;

const REPORTING_ANSWER = `Common starting points for reporting:
- GHG Protocol Corporate Standard for emissions accounting
- GRI Standards for overall sustainability reporting
- CDP for climate disclosure when investors or customers request it
Run "scopeledger frameworks match" with your organization profile to see which frameworks apply.`;

const DEFAULT_ANSWER = `The offline advisor only covers emissions reduction and reporting questions.
Set OPENAI_API_KEY to get answers tailored to your emissions data.`;

const REDUCTION_WORDS = ["carbon", "emission", "footprint"];
const REPORTING_WORDS = ["report", "compliance", "framework", "disclos"];

/** Pick the canned answer for a question. */
export function offlineAnswer(question: string): string {
  const q = question.toLowerCase();
  if (q.includes("reduc") && REDUCTION_WORDS.some((w) => q.includes(w))) {
    return REDUCTION_ANSWER;
  }
  if (REPORTING_WORDS.some((w) => q.includes(w))) {
    return REPORTING_ANSWER;
  }
  return DEFAULT_ANSWER;
}

/** The query sits after the "User query:" marker in the advisor prompt. */
function extractQuestion(messages: ChatMessage[]): string {
  const lastUser = messages.filter((m) => m.role === "user").pop();
  if (!lastUser) return "";
  const marker = lastUser.content.lastIndexOf("User query:");
  return marker === -1
    ? lastUser.content
    : lastUser.content.slice(marker + "User query:".length).trim();
}

export function createOfflineProvider(): LLMProvider {
  return {
    name: "offline",

    async chat(messages, options): Promise<ChatResponse> {
      if (options?.responseFormat === "json") {
        return {
          text: JSON.stringify({
            insights: [],
            recommendations: [REDUCTION_ANSWER.split("\n")[1].replace(/^1\.\s*/, "")],
            dataQuality: ["Offline mode: set OPENAI_API_KEY for a full analysis."],
          }),
          model: "offline",
          stopReason: "stop",
        };
      }
      return { text: offlineAnswer(extractQuestion(messages)), model: "offline", stopReason: "stop" };
    },
  };
}
