import { describe, it, expect, vi } from "vitest";
import { AdvisoryError } from "../errors.js";
import { summarizeEmissions } from "../emissions/aggregator.js";
import { createAdvisoryClient } from "./client.js";
import type { ChatMessage, ChatOptions, ChatResponse, LLMProvider } from "./types.js";

function makeProvider(
  impl: (messages: ChatMessage[], options?: ChatOptions) => Promise<ChatResponse>,
) {
  const chat = vi.fn(impl);
  const provider: LLMProvider = { name: "fake", chat };
  return { provider, chat };
}

const reply = (text: string): Promise<ChatResponse> =>
  Promise.resolve({ text, model: "fake-model", stopReason: "stop" });

describe("createAdvisoryClient", () => {
  describe("ask", () => {
    it("sends a system and a user message and returns the text", async () => {
      const { provider, chat } = makeProvider(() => reply("  Switch to a green tariff.  "));
      const client = createAdvisoryClient({ provider, model: "gpt-4o", maxTokens: 500 });

      const answer = await client.ask("How do I cut Scope 2?");

      expect(answer).toBe("Switch to a green tariff.");
      expect(chat).toHaveBeenCalledOnce();
      const [messages, options] = chat.mock.calls[0];
      expect(messages.map((m) => m.role)).toEqual(["system", "user"]);
      expect(messages[1].content).toBe("User query: How do I cut Scope 2?");
      expect(options?.model).toBe("gpt-4o");
      expect(options?.maxTokens).toBe(500);
      expect(options?.signal).toBeInstanceOf(AbortSignal);
    });

    it("includes organization context in the prompt", async () => {
      const { provider, chat } = makeProvider(() => reply("ok"));
      const client = createAdvisoryClient({ provider });

      await client.ask("Which frameworks apply?", { organization: "Acme Foods", frameworks: ["GRI"] });

      const [messages] = chat.mock.calls[0];
      expect(messages[1].content).toBe(
        'Context about the organization: {"organization":"Acme Foods","applicableFrameworks":["GRI"]}\n\nUser query: Which frameworks apply?',
      );
    });

    it("rejects an empty question without calling the provider", async () => {
      const { provider, chat } = makeProvider(() => reply("unused"));
      const client = createAdvisoryClient({ provider });

      await expect(client.ask("   ")).rejects.toThrow("Question must not be empty");
      expect(chat).not.toHaveBeenCalled();
    });

    it("wraps provider failures in AdvisoryError with the cause", async () => {
      const failure = new Error("OpenAI API error: 401 bad key");
      const { provider } = makeProvider(() => Promise.reject(failure));
      const client = createAdvisoryClient({ provider });

      const err = await client.ask("Hello?").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(AdvisoryError);
      if (err instanceof AdvisoryError) {
        expect(err.message).toBe("Advisory request failed: OpenAI API error: 401 bad key");
        expect(err.cause).toBe(failure);
        expect(err.code).toBe("ADVISORY");
      }
    });

    it("rejects an empty provider response", async () => {
      const { provider } = makeProvider(() => reply(""));
      const client = createAdvisoryClient({ provider });

      await expect(client.ask("Hello?")).rejects.toThrow(
        "Advisory provider fake returned an empty response",
      );
    });
  });

  describe("analyzeEmissions", () => {
    const summary = summarizeEmissions([
      { scope: 1, category: "Fleet", amount: 600 },
      { scope: 2, category: "Electricity", amount: 400 },
    ]);

    it("requests JSON and parses the analysis", async () => {
      const { provider, chat } = makeProvider(() =>
        reply('```json\n{"insights":["Fleet dominates"],"recommendations":["Electrify vans"]}\n```'),
      );
      const client = createAdvisoryClient({ provider, maxTokens: 800 });

      const analysis = await client.analyzeEmissions(summary);

      expect(analysis).toEqual({
        insights: ["Fleet dominates"],
        recommendations: ["Electrify vans"],
        dataQuality: [],
      });
      const [, options] = chat.mock.calls[0];
      expect(options?.responseFormat).toBe("json");
      expect(options?.maxTokens).toBe(1000);
    });

    it("rejects non-JSON analysis output", async () => {
      const { provider } = makeProvider(() => reply("I cannot do that."));
      const client = createAdvisoryClient({ provider });

      await expect(client.analyzeEmissions(summary)).rejects.toThrow(
        "Advisory provider returned an analysis that is not valid JSON",
      );
    });

    it("refuses to analyze an empty inventory", async () => {
      const { provider, chat } = makeProvider(() => reply("{}"));
      const client = createAdvisoryClient({ provider });

      await expect(client.analyzeEmissions(summarizeEmissions([]))).rejects.toThrow(
        "Nothing to analyze: the emissions total is zero",
      );
      expect(chat).not.toHaveBeenCalled();
    });
  });
});
