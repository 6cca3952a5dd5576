import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { createOpenAIProvider } from "./openai-provider.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("createOpenAIProvider", () => {
  let fetchSpy: MockInstance<typeof fetch>;

  beforeEach(() => {
    fetchSpy = vi.spyOn(globalThis, "fetch");
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("posts a chat completion request and maps the response", async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({
        model: "gpt-4o-2024-08-06",
        choices: [{ message: { content: "Use renewable power." }, finish_reason: "stop" }],
        usage: { prompt_tokens: 120, completion_tokens: 30 },
      }),
    );

    const provider = createOpenAIProvider({ apiKey: "test-key", baseUrl: "http://localhost:9999/v1/" });
    const result = await provider.chat([{ role: "user", content: "Hi" }], {
      maxTokens: 100,
      responseFormat: "json",
    });

    expect(result).toEqual({
      text: "Use renewable power.",
      model: "gpt-4o-2024-08-06",
      usage: { inputTokens: 120, outputTokens: 30 },
      stopReason: "stop",
    });

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe("http://localhost:9999/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-key",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "gpt-4o",
      messages: [{ role: "user", content: "Hi" }],
      max_tokens: 100,
      response_format: { type: "json_object" },
    });
  });

  it("maps a length finish reason", async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({
        model: "gpt-4o",
        choices: [{ message: { content: "partial" }, finish_reason: "length" }],
      }),
    );

    const provider = createOpenAIProvider({ apiKey: "test-key" });
    const result = await provider.chat([{ role: "user", content: "Hi" }], { model: "gpt-4o-mini" });

    expect(result.stopReason).toBe("length");
    expect(result.usage).toBeUndefined();
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe("https://api.openai.com/v1/chat/completions");
    expect(JSON.parse(String(init?.body)).model).toBe("gpt-4o-mini");
  });

  it("throws with status and body on HTTP errors", async () => {
    fetchSpy.mockResolvedValueOnce(new Response("invalid api key", { status: 401 }));

    const provider = createOpenAIProvider({ apiKey: "test-key" });
    await expect(provider.chat([{ role: "user", content: "Hi" }])).rejects.toThrow(
      "OpenAI API error: 401 invalid api key",
    );
  });

  it("throws when no choices are returned", async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ model: "gpt-4o", choices: [] }));

    const provider = createOpenAIProvider({ apiKey: "test-key" });
    await expect(provider.chat([{ role: "user", content: "Hi" }])).rejects.toThrow(
      "No response from OpenAI API",
    );
  });
});
