import { describe, it, expect } from "vitest";
import { createChatCompletion, DEFAULT_LLM_BASE_URL, DEFAULT_LLM_MODEL } from "./llm-client.js";
import { TransportError } from "./errors.js";
import { createFakeFetch, jsonResponse, type FakeFetchHandler } from "./test-utils.js";
import type { ConversationTurn } from "./types.js";

const config = { baseUrl: "https://llm.test/v1/", apiKey: "test-secret", model: "test-model" };
const messages: ConversationTurn[] = [
  { role: "system", content: "be brief" },
  { role: "user", content: "hi" },
];

function completionWith(handler: FakeFetchHandler) {
  const fake = createFakeFetch(handler);
  return { complete: createChatCompletion(config, fake.fetch), requests: fake.requests };
}

describe("createChatCompletion", () => {
  it("defaults to Groq and its model", () => {
    expect(DEFAULT_LLM_BASE_URL).toBe("https://api.groq.com/openai/v1");
    expect(DEFAULT_LLM_MODEL).toBe("deepseek-r1-distill-llama-70b");
  });

  it("posts the transcript and returns the first choice", async () => {
    const { complete, requests } = completionWith(() =>
      jsonResponse(200, { choices: [{ message: { role: "assistant", content: "hello" } }] })
    );

    await expect(complete(messages)).resolves.toBe("hello");

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe("https://llm.test/v1/chat/completions");
    expect(requests[0].method).toBe("POST");
    expect(requests[0].body).toEqual({ model: "test-model", messages });
    expect(requests[0].headers.get("Authorization")).toBe("Bearer test-secret");
  });

  it("returns an empty string for a null content", async () => {
    const { complete } = completionWith(() => jsonResponse(200, { choices: [{ message: { content: null } }] }));

    await expect(complete(messages)).resolves.toBe("");
  });

  it("throws TransportError on a non-ok status", async () => {
    const { complete } = completionWith(() => new Response("bad key", { status: 401 }));

    const error = await complete(messages).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty("message", "LLM request failed: 401 bad key");
  });

  it("throws TransportError when the endpoint is unreachable", async () => {
    const { complete } = completionWith(() => {
      throw new TypeError("fetch failed");
    });

    await expect(complete(messages)).rejects.toThrow("LLM request failed: fetch failed");
  });

  it("throws TransportError when the reply has no choices", async () => {
    const { complete } = completionWith(() => jsonResponse(200, { choices: [] }));

    await expect(complete(messages)).rejects.toBeInstanceOf(TransportError);
  });
});
