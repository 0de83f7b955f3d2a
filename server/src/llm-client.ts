/**
 * Minimal OpenAI-compatible chat-completion client (Groq by default).
 */

import { z } from "zod";
import { TransportError, errorMessage } from "./errors.js";
import type { FetchLike } from "./pull-request.js";
import type { ConversationTurn } from "./types.js";

export const DEFAULT_LLM_BASE_URL = "https://api.groq.com/openai/v1";
export const DEFAULT_LLM_MODEL = "deepseek-r1-distill-llama-70b";

export interface LlmConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
}

/** Sends the transcript, returns the assistant's text. */
export type ChatCompletion = (messages: ConversationTurn[]) => Promise<string>;

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .min(1),
});

export function createChatCompletion(config: LlmConfig, fetchImpl: FetchLike = (input, init) => fetch(input, init)): ChatCompletion {
  const url = `${config.baseUrl.replace(/\/+$/, "")}/chat/completions`;

  return async (messages) => {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${config.apiKey}`,
        },
        body: JSON.stringify({ model: config.model, messages }),
      });
    } catch (err: unknown) {
      throw new TransportError(`LLM request failed: ${errorMessage(err)}`, err);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new TransportError(`LLM request failed: ${response.status} ${text.slice(0, 500)}`);
    }

    const parsed = CompletionSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new TransportError("LLM response did not contain a choice");
    }
    return parsed.data.choices[0].message.content ?? "";
  };
}
