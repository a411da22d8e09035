/**
 * LLM client
 *
 * Collaborators depend on the TextGenerator signature only, so tests swap in
 * a scripted generator and the process wires the OpenAI-backed one.
 */

import { OpenAI } from "openai";
import { ExternalServiceError } from "../utils/errorHandler";

export type LLMMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type LLMRequestOptions = {
  model: string;
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
};

export type LLMResponse = {
  text: string;
  model: string;
  totalTokens?: number;
};

export type TextGenerator = (opts: LLMRequestOptions) => Promise<LLMResponse>;

export const MISSING_API_KEY = "missing_api_key";

/**
 * Chat completions through the OpenAI SDK. Without a key every call fails
 * with an error classified as a configuration problem; the client itself is
 * built on first use.
 */
export function createOpenAIGenerator(apiKey: string | undefined): TextGenerator {
  let client: OpenAI | null = null;

  return async (opts) => {
    if (!apiKey) {
      throw new ExternalServiceError("OpenAI", "OPENAI_API_KEY is not set", MISSING_API_KEY);
    }
    client ??= new OpenAI({ apiKey });

    const completion = await client.chat.completions.create({
      model: opts.model,
      messages: opts.messages,
      ...(opts.temperature !== undefined && { temperature: opts.temperature }),
      ...(opts.maxTokens !== undefined && { max_tokens: opts.maxTokens }),
    });

    return {
      text: completion.choices[0]?.message?.content ?? "",
      model: completion.model,
      totalTokens: completion.usage?.total_tokens,
    };
  };
}
