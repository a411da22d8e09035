/**
 * Assistant
 *
 * Answers a query with the configured OpenAI model. Inside a thread the
 * recent stored messages go along as the conversation so far.
 */

import { LLM_MODELS, MODEL_SETTINGS, SYSTEM_PROMPTS } from "../config/models";
import { SUMMARY_CONSTANTS } from "../config/constants";
import { isBotNotice } from "../config/messages";
import type { Collaborator, InboundEvent } from "../coordinator/types";
import type { LLMMessage, TextGenerator } from "../llm/client";
import type { IStorage } from "../storage";
import type { StoredMessage } from "@shared/schema";
import { ExternalServiceError } from "../utils/errorHandler";

export interface AssistantDeps {
  storage: Pick<IStorage, "getThreadHistory">;
  generate: TextGenerator;
  model?: string;
  historyLimit?: number;
}

const PART_HEADER = /^\[Part \d+\/\d+\]\n/;

/** One stored thread message as a conversation turn, or null for bot notices. */
export function historyTurn(message: StoredMessage): LLMMessage | null {
  if (!message.isBot) {
    return { role: "user", content: `${message.authorName}: ${message.content}` };
  }
  if (isBotNotice(message.content)) {
    return null;
  }
  return { role: "assistant", content: message.content.replace(PART_HEADER, "") };
}

export async function buildConversation(
  event: InboundEvent,
  query: string,
  storage: Pick<IStorage, "getThreadHistory">,
  historyLimit: number,
): Promise<LLMMessage[]> {
  const conversation: LLMMessage[] = [{ role: "system", content: SYSTEM_PROMPTS.ASSISTANT }];

  if (event.isAlreadyInThread) {
    const history = await storage.getThreadHistory(event.threadId ?? event.channelId, historyLimit + 1);
    for (const message of history) {
      if (message.id === event.eventId) continue;
      const turn = historyTurn(message);
      if (turn) conversation.push(turn);
    }
  }

  conversation.push({ role: "user", content: `${event.authorName}: ${query}` });
  return conversation;
}

export function createAssistant(deps: AssistantDeps): Collaborator {
  const generate = deps.generate;
  const model = deps.model ?? LLM_MODELS.ASSISTANT;
  const historyLimit = deps.historyLimit ?? SUMMARY_CONSTANTS.THREAD_HISTORY_LIMIT;

  return async (event, query) => {
    const messages = await buildConversation(event, query, deps.storage, historyLimit);
    const response = await generate({
      model,
      messages,
      temperature: MODEL_SETTINGS.ASSISTANT_TEMPERATURE,
      maxTokens: MODEL_SETTINGS.ASSISTANT_MAX_TOKENS,
    });

    const text = response.text.trim();
    if (!text) {
      throw new ExternalServiceError("OpenAI", "Empty response");
    }

    console.log(`[Assistant] Answered ${event.eventId} with ${model} (${response.totalTokens ?? "?"} tokens, ${messages.length - 2} history messages)`);
    return { text, visualizations: [] };
  };
}
