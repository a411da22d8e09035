/**
 * Channel Summarizer
 *
 * Backs /sum-day and /sum-hr: summarizes the stored human messages of a
 * channel over a window of 1 to 168 hours. /chart-day and /chart-hr ask for
 * the same window as tables and attach them as rendered charts.
 */

import { format, subHours } from "date-fns";
import { SUMMARY_CONSTANTS } from "../config/constants";
import { invalidHoursMessage, noMessagesFoundMessage } from "../config/messages";
import { LLM_MODELS, MODEL_SETTINGS, SYSTEM_PROMPTS } from "../config/models";
import { isChartCommand, type Collaborator, type InboundEvent } from "../coordinator/types";
import type { TextGenerator } from "../llm/client";
import type { IStorage } from "../storage";
import { ExternalServiceError, ValidationError } from "../utils/errorHandler";
import type { StoredMessage } from "@shared/schema";
import { extractCharts, svgToPng, type RenderPng } from "./chartRenderer";

export interface SummarizerDeps {
  storage: Pick<IStorage, "getChannelMessagesSince" | "storeChannelSummary">;
  generate: TextGenerator;
  model?: string;
  now?: () => Date;
  maxMessages?: number;
  renderChart?: RenderPng;
}

export function summaryHours(event: InboundEvent): number {
  if (event.commandName === "sum-day" || event.commandName === "chart-day") {
    return SUMMARY_CONSTANTS.DEFAULT_HOURS;
  }
  const raw = event.commandOptions?.hours;
  const hours = typeof raw === "number" ? raw : Number(raw);
  if (!Number.isInteger(hours) || hours < 1 || hours > SUMMARY_CONSTANTS.MAX_HOURS) {
    throw new ValidationError(invalidHoursMessage(SUMMARY_CONSTANTS.MAX_HOURS));
  }
  return hours;
}

export function formatTranscript(messages: StoredMessage[]): string {
  return messages
    .map((m) => `[${format(m.createdAt, "yyyy-MM-dd HH:mm")}] ${m.authorName}: ${m.content}`)
    .join("\n");
}

export function createSummarizer(deps: SummarizerDeps): Collaborator {
  const generate = deps.generate;
  const model = deps.model ?? LLM_MODELS.SUMMARY;
  const now = deps.now ?? (() => new Date());
  const maxMessages = deps.maxMessages ?? SUMMARY_CONSTANTS.MAX_MESSAGES;
  const renderChart = deps.renderChart ?? svgToPng;

  return async (event) => {
    const hours = summaryHours(event);
    const since = subHours(now(), hours);
    const stored = await deps.storage.getChannelMessagesSince(event.channelId, since, maxMessages);
    const humanMessages = stored.filter((m) => !m.isBot && !m.isCommand);

    if (humanMessages.length === 0) {
      return { text: noMessagesFoundMessage(hours), visualizations: [] };
    }

    const channel = event.channelName ?? event.channelId;
    const charts = isChartCommand(event.commandName);
    const verb = charts ? "Analyze" : "Summarize";
    const response = await generate({
      model,
      messages: [
        { role: "system", content: charts ? SYSTEM_PROMPTS.CHART_ANALYSIS : SYSTEM_PROMPTS.SUMMARY },
        {
          role: "user",
          content: `${verb} these ${humanMessages.length} messages from #${channel} over the past ${hours} hours:\n\n${formatTranscript(humanMessages)}`,
        },
      ],
      temperature: MODEL_SETTINGS.SUMMARY_TEMPERATURE,
      maxTokens: MODEL_SETTINGS.SUMMARY_MAX_TOKENS,
    });

    const summary = response.text.trim();
    if (!summary) {
      throw new ExternalServiceError("OpenAI", "Empty summary");
    }

    const activeUsers = new Set(humanMessages.map((m) => m.authorId)).size;
    try {
      await deps.storage.storeChannelSummary({
        channelId: event.channelId,
        channelName: event.channelName ?? null,
        guildId: event.guildId ?? null,
        hours,
        summaryText: summary,
        messageCount: humanMessages.length,
        activeUsers,
      });
    } catch (err) {
      console.error(`[Summarizer] Failed to store summary for ${event.channelId}:`, err);
    }

    console.log(`[Summarizer] Summarized ${humanMessages.length} messages from ${activeUsers} users in #${channel}`);
    const stats = `(${humanMessages.length} messages, ${activeUsers} participants)`;
    if (!charts) {
      return {
        text: `**Summary of #${channel} for the past ${hours} hours** ${stats}\n\n${summary}`,
        visualizations: [],
      };
    }

    const extracted = await extractCharts(summary, renderChart);
    return {
      text: `**Chart analysis of #${channel} for the past ${hours} hours** ${stats}\n\n${extracted.text}`,
      visualizations: extracted.visualizations,
    };
  };
}
