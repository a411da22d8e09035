import { USER_MESSAGES } from "../config/messages";
import type { QueryExtractor } from "../coordinator/commandCoordinator";
import type { InboundEvent } from "../coordinator/types";
import { ValidationError } from "../utils/errorHandler";

/**
 * Remove the first mention of the bot (`<@id>` or `<@!id>`). Without a bot
 * id the first user mention of any kind is removed.
 */
export function stripBotMention(content: string, botUserId?: string): string {
  const pattern = botUserId ? new RegExp(`<@!?${botUserId}>`) : /<@!?\d+>/;
  return content.replace(pattern, "").trim();
}

export function extractQuery(event: InboundEvent, botUserId?: string): string {
  switch (event.commandName) {
    case "sum-day":
    case "chart-day":
      return `/${event.commandName}`;
    case "sum-hr":
    case "chart-hr":
      return `/${event.commandName} ${event.commandOptions?.hours ?? ""}`.trim();
    case "ask": {
      const query = String(event.commandOptions?.query ?? "").trim();
      if (!query) throw new ValidationError(USER_MESSAGES.noQuery);
      return query;
    }
  }

  const query = stripBotMention(event.content, botUserId);
  if (!query) {
    throw new ValidationError(USER_MESSAGES.noQuery);
  }
  return query;
}

/** The bot id is only known once the gateway session is ready. */
export function createQueryExtractor(getBotUserId: () => string | undefined): QueryExtractor {
  return (event) => extractQuery(event, getBotUserId());
}
