/**
 * Event Mapper
 *
 * Turns the parts of a discord.js message or interaction the bot cares about
 * into an InboundEvent. Works on plain views so it can be exercised without
 * a gateway connection.
 */

import type { InsertMessage } from "@shared/schema";
import type { InboundEvent, SlashCommandName, SummaryCommandName } from "../coordinator/types";

export interface MessageView {
  id: string;
  content: string;
  author: {
    id: string;
    name: string;
    bot: boolean;
  };
  channelId: string;
  channelName?: string | null;
  guildId?: string | null;
  inThread: boolean;
  /** Owner of the thread the message was posted in, if any. */
  threadOwnerId?: string | null;
  attachmentCount: number;
  mentionedUserIds: string[];
  createdAt: Date;
}

export interface InteractionView {
  id: string;
  commandName: string;
  user: {
    id: string;
    name: string;
  };
  channelId: string;
  channelName?: string | null;
  guildId?: string | null;
  inThread: boolean;
  options: Record<string, string | number>;
  createdAt: Date;
}

const SLASH_COMMANDS: readonly SlashCommandName[] = ["ask", "sum-day", "sum-hr", "chart-day", "chart-hr"];

const TYPED_COMMAND_PATTERN = /^\/(sum-day|sum-hr|chart-day|chart-hr)(?=\s|$)(?:\s+(\S+))?/;

export function isSlashCommandName(name: string): name is SlashCommandName {
  return SLASH_COMMANDS.some((command) => command === name);
}

function isSummaryCommandName(name: string): name is SummaryCommandName {
  return name !== "ask" && isSlashCommandName(name);
}

export interface TypedCommand {
  name: SummaryCommandName;
  /** First argument as typed, validated by the summarizer. */
  hours?: string;
}

/**
 * A summary command typed as plain text, such as `/sum-hr 6`. Only the
 * start of the message counts.
 */
export function parseTypedCommand(content: string): TypedCommand | null {
  const match = TYPED_COMMAND_PATTERN.exec(content.trim());
  const name = match?.[1];
  if (!match || name === undefined || !isSummaryCommandName(name)) {
    return null;
  }
  if (name === "sum-day" || name === "chart-day" || match[2] === undefined) {
    return { name };
  }
  return { name, hours: match[2] };
}

/**
 * @returns the event, or null when the message is not addressed to the bot
 */
export function mapMessage(view: MessageView, botUserId: string): InboundEvent | null {
  if (view.author.bot || view.author.id === botUserId) {
    return null;
  }

  const mentioned = view.mentionedUserIds.includes(botUserId);
  const typed = mentioned ? null : parseTypedCommand(view.content);
  const inBotThread = view.inThread && view.threadOwnerId === botUserId;
  if (!mentioned && !typed && !inBotThread) {
    return null;
  }

  const base = {
    eventId: view.id,
    authorId: view.author.id,
    authorName: view.author.name,
    channelId: view.channelId,
    channelName: view.channelName ?? undefined,
    guildId: view.guildId ?? undefined,
    threadId: view.inThread ? view.channelId : undefined,
    isAlreadyInThread: view.inThread,
    hasAttachments: view.attachmentCount > 0,
    content: view.content,
    receivedAt: view.createdAt,
  };

  if (typed) {
    return {
      ...base,
      kind: "typed-command",
      commandName: typed.name,
      commandOptions: typed.hours === undefined ? {} : { hours: typed.hours },
    };
  }
  return { ...base, kind: mentioned ? "mention" : "thread-reply" };
}

export function mapInteraction(view: InteractionView): InboundEvent | null {
  if (!isSlashCommandName(view.commandName)) {
    return null;
  }

  return {
    eventId: view.id,
    authorId: view.user.id,
    authorName: view.user.name,
    channelId: view.channelId,
    channelName: view.channelName ?? undefined,
    guildId: view.guildId ?? undefined,
    threadId: view.inThread ? view.channelId : undefined,
    isAlreadyInThread: view.inThread,
    hasAttachments: false,
    kind: "slash-command",
    content: `/${view.commandName}`,
    commandName: view.commandName,
    commandOptions: { ...view.options },
    receivedAt: view.createdAt,
  };
}

/**
 * The stored row for a message. Messages that triggered the bot are flagged
 * so summaries leave them out.
 */
export function toInsertMessage(view: MessageView, event: InboundEvent | null): InsertMessage {
  return {
    id: view.id,
    authorId: view.author.id,
    authorName: view.author.name,
    channelId: view.channelId,
    channelName: view.channelName ?? null,
    guildId: view.guildId ?? null,
    content: view.content,
    isBot: view.author.bot,
    isCommand: event !== null,
    commandType: event ? event.commandName ?? event.kind : null,
    createdAt: view.createdAt,
  };
}
