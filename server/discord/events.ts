/**
 * Discord Events Handler
 *
 * Gateway intake. Mentions, replies in the bot's own threads and slash
 * commands become InboundEvents and are handed to the coordinator without
 * waiting for their lifecycle.
 *
 * Key Flows:
 * 1. messageCreate: map the message to a trigger (or not), then store it
 *    flagged as a command when it triggered
 * 2. interactionCreate: defer ephemerally, dispatch, then point the
 *    deferred reply at the response (or show the failure notice)
 *
 * Layer: Discord (event handling)
 */

import { Events, type ChatInputCommandInteraction, type Client, type Message } from "discord.js";
import { USER_MESSAGES, isBotNotice, postedInMessage } from "../config/messages";
import type { CommandCoordinator, LifecycleResult } from "../coordinator/commandCoordinator";
import { destinationId, type InboundEvent } from "../coordinator/types";
import type { IStorage } from "../storage";
import { logDebug, logError, logInfo, logWarn } from "../utils/logger";
import { mapInteraction, mapMessage, toInsertMessage, type InteractionView, type MessageView } from "./eventMapper";
import type { SourceRegistry } from "./platformAdapter";

export interface DiscordEventDeps {
  client: Client;
  coordinator: CommandCoordinator;
  storage: IStorage;
  sources: SourceRegistry;
}

function channelNameOf(channel: Message["channel"] | ChatInputCommandInteraction["channel"]): string | null {
  if (channel && "name" in channel && typeof channel.name === "string") {
    return channel.name;
  }
  return null;
}

export function toMessageView(message: Message): MessageView {
  const channel = message.channel;
  const inThread = channel.isThread();
  return {
    id: message.id,
    content: message.content,
    author: {
      id: message.author.id,
      name: message.member?.displayName ?? message.author.globalName ?? message.author.username,
      bot: message.author.bot,
    },
    channelId: message.channelId,
    channelName: channelNameOf(channel),
    guildId: message.guildId,
    inThread,
    threadOwnerId: channel.isThread() ? channel.ownerId : null,
    attachmentCount: message.attachments.size,
    mentionedUserIds: Array.from(message.mentions.users.keys()),
    createdAt: message.createdAt,
  };
}

export function toInteractionView(interaction: ChatInputCommandInteraction): InteractionView {
  const options: Record<string, string | number> = {};
  const query = interaction.options.getString("query");
  if (query !== null) options.query = query;
  const hours = interaction.options.getInteger("hours");
  if (hours !== null) options.hours = hours;

  return {
    id: interaction.id,
    commandName: interaction.commandName,
    user: {
      id: interaction.user.id,
      name: interaction.user.globalName ?? interaction.user.username,
    },
    channelId: interaction.channelId,
    channelName: channelNameOf(interaction.channel),
    guildId: interaction.guildId,
    inThread: interaction.channel?.isThread() ?? false,
    options,
    createdAt: interaction.createdAt,
  };
}

/**
 * Human messages are stored, and so are the bot's own answers as thread
 * history. Other bots and the bot's own notices are not.
 */
export function shouldStore(view: MessageView, botUserId: string): boolean {
  if (!view.author.bot) {
    return true;
  }
  return view.author.id === botUserId && !isBotNotice(view.content);
}

function storeMessage(storage: IStorage, view: MessageView, event: InboundEvent | null): void {
  void storage
    .storeMessage(toInsertMessage(view, event))
    .catch((err) => {
      logWarn("[Discord] Failed to store message", {
        eventId: view.id,
        channelId: view.channelId,
        error: err instanceof Error ? err.message : String(err),
      });
    });
}

export function handleMessageCreate(deps: DiscordEventDeps, message: Message): void {
  if (message.system) {
    return;
  }
  const botUserId = deps.client.user?.id;
  if (!botUserId) {
    return;
  }

  const view = toMessageView(message);
  const event = mapMessage(view, botUserId);
  if (shouldStore(view, botUserId)) {
    storeMessage(deps.storage, view, event);
  }
  if (!event) {
    return;
  }

  logDebug(`[Discord] ${event.kind} received`, { eventId: event.eventId, channelId: event.channelId });
  deps.sources.register(event.eventId, message);
  deps.coordinator.dispatch(event);
}

async function settleInteraction(interaction: ChatInputCommandInteraction, result: LifecycleResult): Promise<void> {
  if (result.state === "DEDUP_REJECTED") {
    return;
  }
  if (result.state === "FAILED") {
    logDebug("[Discord] Interaction lifecycle failed", { eventId: result.eventId, correlationId: result.correlationId });
  }
  const content = result.state === "DELIVERED" && result.destination
    ? postedInMessage(destinationId(result.destination))
    : result.error?.userMessage ?? USER_MESSAGES.processingError;

  try {
    await interaction.editReply({ content });
  } catch (err) {
    logWarn("[Discord] Failed to update deferred reply", {
      eventId: interaction.id,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

export async function handleChatInputCommand(deps: DiscordEventDeps, interaction: ChatInputCommandInteraction): Promise<void> {
  const event = mapInteraction(toInteractionView(interaction));
  if (!event) {
    logWarn(`[Discord] Unknown command /${interaction.commandName}`);
    return;
  }

  try {
    await interaction.deferReply({ ephemeral: true });
  } catch (err) {
    // Already acknowledged: a redelivered interaction
    logWarn("[Discord] Could not defer interaction", {
      eventId: event.eventId,
      error: err instanceof Error ? err.message : String(err),
    });
  }

  deps.sources.register(event.eventId, interaction);
  deps.coordinator.dispatch(event, (result) => settleInteraction(interaction, result));
}

export function registerDiscordEvents(deps: DiscordEventDeps): void {
  deps.client.once(Events.ClientReady, (ready) => {
    logInfo(`[Discord] Logged in as ${ready.user.tag}`, { guilds: ready.guilds.cache.size });
  });

  deps.client.on(Events.MessageCreate, (message) => {
    try {
      handleMessageCreate(deps, message);
    } catch (err) {
      logError("[Discord] messageCreate handler failed", {
        eventId: message.id,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  });

  deps.client.on(Events.MessageDelete, (message) => {
    deps.storage.deleteMessage(message.id).catch((err) => {
      logWarn("[Discord] Failed to drop deleted message", {
        eventId: message.id,
        error: err instanceof Error ? err.message : String(err),
      });
    });
  });

  deps.client.on(Events.InteractionCreate, (interaction) => {
    if (!interaction.isChatInputCommand()) {
      return;
    }
    handleChatInputCommand(deps, interaction).catch((err) => {
      logError("[Discord] interactionCreate handler failed", {
        eventId: interaction.id,
        error: err instanceof Error ? err.message : String(err),
      });
    });
  });

  deps.client.on(Events.Error, (err) => {
    logError("[Discord] Client error", { error: err.message });
  });
}
