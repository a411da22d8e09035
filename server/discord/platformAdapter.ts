/**
 * Discord Platform Adapter
 *
 * The coordinator's PlatformAdapter on top of discord.js. Every failure
 * leaves here as a PlatformError whose kind drives thread resolution and
 * delivery retries.
 */

import {
  AttachmentBuilder,
  ChannelType,
  ChatInputCommandInteraction,
  Message,
  MessageFlags,
  ThreadAutoArchiveDuration,
  type Client,
} from "discord.js";
import { DISCORD_ERROR_CODES, THREAD_CONSTANTS, TRANSIENT_NETWORK_CODES } from "../config/constants";
import { BoundedMap } from "../coordinator/boundedCache";
import {
  destinationId,
  type Destination,
  type InboundEvent,
  type MessageHandle,
  type OutboundAttachment,
  type PlatformAdapter,
  type Thread,
} from "../coordinator/types";
import { PlatformError, type PlatformErrorKind } from "../utils/errorHandler";

export type EventSource = Message | ChatInputCommandInteraction;

/**
 * Originating discord.js objects by event id, so thread creation can start
 * from the message itself. Bounded like the coordinator caches.
 */
export class SourceRegistry {
  private sources: BoundedMap<EventSource>;

  constructor(maxSize: number = THREAD_CONSTANTS.SOURCE_REGISTRY_SIZE) {
    this.sources = new BoundedMap<EventSource>(maxSize);
  }

  register(eventId: string, source: EventSource): void {
    this.sources.setIfAbsent(eventId, source);
  }

  get(eventId: string): EventSource | undefined {
    return this.sources.get(eventId);
  }

  get size(): number {
    return this.sources.size;
  }
}

const TRANSIENT_MESSAGE_PATTERN = /\b(ssl|tls|handshake|socket hang up|network|timed? ?out)\b/i;
const TRANSIENT_CODES: ReadonlySet<string> = new Set(TRANSIENT_NETWORK_CODES);

function readProperty(err: object, key: "code" | "status"): string | number | undefined {
  if (!(key in err)) return undefined;
  const value: unknown = Reflect.get(err, key);
  return typeof value === "string" || typeof value === "number" ? value : undefined;
}

function classifyKind(code: string | number | undefined, status: number | undefined, message: string): PlatformErrorKind {
  switch (code) {
    case DISCORD_ERROR_CODES.THREAD_ALREADY_CREATED:
      return "already-exists";
    case DISCORD_ERROR_CODES.MISSING_ACCESS:
    case DISCORD_ERROR_CODES.MISSING_PERMISSIONS:
      return "forbidden";
    case DISCORD_ERROR_CODES.REQUEST_ENTITY_TOO_LARGE:
      return "too-large";
    case DISCORD_ERROR_CODES.UNKNOWN_CHANNEL:
    case DISCORD_ERROR_CODES.UNKNOWN_MESSAGE:
      return "not-found";
  }

  if (/thread has already been created/i.test(message)) return "already-exists";
  if (status === 413) return "too-large";
  if (status === 403) return "forbidden";
  if (status === 404) return "not-found";
  if (status !== undefined && status >= 500) return "transient";
  if (typeof code === "string" && TRANSIENT_CODES.has(code)) return "transient";
  if (TRANSIENT_MESSAGE_PATTERN.test(message)) return "transient";
  return "other";
}

/**
 * Map a discord.js, HTTP or network error onto a PlatformError.
 */
export function classifyPlatformError(err: unknown): PlatformError {
  if (err instanceof PlatformError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  if (typeof err !== "object" || err === null) {
    return new PlatformError(classifyKind(undefined, undefined, message), message);
  }

  let code = readProperty(err, "code");
  const rawStatus = readProperty(err, "status");
  const status = typeof rawStatus === "number" ? rawStatus : undefined;

  // undici wraps socket failures: the useful code sits on the cause
  if (code === undefined && err instanceof Error && typeof err.cause === "object" && err.cause !== null) {
    code = readProperty(err.cause, "code");
  }

  return new PlatformError(classifyKind(code, status, message), message, code ?? status);
}

async function attempt<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (err) {
    throw classifyPlatformError(err);
  }
}

export class DiscordPlatformAdapter implements PlatformAdapter {
  private client: Client;
  private sources: SourceRegistry;

  constructor(client: Client, sources: SourceRegistry) {
    this.client = client;
    this.sources = sources;
  }

  async sendMessage(destination: Destination, content: string, attachments?: OutboundAttachment[]): Promise<MessageHandle> {
    return attempt(async () => {
      const channel = await this.client.channels.fetch(destinationId(destination));
      if (!channel || !channel.isSendable()) {
        throw new PlatformError("forbidden", `Cannot send to channel ${destinationId(destination)}`);
      }

      const files = attachments?.map((a) => new AttachmentBuilder(a.data, { name: a.filename, description: a.description }));
      const sent = await channel.send({
        content,
        files,
        allowedMentions: { parse: ["users"] },
        flags: MessageFlags.SuppressEmbeds,
      });
      return { id: sent.id, channelId: sent.channelId };
    });
  }

  async createThread(event: InboundEvent, name: string): Promise<Thread> {
    return attempt(async () => {
      if (!event.guildId) {
        throw new PlatformError("forbidden", "Threads are not available in direct messages");
      }

      if (event.kind === "slash-command") {
        const channel = await this.client.channels.fetch(event.channelId);
        if (!channel || channel.type !== ChannelType.GuildText) {
          throw new PlatformError("forbidden", `Channel ${event.channelId} does not support threads`);
        }
        const thread = await channel.threads.create({
          name,
          type: ChannelType.PublicThread,
          autoArchiveDuration: ThreadAutoArchiveDuration.OneDay,
        });
        return { id: thread.id, name: thread.name };
      }

      const message = await this.originMessage(event);
      const thread = await message.startThread({ name, autoArchiveDuration: ThreadAutoArchiveDuration.OneDay });
      return { id: thread.id, name: thread.name };
    });
  }

  /**
   * A thread started from a message shares that message's id.
   */
  async fetchExistingThread(event: InboundEvent): Promise<Thread | null> {
    if (event.kind === "slash-command") {
      return null;
    }
    try {
      const channel = await this.client.channels.fetch(event.eventId);
      if (channel && channel.isThread()) {
        return { id: channel.id, name: channel.name };
      }
      return null;
    } catch (err) {
      const classified = classifyPlatformError(err);
      if (classified.kind === "not-found") {
        return null;
      }
      throw classified;
    }
  }

  async deleteMessage(handle: MessageHandle): Promise<void> {
    try {
      const channel = await this.client.channels.fetch(handle.channelId);
      if (channel && channel.isTextBased()) {
        await channel.messages.delete(handle.id);
      }
    } catch (err) {
      const classified = classifyPlatformError(err);
      if (classified.kind !== "not-found") {
        throw classified;
      }
    }
  }

  private async originMessage(event: InboundEvent): Promise<Message> {
    const source = this.sources.get(event.eventId);
    if (source instanceof Message) {
      return source;
    }
    const channel = await this.client.channels.fetch(event.channelId);
    if (!channel || !channel.isTextBased()) {
      throw new PlatformError("not-found", `Channel ${event.channelId} not found`);
    }
    return channel.messages.fetch(event.eventId);
  }
}
