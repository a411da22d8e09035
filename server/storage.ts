import {
  type StoredMessage,
  type InsertMessage,
  type BotExchange,
  type ChannelSummary,
  type InsertChannelSummary,
  insertBotExchangeSchema,
  insertChannelSummarySchema,
  insertMessageSchema,
  messages as messagesTable,
  botExchanges as botExchangesTable,
  channelSummaries as channelSummariesTable,
} from "@shared/schema";
import { randomUUID } from "crypto";
import { and, asc, desc, eq, gte } from "drizzle-orm";
import { STORAGE_CONSTANTS } from "./config/constants";
import { BoundedMap } from "./coordinator/boundedCache";
import type { ExchangeRecord, ExchangeRecorder } from "./coordinator/types";
import { destinationId } from "./coordinator/types";
import { createDb, type Database } from "./db";

export interface IStorage extends ExchangeRecorder {
  // Messages
  storeMessage(message: InsertMessage): Promise<void>;
  deleteMessage(id: string): Promise<void>;
  getChannelMessagesSince(channelId: string, since: Date, limit: number): Promise<StoredMessage[]>;
  getThreadHistory(threadId: string, limit: number): Promise<StoredMessage[]>;

  // Exchanges
  recordExchange(record: ExchangeRecord): Promise<void>;
  getExchangesByEvent(eventId: string): Promise<BotExchange[]>;

  // Summaries
  storeChannelSummary(summary: InsertChannelSummary): Promise<ChannelSummary>;
}

function toExchangeRow(record: ExchangeRecord) {
  return insertBotExchangeSchema.parse({
    eventId: record.event.eventId,
    kind: record.event.kind,
    commandName: record.event.commandName ?? null,
    authorId: record.event.authorId,
    channelId: record.event.channelId,
    destinationId: destinationId(record.destination),
    query: record.query,
    response: record.response,
    status: record.status,
  });
}

export class MemStorage implements IStorage {
  private messages: BoundedMap<StoredMessage>;
  private exchanges: BotExchange[];
  private summaries: ChannelSummary[];

  /** Past `maxMessages` the oldest half of the stored messages is dropped. */
  constructor(maxMessages: number = STORAGE_CONSTANTS.MEMORY_MESSAGE_LIMIT) {
    this.messages = new BoundedMap(maxMessages);
    this.exchanges = [];
    this.summaries = [];
  }

  // Messages
  async storeMessage(message: InsertMessage): Promise<void> {
    const parsed = insertMessageSchema.parse(message);
    this.messages.setIfAbsent(parsed.id, {
      ...parsed,
      channelName: parsed.channelName ?? null,
      guildId: parsed.guildId ?? null,
      isBot: parsed.isBot ?? false,
      isCommand: parsed.isCommand ?? false,
      commandType: parsed.commandType ?? null,
    });
  }

  async deleteMessage(id: string): Promise<void> {
    this.messages.delete(id);
  }

  async getChannelMessagesSince(channelId: string, since: Date, limit: number): Promise<StoredMessage[]> {
    return this.messages.values()
      .filter((m) => m.channelId === channelId && m.createdAt.getTime() >= since.getTime())
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, limit);
  }

  async getThreadHistory(threadId: string, limit: number): Promise<StoredMessage[]> {
    const inThread = this.messages.values()
      .filter((m) => m.channelId === threadId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    return inThread.slice(Math.max(0, inThread.length - limit));
  }

  // Exchanges
  async recordExchange(record: ExchangeRecord): Promise<void> {
    const row = toExchangeRow(record);
    this.exchanges.push({
      ...row,
      commandName: row.commandName ?? null,
      id: randomUUID(),
      createdAt: new Date(),
    });
  }

  async getExchangesByEvent(eventId: string): Promise<BotExchange[]> {
    return this.exchanges.filter((e) => e.eventId === eventId);
  }

  // Summaries
  async storeChannelSummary(summary: InsertChannelSummary): Promise<ChannelSummary> {
    const parsed = insertChannelSummarySchema.parse(summary);
    const stored: ChannelSummary = {
      ...parsed,
      channelName: parsed.channelName ?? null,
      guildId: parsed.guildId ?? null,
      id: randomUUID(),
      createdAt: new Date(),
    };
    this.summaries.push(stored);
    return stored;
  }
}

export class DbStorage implements IStorage {
  private db: Database;

  constructor(databaseUrl: string) {
    this.db = createDb(databaseUrl);
  }

  // Messages
  async storeMessage(message: InsertMessage): Promise<void> {
    const parsed = insertMessageSchema.parse(message);
    await this.db.insert(messagesTable).values(parsed).onConflictDoNothing();
  }

  async deleteMessage(id: string): Promise<void> {
    await this.db.delete(messagesTable).where(eq(messagesTable.id, id));
  }

  async getChannelMessagesSince(channelId: string, since: Date, limit: number): Promise<StoredMessage[]> {
    return this.db
      .select()
      .from(messagesTable)
      .where(and(eq(messagesTable.channelId, channelId), gte(messagesTable.createdAt, since)))
      .orderBy(asc(messagesTable.createdAt))
      .limit(limit);
  }

  async getThreadHistory(threadId: string, limit: number): Promise<StoredMessage[]> {
    const latest = await this.db
      .select()
      .from(messagesTable)
      .where(eq(messagesTable.channelId, threadId))
      .orderBy(desc(messagesTable.createdAt))
      .limit(limit);
    return latest.reverse();
  }

  // Exchanges
  async recordExchange(record: ExchangeRecord): Promise<void> {
    await this.db.insert(botExchangesTable).values(toExchangeRow(record));
  }

  async getExchangesByEvent(eventId: string): Promise<BotExchange[]> {
    return this.db
      .select()
      .from(botExchangesTable)
      .where(eq(botExchangesTable.eventId, eventId))
      .orderBy(asc(botExchangesTable.createdAt));
  }

  // Summaries
  async storeChannelSummary(summary: InsertChannelSummary): Promise<ChannelSummary> {
    const parsed = insertChannelSummarySchema.parse(summary);
    const results = await this.db.insert(channelSummariesTable).values(parsed).returning();
    return results[0];
  }
}

export function createStorage(databaseUrl?: string): IStorage {
  if (databaseUrl) {
    console.log("[Storage] Using Postgres storage");
    return new DbStorage(databaseUrl);
  }
  console.log("[Storage] DATABASE_URL not set, using in-memory storage");
  return new MemStorage();
}
