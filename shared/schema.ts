import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, boolean, integer, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Every message the bot can see: human messages feed summaries, its own replies round out thread history.
export const messages = pgTable("messages", {
  id: varchar("id").primaryKey(), // Discord message id
  authorId: varchar("author_id").notNull(),
  authorName: text("author_name").notNull(),
  channelId: varchar("channel_id").notNull(),
  channelName: text("channel_name"),
  guildId: varchar("guild_id"),
  content: text("content").notNull(),
  isBot: boolean("is_bot").default(false).notNull(),
  isCommand: boolean("is_command").default(false).notNull(),
  commandType: text("command_type"),
  createdAt: timestamp("created_at").notNull(),
}, (table) => [
  index("messages_channel_created_idx").on(table.channelId, table.createdAt),
  index("messages_author_idx").on(table.authorId),
]);

// One row per accepted trigger, written after the lifecycle ends.
export const botExchanges = pgTable("bot_exchanges", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  eventId: varchar("event_id").notNull(),
  kind: text("kind").notNull(), // "mention" | "slash-command" | "typed-command" | "thread-reply"
  commandName: text("command_name"),
  authorId: varchar("author_id").notNull(),
  channelId: varchar("channel_id").notNull(),
  destinationId: varchar("destination_id").notNull(),
  query: text("query").notNull(),
  response: text("response").notNull(),
  status: text("status").notNull(), // "delivered" | "failed"
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => [index("bot_exchanges_event_idx").on(table.eventId)]);

export const channelSummaries = pgTable("channel_summaries", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  channelId: varchar("channel_id").notNull(),
  channelName: text("channel_name"),
  guildId: varchar("guild_id"),
  hours: integer("hours").notNull(),
  summaryText: text("summary_text").notNull(),
  messageCount: integer("message_count").notNull(),
  activeUsers: integer("active_users").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const insertMessageSchema = createInsertSchema(messages);

export const insertBotExchangeSchema = createInsertSchema(botExchanges).omit({
  id: true,
  createdAt: true,
}).extend({
  status: z.enum(["delivered", "failed"]),
});

export const insertChannelSummarySchema = createInsertSchema(channelSummaries).omit({
  id: true,
  createdAt: true,
}).extend({
  hours: z.number().int().min(1),
});

export type StoredMessage = typeof messages.$inferSelect;
export type InsertMessage = z.infer<typeof insertMessageSchema>;
export type BotExchange = typeof botExchanges.$inferSelect;
export type InsertBotExchange = z.infer<typeof insertBotExchangeSchema>;
export type ChannelSummary = typeof channelSummaries.$inferSelect;
export type InsertChannelSummary = z.infer<typeof insertChannelSummarySchema>;
