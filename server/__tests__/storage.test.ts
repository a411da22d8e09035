import { describe, it, expect, beforeEach } from "vitest";
import type { InsertMessage } from "@shared/schema";
import { MemStorage } from "../storage";
import { makeEvent } from "./helpers/fakePlatform";

function message(id: string, overrides: Partial<InsertMessage> = {}): InsertMessage {
  return {
    id,
    authorId: "user-1",
    authorName: "Ada",
    channelId: "chan-1",
    channelName: "general",
    guildId: "guild-1",
    content: `message ${id}`,
    isBot: false,
    isCommand: false,
    commandType: null,
    createdAt: new Date("2024-05-06T10:00:00Z"),
    ...overrides,
  };
}

describe("MemStorage", () => {
  let storage: MemStorage;

  beforeEach(() => {
    storage = new MemStorage();
  });

  describe("messages", () => {
    it("keeps the first copy of a message id", async () => {
      await storage.storeMessage(message("m1", { content: "original" }));
      await storage.storeMessage(message("m1", { content: "redelivered" }));

      const stored = await storage.getChannelMessagesSince("chan-1", new Date(0), 10);
      expect(stored.map((m) => m.content)).toEqual(["original"]);
    });

    it("returns channel messages since a time, oldest first", async () => {
      await storage.storeMessage(message("late", { createdAt: new Date("2024-05-06T12:00:00Z") }));
      await storage.storeMessage(message("early", { createdAt: new Date("2024-05-06T09:00:00Z") }));
      await storage.storeMessage(message("mid", { createdAt: new Date("2024-05-06T11:00:00Z") }));
      await storage.storeMessage(message("other", { channelId: "chan-2" }));

      const stored = await storage.getChannelMessagesSince("chan-1", new Date("2024-05-06T10:30:00Z"), 10);
      expect(stored.map((m) => m.id)).toEqual(["mid", "late"]);
    });

    it("caps channel messages at the limit", async () => {
      for (let i = 0; i < 5; i++) {
        await storage.storeMessage(message(`m${i}`, { createdAt: new Date(Date.UTC(2024, 4, 6, 10, i)) }));
      }
      const stored = await storage.getChannelMessagesSince("chan-1", new Date(0), 2);
      expect(stored.map((m) => m.id)).toEqual(["m0", "m1"]);
    });

    it("returns the latest thread messages in order", async () => {
      for (let i = 0; i < 4; i++) {
        await storage.storeMessage(message(`t${i}`, { channelId: "thread-1", createdAt: new Date(Date.UTC(2024, 4, 6, 10, i)) }));
      }
      const history = await storage.getThreadHistory("thread-1", 3);
      expect(history.map((m) => m.id)).toEqual(["t1", "t2", "t3"]);
    });

    it("drops a deleted message from thread history", async () => {
      await storage.storeMessage(message("t1", { channelId: "thread-1" }));
      await storage.storeMessage(message("t2", { channelId: "thread-1", createdAt: new Date("2024-05-06T10:01:00Z") }));

      await storage.deleteMessage("t1");
      await storage.deleteMessage("never-stored");

      const history = await storage.getThreadHistory("thread-1", 10);
      expect(history.map((m) => m.id)).toEqual(["t2"]);
    });

    it("evicts the oldest half once past its message limit", async () => {
      const bounded = new MemStorage(4);
      for (let i = 0; i < 5; i++) {
        await bounded.storeMessage(message(`m${i}`, { createdAt: new Date(Date.UTC(2024, 4, 6, 10, i)) }));
      }

      const stored = await bounded.getChannelMessagesSince("chan-1", new Date(0), 10);
      expect(stored.map((m) => m.id)).toEqual(["m2", "m3", "m4"]);
    });

    it("fills defaults for optional columns", async () => {
      await storage.storeMessage({
        id: "bare",
        authorId: "user-1",
        authorName: "Ada",
        channelId: "chan-1",
        content: "hi",
        createdAt: new Date("2024-05-06T10:00:00Z"),
      });
      const [stored] = await storage.getChannelMessagesSince("chan-1", new Date(0), 1);
      expect(stored).toMatchObject({ channelName: null, guildId: null, isBot: false, isCommand: false, commandType: null });
    });
  });

  describe("exchanges", () => {
    it("records one row per exchange with the destination id", async () => {
      const event = makeEvent();
      await storage.recordExchange({
        event,
        query: "what is up?",
        response: "not much",
        status: "delivered",
        destination: { kind: "thread", threadId: "thread-9" },
      });

      const rows = await storage.getExchangesByEvent(event.eventId);
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        eventId: event.eventId,
        kind: "mention",
        commandName: null,
        authorId: "user-1",
        channelId: "chan-1",
        destinationId: "thread-9",
        query: "what is up?",
        response: "not much",
        status: "delivered",
      });
      expect(typeof rows[0].id).toBe("string");
    });

    it("returns nothing for unknown events", async () => {
      expect(await storage.getExchangesByEvent("missing")).toEqual([]);
    });
  });

  describe("summaries", () => {
    it("stores a summary with generated id", async () => {
      const stored = await storage.storeChannelSummary({
        channelId: "chan-1",
        channelName: "general",
        guildId: "guild-1",
        hours: 24,
        summaryText: "quiet day",
        messageCount: 3,
        activeUsers: 2,
      });
      expect(stored.hours).toBe(24);
      expect(stored.summaryText).toBe("quiet day");
      expect(stored.createdAt).toBeInstanceOf(Date);
    });

    it("rejects a window under one hour", async () => {
      await expect(storage.storeChannelSummary({
        channelId: "chan-1",
        hours: 0,
        summaryText: "x",
        messageCount: 1,
        activeUsers: 1,
      })).rejects.toThrow();
    });
  });
});
