import { describe, it, expect } from "vitest";
import { buildCommands } from "../discord/commands";
import {
  isSlashCommandName,
  mapInteraction,
  mapMessage,
  parseTypedCommand,
  toInsertMessage,
  type InteractionView,
  type MessageView,
} from "../discord/eventMapper";
import { shouldStore } from "../discord/events";
import { USER_MESSAGES } from "../config/messages";

const BOT = "bot-1";

function messageView(overrides: Partial<MessageView> = {}): MessageView {
  return {
    id: "m-1",
    content: `<@${BOT}> hello`,
    author: { id: "user-1", name: "Ada", bot: false },
    channelId: "chan-1",
    channelName: "general",
    guildId: "guild-1",
    inThread: false,
    threadOwnerId: null,
    attachmentCount: 0,
    mentionedUserIds: [BOT],
    createdAt: new Date("2024-05-06T10:00:00Z"),
    ...overrides,
  };
}

function interactionView(overrides: Partial<InteractionView> = {}): InteractionView {
  return {
    id: "i-1",
    commandName: "ask",
    user: { id: "user-1", name: "Ada" },
    channelId: "chan-1",
    channelName: "general",
    guildId: "guild-1",
    inThread: false,
    options: { query: "hello" },
    createdAt: new Date("2024-05-06T10:00:00Z"),
    ...overrides,
  };
}

describe("mapMessage", () => {
  it("maps a channel mention", () => {
    expect(mapMessage(messageView(), BOT)).toEqual({
      eventId: "m-1",
      authorId: "user-1",
      authorName: "Ada",
      channelId: "chan-1",
      channelName: "general",
      guildId: "guild-1",
      threadId: undefined,
      isAlreadyInThread: false,
      hasAttachments: false,
      kind: "mention",
      content: `<@${BOT}> hello`,
      receivedAt: new Date("2024-05-06T10:00:00Z"),
    });
  });

  it("flags attachments", () => {
    expect(mapMessage(messageView({ attachmentCount: 2 }), BOT)?.hasAttachments).toBe(true);
  });

  it("maps a mention inside any thread to that thread", () => {
    const event = mapMessage(messageView({ channelId: "thread-7", inThread: true, threadOwnerId: "user-9" }), BOT);
    expect(event?.kind).toBe("mention");
    expect(event?.threadId).toBe("thread-7");
    expect(event?.isAlreadyInThread).toBe(true);
  });

  it("maps an unaddressed reply in a bot-owned thread", () => {
    const event = mapMessage(
      messageView({ content: "and then?", mentionedUserIds: [], channelId: "thread-7", inThread: true, threadOwnerId: BOT }),
      BOT,
    );
    expect(event?.kind).toBe("thread-reply");
    expect(event?.threadId).toBe("thread-7");
  });

  it("ignores unaddressed messages elsewhere", () => {
    expect(mapMessage(messageView({ mentionedUserIds: [] }), BOT)).toBeNull();
    expect(mapMessage(messageView({ mentionedUserIds: [], inThread: true, threadOwnerId: "user-9" }), BOT)).toBeNull();
  });

  it("ignores bots, including itself", () => {
    expect(mapMessage(messageView({ author: { id: "other-bot", name: "Other", bot: true } }), BOT)).toBeNull();
    expect(mapMessage(messageView({ author: { id: BOT, name: "Bot", bot: false } }), BOT)).toBeNull();
  });

  it("maps a summary command typed as a plain message", () => {
    expect(mapMessage(messageView({ content: "/sum-hr 6", mentionedUserIds: [] }), BOT)).toEqual({
      eventId: "m-1",
      authorId: "user-1",
      authorName: "Ada",
      channelId: "chan-1",
      channelName: "general",
      guildId: "guild-1",
      threadId: undefined,
      isAlreadyInThread: false,
      hasAttachments: false,
      kind: "typed-command",
      content: "/sum-hr 6",
      commandName: "sum-hr",
      commandOptions: { hours: "6" },
      receivedAt: new Date("2024-05-06T10:00:00Z"),
    });
  });

  it("treats a mention that starts with a command as a question", () => {
    const event = mapMessage(messageView({ content: `<@${BOT}> /sum-day` }), BOT);
    expect(event?.kind).toBe("mention");
    expect(event?.commandName).toBeUndefined();
  });

  it("leaves missing channel names unset", () => {
    const event = mapMessage(messageView({ channelName: null, guildId: null }), BOT);
    expect(event?.channelName).toBeUndefined();
    expect(event?.guildId).toBeUndefined();
  });
});

describe("mapInteraction", () => {
  it("maps a known slash command", () => {
    expect(mapInteraction(interactionView())).toEqual({
      eventId: "i-1",
      authorId: "user-1",
      authorName: "Ada",
      channelId: "chan-1",
      channelName: "general",
      guildId: "guild-1",
      threadId: undefined,
      isAlreadyInThread: false,
      hasAttachments: false,
      kind: "slash-command",
      content: "/ask",
      commandName: "ask",
      commandOptions: { query: "hello" },
      receivedAt: new Date("2024-05-06T10:00:00Z"),
    });
  });

  it("copies the options", () => {
    const options = { hours: 6 };
    const event = mapInteraction(interactionView({ commandName: "sum-hr", options }));
    options.hours = 12;
    expect(event?.commandOptions).toEqual({ hours: 6 });
  });

  it("keeps a command run inside a thread in that thread", () => {
    const event = mapInteraction(interactionView({ commandName: "sum-day", options: {}, channelId: "thread-3", inThread: true }));
    expect(event?.threadId).toBe("thread-3");
    expect(event?.isAlreadyInThread).toBe(true);
  });

  it("ignores unknown commands", () => {
    expect(mapInteraction(interactionView({ commandName: "ping" }))).toBeNull();
  });
});

describe("parseTypedCommand", () => {
  it("reads the command and its first argument", () => {
    expect(parseTypedCommand("/sum-day")).toEqual({ name: "sum-day" });
    expect(parseTypedCommand("  /chart-hr 12 please")).toEqual({ name: "chart-hr", hours: "12" });
    expect(parseTypedCommand("/chart-day\nthanks")).toEqual({ name: "chart-day" });
  });

  it("ignores other text", () => {
    expect(parseTypedCommand("/sum-hrs 6")).toBeNull();
    expect(parseTypedCommand("please /sum-day")).toBeNull();
    expect(parseTypedCommand("/ask what")).toBeNull();
  });
});

describe("toInsertMessage", () => {
  it("flags a message that triggered the bot", () => {
    const view = messageView();
    const row = toInsertMessage(view, mapMessage(view, BOT));
    expect(row).toEqual({
      id: "m-1",
      authorId: "user-1",
      authorName: "Ada",
      channelId: "chan-1",
      channelName: "general",
      guildId: "guild-1",
      content: `<@${BOT}> hello`,
      isBot: false,
      isCommand: true,
      commandType: "mention",
      createdAt: new Date("2024-05-06T10:00:00Z"),
    });
  });

  it("records the typed command name", () => {
    const view = messageView({ content: "/chart-day", mentionedUserIds: [] });
    expect(toInsertMessage(view, mapMessage(view, BOT))).toMatchObject({ isCommand: true, commandType: "chart-day" });
  });

  it("leaves ordinary chatter unflagged", () => {
    const view = messageView({ content: "lunch?", mentionedUserIds: [], channelName: null });
    expect(toInsertMessage(view, mapMessage(view, BOT))).toMatchObject({
      isCommand: false,
      commandType: null,
      channelName: null,
    });
  });
});

describe("shouldStore", () => {
  const own = { id: BOT, name: "Bot", bot: true };

  it("stores people and the bot's own answers", () => {
    expect(shouldStore(messageView(), BOT)).toBe(true);
    expect(shouldStore(messageView({ author: own, content: "Here is the answer." }), BOT)).toBe(true);
  });

  it("skips other bots and the bot's notices", () => {
    expect(shouldStore(messageView({ author: { id: "other-bot", name: "Other", bot: true } }), BOT)).toBe(false);
    expect(shouldStore(messageView({ author: own, content: USER_MESSAGES.processing }), BOT)).toBe(false);
    expect(shouldStore(messageView({ author: own, content: USER_MESSAGES.processingError }), BOT)).toBe(false);
  });
});

describe("isSlashCommandName", () => {
  it("accepts exactly the registered commands", () => {
    expect(["ask", "sum-day", "sum-hr", "chart-day", "chart-hr", "summary"].map((name) => isSlashCommandName(name)))
      .toEqual([true, true, true, true, true, false]);
  });

  it("knows every command that gets registered", () => {
    const names = buildCommands().map((command) => command.name);
    expect(names).toEqual(["ask", "sum-day", "sum-hr", "chart-day", "chart-hr"]);
    expect(names.every((name) => isSlashCommandName(name))).toBe(true);
  });

  it("bounds the hours option of the chart command", () => {
    const chartHr = buildCommands().find((command) => command.name === "chart-hr");
    expect(chartHr?.options?.[0]).toMatchObject({ name: "hours", required: true, min_value: 1, max_value: 168 });
  });
});
