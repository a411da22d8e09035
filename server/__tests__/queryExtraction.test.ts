import { describe, it, expect } from "vitest";
import { USER_MESSAGES } from "../config/messages";
import { createQueryExtractor, extractQuery, stripBotMention } from "../services/queryExtraction";
import { ValidationError } from "../utils/errorHandler";
import { makeEvent } from "./helpers/fakePlatform";

describe("stripBotMention", () => {
  it("removes the bot mention in both forms", () => {
    expect(stripBotMention("<@123> hello", "123")).toBe("hello");
    expect(stripBotMention("hey <@!123> there", "123")).toBe("hey  there");
  });

  it("leaves other users' mentions alone", () => {
    expect(stripBotMention("<@123> ask <@456>", "123")).toBe("ask <@456>");
  });

  it("removes the first mention when the bot id is unknown", () => {
    expect(stripBotMention("<@999> summarize", undefined)).toBe("summarize");
  });
});

describe("extractQuery", () => {
  it("strips the mention from mention events", () => {
    const event = makeEvent({ content: "<@bot-1> what is up?" });
    expect(extractQuery(event, "bot-1")).toBe("what is up?");
  });

  it("uses the whole text of a thread reply", () => {
    const event = makeEvent({ kind: "thread-reply", content: "and tomorrow?" });
    expect(extractQuery(event, "bot-1")).toBe("and tomorrow?");
  });

  it("rejects a bare mention", () => {
    const event = makeEvent({ content: "<@bot-1>   " });
    expect(() => extractQuery(event, "bot-1")).toThrow(ValidationError);
    expect(() => extractQuery(event, "bot-1")).toThrow(USER_MESSAGES.noQuery);
  });

  it("reads the query option of /ask", () => {
    const event = makeEvent({
      kind: "slash-command",
      content: "/ask",
      commandName: "ask",
      commandOptions: { query: "  how do threads work? " },
    });
    expect(extractQuery(event)).toBe("how do threads work?");
  });

  it("rejects /ask without a query", () => {
    const event = makeEvent({ kind: "slash-command", content: "/ask", commandName: "ask", commandOptions: {} });
    expect(() => extractQuery(event)).toThrow(USER_MESSAGES.noQuery);
  });

  it("describes summary commands", () => {
    const day = makeEvent({ kind: "slash-command", content: "/sum-day", commandName: "sum-day" });
    const hours = makeEvent({ kind: "slash-command", content: "/sum-hr", commandName: "sum-hr", commandOptions: { hours: 6 } });
    expect(extractQuery(day)).toBe("/sum-day");
    expect(extractQuery(hours)).toBe("/sum-hr 6");
  });

  it("describes chart commands typed as messages", () => {
    const day = makeEvent({ kind: "typed-command", content: "/chart-day", commandName: "chart-day" });
    const hours = makeEvent({ kind: "typed-command", content: "/chart-hr 3", commandName: "chart-hr", commandOptions: { hours: "3" } });
    const missing = makeEvent({ kind: "typed-command", content: "/chart-hr", commandName: "chart-hr", commandOptions: {} });
    expect(extractQuery(day)).toBe("/chart-day");
    expect(extractQuery(hours)).toBe("/chart-hr 3");
    expect(extractQuery(missing)).toBe("/chart-hr");
  });
});

describe("createQueryExtractor", () => {
  it("reads the bot id at extraction time", () => {
    let botId: string | undefined;
    const extract = createQueryExtractor(() => botId);
    const event = makeEvent({ content: "<@555> <@bot-1> hi" });

    // unknown bot id: the first mention goes
    expect(extract(event)).toBe("<@bot-1> hi");

    botId = "bot-1";
    expect(extract(event)).toBe("<@555>  hi");
  });
});
