import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import type { InsertMessage } from "@shared/schema";
import { USER_MESSAGES } from "../config/messages";
import { LLM_MODELS, MODEL_SETTINGS, SYSTEM_PROMPTS } from "../config/models";
import type { TextGenerator } from "../llm/client";
import { buildConversation, createAssistant } from "../services/assistant";
import { MemStorage } from "../storage";
import { ExternalServiceError } from "../utils/errorHandler";
import { makeEvent } from "./helpers/fakePlatform";

function threadMessage(id: string, minute: number, overrides: Partial<InsertMessage> = {}): InsertMessage {
  return {
    id,
    authorId: "user-1",
    authorName: "Ada",
    channelId: "thread-1",
    content: `message ${id}`,
    createdAt: new Date(Date.UTC(2024, 4, 6, 10, minute)),
    ...overrides,
  };
}

describe("buildConversation", () => {
  let storage: MemStorage;

  beforeEach(() => {
    storage = new MemStorage();
  });

  it("sends only the system prompt and the query outside threads", async () => {
    const conversation = await buildConversation(makeEvent(), "what is up?", storage, 8);
    expect(conversation).toEqual([
      { role: "system", content: SYSTEM_PROMPTS.ASSISTANT },
      { role: "user", content: "Ada: what is up?" },
    ]);
  });

  it("includes thread history, skipping the triggering message", async () => {
    await storage.storeMessage(threadMessage("h1", 0, { content: "<@bot-1> how do I deploy?" }));
    await storage.storeMessage(threadMessage("h2", 1, { authorId: "bot-1", authorName: "Bot", isBot: true, content: "Run the deploy script." }));
    await storage.storeMessage(threadMessage("h3", 2, { content: "and rollback?" }));

    const event = makeEvent({
      eventId: "h3",
      kind: "thread-reply",
      channelId: "thread-1",
      threadId: "thread-1",
      isAlreadyInThread: true,
      content: "and rollback?",
    });
    const conversation = await buildConversation(event, "and rollback?", storage, 8);

    expect(conversation).toEqual([
      { role: "system", content: SYSTEM_PROMPTS.ASSISTANT },
      { role: "user", content: "Ada: <@bot-1> how do I deploy?" },
      { role: "assistant", content: "Run the deploy script." },
      { role: "user", content: "Ada: and rollback?" },
    ]);
  });

  it("leaves the working indicator and failure notices out of the history", async () => {
    const bot = { authorId: "bot-1", authorName: "Bot", isBot: true };
    await storage.storeMessage(threadMessage("u1", 0, { content: "hi" }));
    await storage.storeMessage(threadMessage("b1", 1, { ...bot, content: USER_MESSAGES.processing }));
    await storage.storeMessage(threadMessage("b2", 2, { ...bot, content: "answer" }));
    await storage.storeMessage(threadMessage("b3", 3, { ...bot, content: "Please wait 4.0 seconds before making another request." }));

    const event = makeEvent({ eventId: "u2", channelId: "thread-1", threadId: "thread-1", isAlreadyInThread: true });
    const conversation = await buildConversation(event, "next", storage, 8);

    expect(conversation.map((m) => [m.role, m.content])).toEqual([
      ["system", SYSTEM_PROMPTS.ASSISTANT],
      ["user", "Ada: hi"],
      ["assistant", "answer"],
      ["user", "Ada: next"],
    ]);
  });

  it("strips part headers from split answers", async () => {
    const bot = { authorId: "bot-1", authorName: "Bot", isBot: true };
    await storage.storeMessage(threadMessage("p1", 0, { ...bot, content: "[Part 1/2]\nfirst half" }));
    await storage.storeMessage(threadMessage("p2", 1, { ...bot, content: "[Part 2/2]\nsecond half" }));

    const event = makeEvent({ eventId: "u3", channelId: "thread-1", threadId: "thread-1", isAlreadyInThread: true });
    const conversation = await buildConversation(event, "more", storage, 8);

    expect(conversation.slice(1, 3)).toEqual([
      { role: "assistant", content: "first half" },
      { role: "assistant", content: "second half" },
    ]);
  });

  it("keeps only the most recent history", async () => {
    for (let i = 0; i < 5; i++) {
      await storage.storeMessage(threadMessage(`h${i}`, i));
    }
    const event = makeEvent({ eventId: "new", channelId: "thread-1", threadId: "thread-1", isAlreadyInThread: true });
    const conversation = await buildConversation(event, "next", storage, 2);

    // limit + 1 fetched; the trigger is not stored so all three stay
    expect(conversation.map((m) => m.content)).toEqual([
      SYSTEM_PROMPTS.ASSISTANT,
      "Ada: message h2",
      "Ada: message h3",
      "Ada: message h4",
      "Ada: next",
    ]);
  });
});

describe("createAssistant", () => {
  let generate: Mock<TextGenerator>;

  beforeEach(() => {
    generate = vi.fn<TextGenerator>(async (opts) => ({ text: "  Hello there.  ", model: opts.model, totalTokens: 12 }));
  });

  it("answers with the trimmed model output", async () => {
    const assistant = createAssistant({ storage: new MemStorage(), generate });
    const payload = await assistant(makeEvent(), "hi");

    expect(payload).toEqual({ text: "Hello there.", visualizations: [] });
    expect(generate).toHaveBeenCalledWith({
      model: LLM_MODELS.ASSISTANT,
      messages: [
        { role: "system", content: SYSTEM_PROMPTS.ASSISTANT },
        { role: "user", content: "Ada: hi" },
      ],
      temperature: MODEL_SETTINGS.ASSISTANT_TEMPERATURE,
      maxTokens: MODEL_SETTINGS.ASSISTANT_MAX_TOKENS,
    });
  });

  it("uses the configured model", async () => {
    const assistant = createAssistant({ storage: new MemStorage(), generate, model: "gpt-4o" });
    await assistant(makeEvent(), "hi");
    expect(generate.mock.calls[0][0].model).toBe("gpt-4o");
  });

  it("rejects an empty completion", async () => {
    generate.mockResolvedValueOnce({ text: "   ", model: LLM_MODELS.ASSISTANT });
    const assistant = createAssistant({ storage: new MemStorage(), generate });

    await expect(assistant(makeEvent(), "hi")).rejects.toBeInstanceOf(ExternalServiceError);
  });
});
