import { describe, it, expect } from "vitest";
import { USER_MESSAGES } from "../config/messages";
import { createOpenAIGenerator, MISSING_API_KEY } from "../llm/client";
import { classifyPipelineError, ExternalServiceError } from "../utils/errorHandler";

describe("createOpenAIGenerator", () => {
  it("fails every call without an API key", async () => {
    const generate = createOpenAIGenerator(undefined);
    const request = generate({ model: "gpt-4o-mini", messages: [{ role: "user", content: "hi" }] });

    await expect(request).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(request).rejects.toMatchObject({ code: MISSING_API_KEY, message: "OpenAI error: OPENAI_API_KEY is not set" });
  });

  it("surfaces a missing key as the configuration notice", async () => {
    const generate = createOpenAIGenerator("");
    const error = await generate({ model: "gpt-4o-mini", messages: [] }).catch((err: unknown) => err);

    const classified = classifyPipelineError(error);
    expect(classified.type).toBe("llm_auth");
    expect(classified.userMessage).toBe(USER_MESSAGES.llmAuth);
  });
});
