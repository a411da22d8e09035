/**
 * Centralized LLM Model Registry
 *
 * Single source of truth for the models the bot calls. OPENAI_MODEL in the
 * environment overrides the assistant model (see botConfig.ts).
 *
 * MODEL TIERS:
 *
 * ASSISTANT - gpt-4o-mini
 *   Speed: ~300-1000ms | Cost: Lowest
 *   Use for: answering mentions, /ask and thread follow-ups
 *
 * SUMMARY - gpt-4o
 *   Speed: ~1500-4000ms | Cost: Medium
 *   Use for: channel summaries over up to a week of messages
 */

export const LLM_MODELS = {
  ASSISTANT: "gpt-4o-mini",
  SUMMARY: "gpt-4o",
} as const;

export type LLMModel = typeof LLM_MODELS[keyof typeof LLM_MODELS];

export const MODEL_SETTINGS = {
  ASSISTANT_TEMPERATURE: 0.7,
  SUMMARY_TEMPERATURE: 0.3,
  /** Keeps a typical answer within two Discord messages. */
  ASSISTANT_MAX_TOKENS: 1000,
  SUMMARY_MAX_TOKENS: 1500,
} as const;

export const SYSTEM_PROMPTS = {
  ASSISTANT:
    "You are a helpful assistant in a Discord server. Answer concisely and use Discord markdown. " +
    "When earlier messages from the thread are included, treat them as the conversation so far.",
  SUMMARY:
    "You summarize Discord channel conversations. Group the discussion by topic, name the people " +
    "who drove each topic, and list any decisions or open questions. Use Discord markdown bullet points.",
  CHART_ANALYSIS:
    "You analyze Discord channel activity. Write a short summary, then put the numbers that matter " +
    "(messages per person, activity per hour or day, share of each topic) in markdown tables with a " +
    "label column followed by numeric columns. Each table becomes a chart, so keep it to a few tables.",
} as const;
