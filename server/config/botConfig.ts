/**
 * Bot Configuration
 *
 * Reads the environment once at startup. Everything tunable has a default in
 * constants.ts; the environment only overrides it.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { DEDUP_CONSTANTS, RATE_LIMIT_CONSTANTS, THREAD_CONSTANTS } from "./constants";
import { LLM_MODELS } from "./models";
import { ValidationError } from "../utils/errorHandler";

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v === "" ? undefined : v))
  .optional();

const botConfigSchema = z.object({
  DISCORD_TOKEN: z.string().trim().min(1, "DISCORD_TOKEN is required"),
  DISCORD_APPLICATION_ID: optionalString,
  DISCORD_GUILD_ID: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().trim().min(1).default(LLM_MODELS.ASSISTANT),
  DATABASE_URL: optionalString,
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  MESSAGE_DEDUP_CACHE_SIZE: z.coerce.number().int().min(2).default(DEDUP_CONSTANTS.MESSAGE_CACHE_SIZE),
  COMMAND_DEDUP_CACHE_SIZE: z.coerce.number().int().min(2).default(DEDUP_CONSTANTS.COMMAND_CACHE_SIZE),
  THREAD_CACHE_SIZE: z.coerce.number().int().min(2).default(THREAD_CONSTANTS.RESOLUTION_CACHE_SIZE),
  AUTO_THREAD_TIMEOUT_MS: z.coerce.number().int().min(0).default(THREAD_CONSTANTS.AUTO_THREAD_TIMEOUT_MS),
  RATE_LIMIT_SECONDS: z.coerce.number().min(0).default(RATE_LIMIT_CONSTANTS.COOLDOWN_SECONDS),
  MAX_REQUESTS_PER_MINUTE: z.coerce.number().int().min(1).default(RATE_LIMIT_CONSTANTS.MAX_REQUESTS_PER_MINUTE),
});

export interface BotConfig {
  discord: {
    token: string;
    applicationId?: string;
    guildId?: string;
  };
  openai: {
    apiKey?: string;
    model: string;
  };
  databaseUrl?: string;
  port: number;
  caches: {
    messageDedupSize: number;
    commandDedupSize: number;
    threadResolutionSize: number;
  };
  autoThreadTimeoutMs: number;
  rateLimit: {
    cooldownSeconds: number;
    maxRequestsPerMinute: number;
  };
}

export function loadBotConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const parsed = botConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(fromZodError(parsed.error, { prefix: "Invalid bot configuration" }).message);
  }
  const e = parsed.data;

  return {
    discord: {
      token: e.DISCORD_TOKEN,
      applicationId: e.DISCORD_APPLICATION_ID,
      guildId: e.DISCORD_GUILD_ID,
    },
    openai: {
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
    },
    databaseUrl: e.DATABASE_URL,
    port: e.PORT,
    caches: {
      messageDedupSize: e.MESSAGE_DEDUP_CACHE_SIZE,
      commandDedupSize: e.COMMAND_DEDUP_CACHE_SIZE,
      threadResolutionSize: e.THREAD_CACHE_SIZE,
    },
    autoThreadTimeoutMs: e.AUTO_THREAD_TIMEOUT_MS,
    rateLimit: {
      cooldownSeconds: e.RATE_LIMIT_SECONDS,
      maxRequestsPerMinute: e.MAX_REQUESTS_PER_MINUTE,
    },
  };
}

/**
 * Startup checklist. Missing optional integrations are reported, never fatal.
 *
 * @returns the names of the missing integrations
 */
export function checkBotConfiguration(config: BotConfig): string[] {
  const missing: string[] = [];
  console.log("\n=== Bot Configuration Check ===");
  console.log("✓ DISCORD_TOKEN found");

  if (config.discord.applicationId) {
    const scope = config.discord.guildId ? `guild ${config.discord.guildId}` : "global";
    console.log(`✓ DISCORD_APPLICATION_ID found - slash commands will be registered (${scope})`);
  } else {
    console.warn("⚠️  DISCORD_APPLICATION_ID not set - slash commands will not be registered");
    missing.push("commands");
  }

  if (config.openai.apiKey) {
    console.log(`✓ OPENAI_API_KEY found - model ${config.openai.model}`);
  } else {
    console.warn("⚠️  OPENAI_API_KEY not set - every request will fail with a configuration notice");
    missing.push("openai");
  }

  if (config.databaseUrl) {
    console.log("✓ DATABASE_URL found - messages and exchanges persist to Postgres");
  } else {
    console.warn("⚠️  DATABASE_URL not set - using in-memory storage, summaries only cover this process's lifetime");
    missing.push("database");
  }

  console.log("=".repeat(31) + "\n");
  return missing;
}
