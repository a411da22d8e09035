import express from "express";
import { loadBotConfig, checkBotConfiguration } from "./config/botConfig";
import { CommandCoordinator } from "./coordinator/commandCoordinator";
import { DedupCache } from "./coordinator/dedupCache";
import { ThreadResolutionCache } from "./coordinator/threadResolutionCache";
import { ThreadResolver } from "./coordinator/threadResolver";
import { createDiscordClient } from "./discord/client";
import { registerCommands } from "./discord/commands";
import { registerDiscordEvents } from "./discord/events";
import { DiscordPlatformAdapter, SourceRegistry } from "./discord/platformAdapter";
import { registerRoutes } from "./routes";
import { createAssistant } from "./services/assistant";
import { createCollaborator } from "./services/collaborator";
import { createQueryExtractor } from "./services/queryExtraction";
import { RateLimiter } from "./services/rateLimiter";
import { createSummarizer } from "./services/summarizer";
import { createOpenAIGenerator } from "./llm/client";
import { createStorage } from "./storage";
import { getErrorMessage } from "./utils/errorHandler";
import { logError, logInfo } from "./utils/logger";

async function main(): Promise<void> {
  const config = loadBotConfig();
  checkBotConfiguration(config);

  const storage = createStorage(config.databaseUrl);
  const client = createDiscordClient();
  const sources = new SourceRegistry();
  const platform = new DiscordPlatformAdapter(client, sources);

  const generate = createOpenAIGenerator(config.openai.apiKey);
  const collaborator = createCollaborator({
    rateLimiter: new RateLimiter({
      cooldownSeconds: config.rateLimit.cooldownSeconds,
      maxRequestsPerWindow: config.rateLimit.maxRequestsPerMinute,
    }),
    assistant: createAssistant({ storage, generate, model: config.openai.model }),
    summarizer: createSummarizer({ storage, generate }),
  });

  const threadCache = new ThreadResolutionCache(config.caches.threadResolutionSize);
  const coordinator = new CommandCoordinator({
    platform,
    collaborator,
    extractQuery: createQueryExtractor(() => client.user?.id),
    recorder: storage,
    messageDedup: new DedupCache("message", config.caches.messageDedupSize),
    commandDedup: new DedupCache("command", config.caches.commandDedupSize),
    threadCache,
    resolver: new ThreadResolver(platform, threadCache, { autoThreadTimeoutMs: config.autoThreadTimeoutMs }),
  });

  registerDiscordEvents({ client, coordinator, storage, sources });

  if (config.discord.applicationId) {
    await registerCommands({
      token: config.discord.token,
      applicationId: config.discord.applicationId,
      guildId: config.discord.guildId,
    });
  }

  const app = express();
  app.use(express.json());
  const server = registerRoutes(app, {
    coordinator,
    exchanges: storage,
    isDiscordReady: () => client.isReady(),
    startedAt: new Date(),
  });
  server.listen(config.port, "0.0.0.0", () => {
    logInfo(`[Server] Listening on port ${config.port}`);
  });

  await client.login(config.discord.token);

  const shutdown = (signal: string) => {
    logInfo(`[Server] ${signal} received, shutting down`, { stats: coordinator.getStats() });
    server.close();
    void client.destroy().finally(() => process.exit(0));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  logError("[Server] Startup failed", { error: getErrorMessage(err) });
  process.exit(1);
});
