import { describe, it, expect, vi, afterEach } from "vitest";
import { checkBotConfiguration, loadBotConfig } from "../config/botConfig";
import { ValidationError } from "../utils/errorHandler";

describe("loadBotConfig", () => {
  it("applies defaults when only the token is set", () => {
    const config = loadBotConfig({ DISCORD_TOKEN: "test-token" });

    expect(config).toEqual({
      discord: { token: "test-token", applicationId: undefined, guildId: undefined },
      openai: { apiKey: undefined, model: "gpt-4o-mini" },
      databaseUrl: undefined,
      port: 5000,
      caches: { messageDedupSize: 1000, commandDedupSize: 500, threadResolutionSize: 500 },
      autoThreadTimeoutMs: 5000,
      rateLimit: { cooldownSeconds: 10, maxRequestsPerMinute: 6 },
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadBotConfig({
      DISCORD_TOKEN: "test-token",
      DISCORD_APPLICATION_ID: "app-1",
      DISCORD_GUILD_ID: "guild-1",
      OPENAI_API_KEY: "test-key",
      OPENAI_MODEL: "gpt-4o",
      DATABASE_URL: "postgres://localhost/test",
      PORT: "8080",
      MESSAGE_DEDUP_CACHE_SIZE: "64",
      AUTO_THREAD_TIMEOUT_MS: "0",
      RATE_LIMIT_SECONDS: "2.5",
    });

    expect(config.discord).toEqual({ token: "test-token", applicationId: "app-1", guildId: "guild-1" });
    expect(config.openai).toEqual({ apiKey: "test-key", model: "gpt-4o" });
    expect(config.databaseUrl).toBe("postgres://localhost/test");
    expect(config.port).toBe(8080);
    expect(config.caches.messageDedupSize).toBe(64);
    expect(config.autoThreadTimeoutMs).toBe(0);
    expect(config.rateLimit.cooldownSeconds).toBe(2.5);
  });

  it("treats blank optional values as unset", () => {
    const config = loadBotConfig({ DISCORD_TOKEN: "test-token", OPENAI_API_KEY: "  ", DATABASE_URL: "" });
    expect(config.openai.apiKey).toBeUndefined();
    expect(config.databaseUrl).toBeUndefined();
  });

  it("requires a Discord token", () => {
    expect(() => loadBotConfig({})).toThrow(ValidationError);
    expect(() => loadBotConfig({ DISCORD_TOKEN: " " })).toThrow(/Invalid bot configuration/);
  });

  it("rejects cache sizes too small to evict from", () => {
    expect(() => loadBotConfig({ DISCORD_TOKEN: "test-token", THREAD_CACHE_SIZE: "1" })).toThrow(ValidationError);
  });
});

describe("checkBotConfiguration", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists missing integrations", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(checkBotConfiguration(loadBotConfig({ DISCORD_TOKEN: "test-token" }))).toEqual(["commands", "openai", "database"]);
  });

  it("reports nothing missing when fully configured", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const config = loadBotConfig({
      DISCORD_TOKEN: "test-token",
      DISCORD_APPLICATION_ID: "app-1",
      OPENAI_API_KEY: "test-key",
      DATABASE_URL: "postgres://localhost/test",
    });
    expect(checkBotConfiguration(config)).toEqual([]);
    expect(warn).not.toHaveBeenCalled();
  });
});
