/**
 * Application Constants
 *
 * Centralized configuration values used across the application.
 * Environment overrides for the tunable ones are applied in botConfig.ts.
 */

/**
 * Redelivery detection.
 *
 * Two caches run side by side: one keyed by (event, channel), one by
 * (event, author). Each evicts its oldest half in one batch once it grows
 * past its bound.
 */
export const DEDUP_CONSTANTS = {
  MESSAGE_CACHE_SIZE: 1000,
  COMMAND_CACHE_SIZE: 500,
} as const;

/**
 * Thread resolution.
 */
export const THREAD_CONSTANTS = {
  RESOLUTION_CACHE_SIZE: 500,

  /**
   * How long to wait for the platform's own thread on attachment messages.
   * Auto-threading for media lags the message event by a second or two.
   */
  AUTO_THREAD_TIMEOUT_MS: 5000,
  AUTO_THREAD_INITIAL_INTERVAL_MS: 200,
  AUTO_THREAD_BACKOFF_FACTOR: 1.5,
  AUTO_THREAD_MAX_INTERVAL_MS: 2000,

  /** Discord rejects thread names longer than this. */
  MAX_THREAD_NAME_LENGTH: 100,

  /** Registry of originating discord.js objects, keyed by event id. */
  SOURCE_REGISTRY_SIZE: 500,
} as const;

/**
 * Response delivery.
 */
export const DELIVERY_CONSTANTS = {
  /** Hard platform limit for one message. */
  MESSAGE_LIMIT: 2000,

  /** Chunk size once splitting; leaves room for the part header. */
  CHUNK_SIZE: 1900,

  MAX_ATTEMPTS: 3,
  BASE_BACKOFF_MS: 1000,
} as const;

/**
 * Per-user request limits.
 */
export const RATE_LIMIT_CONSTANTS = {
  COOLDOWN_SECONDS: 10,
  MAX_REQUESTS_PER_MINUTE: 6,
  WINDOW_MS: 60 * 1000,
  MAX_USERS_TRACKED: 10000,
  CLEANUP_INTERVAL_MS: 60 * 60 * 1000,
  INACTIVE_AFTER_MS: 60 * 60 * 1000,
  AGGRESSIVE_INACTIVE_AFTER_MS: 30 * 60 * 1000,
} as const;

/**
 * Channel summaries.
 */
export const SUMMARY_CONSTANTS = {
  DEFAULT_HOURS: 24,
  MAX_HOURS: 168,

  /** Cap on stored messages fed to the model for one summary. */
  MAX_MESSAGES: 500,

  /** Recent thread messages included as context for follow-ups. */
  THREAD_HISTORY_LIMIT: 8,
} as const;

/**
 * In-process message store used when no database is configured.
 */
export const STORAGE_CONSTANTS = {
  MEMORY_MESSAGE_LIMIT: 10000,
} as const;

/**
 * Chart rendering for /chart-day and /chart-hr.
 */
export const CHART_CONSTANTS = {
  WIDTH: 800,
  HEIGHT: 480,

  /** Tables past this count stay as text. */
  MAX_CHARTS: 4,
} as const;

/**
 * Discord JSON error codes the adapter classifies.
 */
export const DISCORD_ERROR_CODES = {
  UNKNOWN_CHANNEL: 10003,
  UNKNOWN_MESSAGE: 10008,
  REQUEST_ENTITY_TOO_LARGE: 40005,
  MISSING_ACCESS: 50001,
  MISSING_PERMISSIONS: 50013,
  THREAD_ALREADY_CREATED: 160004,
} as const;

/**
 * Network error codes treated as retry-solvable during delivery.
 */
export const TRANSIENT_NETWORK_CODES = [
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
  "ECONNREFUSED",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
] as const;
