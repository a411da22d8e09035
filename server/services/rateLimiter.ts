/**
 * Per-user request limiter
 *
 * Two rules: a cooldown between consecutive requests, and a cap on requests
 * inside a sliding window. Allowed requests are recorded by check().
 * Tracking is bounded; inactive users are dropped periodically, and
 * aggressively once the tracked population grows past its limit.
 */

import { RATE_LIMIT_CONSTANTS } from "../config/constants";
import { rateLimitCooldownMessage, rateLimitWindowMessage } from "../config/messages";
import { RateLimitError } from "../utils/errorHandler";
import { logInfo, logWarn } from "../utils/logger";

export type RateLimitReason = "cooldown" | "window";

export type RateLimitResult =
  | { limited: false }
  | { limited: true; waitSeconds: number; reason: RateLimitReason };

export interface RateLimiterOptions {
  cooldownSeconds?: number;
  maxRequestsPerWindow?: number;
  windowMs?: number;
  maxUsersTracked?: number;
  cleanupIntervalMs?: number;
  inactiveAfterMs?: number;
  aggressiveInactiveAfterMs?: number;
  now?: () => number;
}

export class RateLimiter {
  private lastRequest = new Map<string, number>();
  private requests = new Map<string, number[]>();
  private lastCleanup: number;

  private cooldownMs: number;
  private maxRequests: number;
  private windowMs: number;
  private maxUsers: number;
  private cleanupIntervalMs: number;
  private inactiveAfterMs: number;
  private aggressiveInactiveAfterMs: number;
  private now: () => number;

  constructor(options: RateLimiterOptions = {}) {
    this.cooldownMs = (options.cooldownSeconds ?? RATE_LIMIT_CONSTANTS.COOLDOWN_SECONDS) * 1000;
    this.maxRequests = options.maxRequestsPerWindow ?? RATE_LIMIT_CONSTANTS.MAX_REQUESTS_PER_MINUTE;
    this.windowMs = options.windowMs ?? RATE_LIMIT_CONSTANTS.WINDOW_MS;
    this.maxUsers = options.maxUsersTracked ?? RATE_LIMIT_CONSTANTS.MAX_USERS_TRACKED;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? RATE_LIMIT_CONSTANTS.CLEANUP_INTERVAL_MS;
    this.inactiveAfterMs = options.inactiveAfterMs ?? RATE_LIMIT_CONSTANTS.INACTIVE_AFTER_MS;
    this.aggressiveInactiveAfterMs = options.aggressiveInactiveAfterMs ?? RATE_LIMIT_CONSTANTS.AGGRESSIVE_INACTIVE_AFTER_MS;
    this.now = options.now ?? Date.now;
    this.lastCleanup = this.now();
  }

  get trackedUsers(): number {
    return this.lastRequest.size;
  }

  check(userId: string): RateLimitResult {
    const now = this.now();

    if (this.lastRequest.size > this.maxUsers) {
      logWarn(`[RateLimiter] Tracking ${this.lastRequest.size} users, performing aggressive cleanup`);
      this.cleanup(now, true);
      this.lastCleanup = now;
    } else if (now - this.lastCleanup > this.cleanupIntervalMs) {
      this.cleanup(now, false);
      this.lastCleanup = now;
    }

    const last = this.lastRequest.get(userId);
    if (last !== undefined && now - last < this.cooldownMs) {
      return { limited: true, waitSeconds: (this.cooldownMs - (now - last)) / 1000, reason: "cooldown" };
    }

    const windowStart = now - this.windowMs;
    const recent = (this.requests.get(userId) ?? []).filter((t) => t > windowStart);
    if (recent.length >= this.maxRequests) {
      const oldest = Math.min(...recent);
      return { limited: true, waitSeconds: (oldest + this.windowMs - now) / 1000, reason: "window" };
    }

    this.lastRequest.set(userId, now);
    this.requests.set(userId, [...recent, now]);
    return { limited: false };
  }

  /**
   * Throws a RateLimitError whose message is the notice shown to the user.
   */
  assertAllowed(userId: string): void {
    const result = this.check(userId);
    if (!result.limited) return;

    const message = result.reason === "cooldown"
      ? rateLimitCooldownMessage(result.waitSeconds)
      : rateLimitWindowMessage(result.waitSeconds);
    throw new RateLimitError(message, result.waitSeconds);
  }

  cleanup(now: number, aggressive: boolean): number {
    const threshold = now - (aggressive ? this.aggressiveInactiveAfterMs : this.inactiveAfterMs);
    let removed = 0;

    for (const [userId, last] of Array.from(this.lastRequest.entries())) {
      if (last < threshold) {
        this.forget(userId);
        removed++;
      }
    }

    if (aggressive && this.lastRequest.size > this.maxUsers) {
      const byAge = Array.from(this.lastRequest.entries()).sort((a, b) => a[1] - b[1]);
      const excess = byAge.slice(0, this.lastRequest.size - Math.floor(this.maxUsers / 2));
      for (const [userId] of excess) {
        this.forget(userId);
      }
      removed += excess.length;
      logWarn(`[RateLimiter] Aggressive cleanup removed ${excess.length} additional users`);
    }

    if (removed > 0) {
      logInfo(`[RateLimiter] ${aggressive ? "Aggressive" : "Normal"} cleanup removed ${removed} users, tracking ${this.lastRequest.size}`);
    }
    return removed;
  }

  private forget(userId: string): void {
    this.lastRequest.delete(userId);
    this.requests.delete(userId);
  }
}
