/**
 * Thread Resolver
 *
 * Picks the thread a response goes to, creating one when needed. The
 * platform may start a thread on its own for attachment messages, racing our
 * createThread call, so every path that finds or creates a thread goes
 * through the resolution cache: the first registered thread for an event is
 * the only one ever returned for it.
 */

import { format } from "date-fns";
import { THREAD_CONSTANTS } from "../config/constants";
import { isPlatformError } from "../utils/errorHandler";
import type { EventLogger } from "../utils/logger";
import { pollUntil, type PollOptions } from "./pollUntil";
import type { ThreadResolutionCache } from "./threadResolutionCache";
import { defaultSleep, isChartCommand, isSummaryCommand, type InboundEvent, type PlatformAdapter, type ResolvedThread, type Sleep, type Thread } from "./types";

export interface ThreadResolverOptions {
  autoThreadTimeoutMs?: number;
  initialIntervalMs?: number;
  backoffFactor?: number;
  maxIntervalMs?: number;
  sleep?: Sleep;
}

export function threadNameFor(event: InboundEvent): string {
  let name: string;
  if (isSummaryCommand(event.commandName)) {
    const channel = event.channelName ?? event.channelId;
    const label = isChartCommand(event.commandName) ? "Chart Analysis" : "Summary";
    name = `${label} - #${channel} - ${format(event.receivedAt, "yyyy-MM-dd")}`;
  } else {
    name = `Bot Response - ${event.authorName}`;
  }
  return name.slice(0, THREAD_CONSTANTS.MAX_THREAD_NAME_LENGTH);
}

export class ThreadResolver {
  private platform: PlatformAdapter;
  private cache: ThreadResolutionCache;
  private poll: PollOptions;

  constructor(platform: PlatformAdapter, cache: ThreadResolutionCache, options: ThreadResolverOptions = {}) {
    this.platform = platform;
    this.cache = cache;
    this.poll = {
      timeoutMs: options.autoThreadTimeoutMs ?? THREAD_CONSTANTS.AUTO_THREAD_TIMEOUT_MS,
      initialIntervalMs: options.initialIntervalMs ?? THREAD_CONSTANTS.AUTO_THREAD_INITIAL_INTERVAL_MS,
      backoffFactor: options.backoffFactor ?? THREAD_CONSTANTS.AUTO_THREAD_BACKOFF_FACTOR,
      maxIntervalMs: options.maxIntervalMs ?? THREAD_CONSTANTS.AUTO_THREAD_MAX_INTERVAL_MS,
      sleep: options.sleep ?? defaultSleep,
    };
  }

  /**
   * Resolve the destination thread for an event.
   *
   * @returns the thread to reply in, or null to reply in the channel
   */
  async resolve(event: InboundEvent, threadName: string, logger?: EventLogger): Promise<ResolvedThread> {
    if (event.isAlreadyInThread) {
      return { id: event.threadId ?? event.channelId };
    }

    const cached = this.cache.resolve(event.eventId);
    if (cached) {
      logger?.debug("Thread resolved from cache", { threadId: cached.id });
      return cached;
    }

    if (event.hasAttachments) {
      const auto = await this.waitForAutoThread(event, logger);
      if (auto) {
        return this.cache.register(event.eventId, auto);
      }
      // Another lifecycle may have settled it while we waited
      const settled = this.cache.resolve(event.eventId);
      if (settled) {
        return settled;
      }
    }

    return this.create(event, threadName, logger);
  }

  private async waitForAutoThread(event: InboundEvent, logger?: EventLogger): Promise<Thread | null> {
    try {
      const result = await pollUntil(async () => {
        return this.cache.resolve(event.eventId) ?? (await this.platform.fetchExistingThread(event));
      }, this.poll);

      if (result.value) {
        logger?.info("Found platform-created thread", {
          threadId: result.value.id,
          attempts: result.attempts,
          waitedMs: result.elapsedMs,
        });
      } else {
        logger?.debug("No platform-created thread within wait window", { waitedMs: result.elapsedMs });
      }
      return result.value;
    } catch (err) {
      logger?.warn("Polling for platform-created thread failed, creating one", err);
      return null;
    }
  }

  private async create(event: InboundEvent, threadName: string, logger?: EventLogger): Promise<ResolvedThread> {
    try {
      const created = await this.platform.createThread(event, threadName);
      logger?.info("Created thread", { threadId: created.id });
      return this.cache.register(event.eventId, created);
    } catch (err) {
      if (isPlatformError(err, "already-exists")) {
        return this.adoptExisting(event, logger);
      }
      logger?.warn("Thread creation failed, replying in channel", err);
      return null;
    }
  }

  private async adoptExisting(event: InboundEvent, logger?: EventLogger): Promise<ResolvedThread> {
    const cached = this.cache.resolve(event.eventId);
    if (cached) {
      return cached;
    }
    try {
      const existing = await this.platform.fetchExistingThread(event);
      if (existing) {
        logger?.info("Thread already existed, using it", { threadId: existing.id });
        return this.cache.register(event.eventId, existing);
      }
      logger?.warn("Thread reported as existing but could not be fetched, replying in channel");
    } catch (err) {
      logger?.warn("Failed to fetch existing thread, replying in channel", err);
    }
    return this.cache.resolve(event.eventId) ?? null;
  }
}
