/**
 * Command Coordinator
 *
 * Runs one lifecycle per inbound event:
 *
 *   ARRIVED -> DEDUP_REJECTED
 *           -> DEDUP_ACCEPTED -> THREAD_RESOLVING -> THREAD_READY
 *              -> PROCESSING -> DELIVERING -> DELIVERED
 *              (PROCESSING | DELIVERING) -> FAILED
 *
 * The dedup gate is the only place an event is admitted. It runs
 * synchronously, before the first await, so two deliveries of one event can
 * never both pass it.
 */

import { DEDUP_CONSTANTS, THREAD_CONSTANTS } from "../config/constants";
import { classifyPipelineError, getErrorMessage, type ClassifiedError } from "../utils/errorHandler";
import { EventLogger, logError } from "../utils/logger";
import { DedupCache, commandKey, messageKey } from "./dedupCache";
import { ResponseDelivery } from "./responseDelivery";
import { ThreadResolutionCache } from "./threadResolutionCache";
import { ThreadResolver, threadNameFor } from "./threadResolver";
import {
  destinationFor,
  type Collaborator,
  type Destination,
  type ExchangeRecord,
  type ExchangeRecorder,
  type InboundEvent,
  type PlatformAdapter,
  type ResolvedThread,
  type ResponsePayload,
} from "./types";
import { createWorkingIndicator } from "./workingIndicator";

export type LifecycleState =
  | "ARRIVED"
  | "DEDUP_REJECTED"
  | "DEDUP_ACCEPTED"
  | "THREAD_RESOLVING"
  | "THREAD_READY"
  | "PROCESSING"
  | "DELIVERING"
  | "DELIVERED"
  | "FAILED";

export type TerminalState = "DEDUP_REJECTED" | "DELIVERED" | "FAILED";

const TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
  ARRIVED: ["DEDUP_REJECTED", "DEDUP_ACCEPTED"],
  DEDUP_ACCEPTED: ["THREAD_RESOLVING"],
  THREAD_RESOLVING: ["THREAD_READY"],
  THREAD_READY: ["PROCESSING"],
  PROCESSING: ["DELIVERING", "FAILED"],
  DELIVERING: ["DELIVERED", "FAILED"],
  DEDUP_REJECTED: [],
  DELIVERED: [],
  FAILED: [],
};

export class Lifecycle {
  private current: LifecycleState = "ARRIVED";
  readonly history: LifecycleState[] = ["ARRIVED"];

  constructor(readonly eventId: string, private logger?: EventLogger) {}

  get state(): LifecycleState {
    return this.current;
  }

  transition(next: LifecycleState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal lifecycle transition ${this.current} -> ${next} for event ${this.eventId}`);
    }
    this.current = next;
    this.history.push(next);
    this.logger?.debug(`Lifecycle -> ${next}`, { state: next });
  }

  isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }
}

export interface LifecycleResult {
  eventId: string;
  /** Shared by every log entry of this lifecycle. */
  correlationId: string;
  state: TerminalState;
  destination?: Destination;
  firstMessageId?: string;
  error?: ClassifiedError;
  history: LifecycleState[];
}

export interface CoordinatorStats {
  accepted: number;
  duplicates: number;
  delivered: number;
  failed: number;
  inFlight: number;
  caches: {
    messageDedup: number;
    commandDedup: number;
    threadResolution: number;
  };
}

export type QueryExtractor = (event: InboundEvent) => string;

export type SettledCallback = (result: LifecycleResult) => Promise<void> | void;

export interface CommandCoordinatorDeps {
  platform: PlatformAdapter;
  collaborator: Collaborator;
  extractQuery: QueryExtractor;
  recorder?: ExchangeRecorder;
  messageDedup?: DedupCache;
  commandDedup?: DedupCache;
  threadCache?: ThreadResolutionCache;
  resolver?: ThreadResolver;
  delivery?: ResponseDelivery;
}

export class CommandCoordinator {
  private platform: PlatformAdapter;
  private collaborator: Collaborator;
  private extractQuery: QueryExtractor;
  private recorder?: ExchangeRecorder;
  private messageDedup: DedupCache;
  private commandDedup: DedupCache;
  private threadCache: ThreadResolutionCache;
  private resolver: ThreadResolver;
  private delivery: ResponseDelivery;

  private counters = { accepted: 0, duplicates: 0, delivered: 0, failed: 0, inFlight: 0 };

  constructor(deps: CommandCoordinatorDeps) {
    this.platform = deps.platform;
    this.collaborator = deps.collaborator;
    this.extractQuery = deps.extractQuery;
    this.recorder = deps.recorder;
    this.messageDedup = deps.messageDedup ?? new DedupCache("message", DEDUP_CONSTANTS.MESSAGE_CACHE_SIZE);
    this.commandDedup = deps.commandDedup ?? new DedupCache("command", DEDUP_CONSTANTS.COMMAND_CACHE_SIZE);
    this.threadCache = deps.threadCache ?? new ThreadResolutionCache(THREAD_CONSTANTS.RESOLUTION_CACHE_SIZE);
    this.resolver = deps.resolver ?? new ThreadResolver(this.platform, this.threadCache);
    this.delivery = deps.delivery ?? new ResponseDelivery(this.platform);
  }

  /**
   * Hand an event off without waiting for its lifecycle. The dedup gate has
   * already run when this returns.
   */
  dispatch(event: InboundEvent, onSettled?: SettledCallback): void {
    void this.handle(event)
      .then((result) => onSettled?.(result))
      .catch((err) => {
        logError("[Coordinator] Dispatch failed", {
          eventId: event.eventId,
          channelId: event.channelId,
          error: getErrorMessage(err),
          stack: err instanceof Error ? err.stack : undefined,
        });
      });
  }

  async handle(event: InboundEvent): Promise<LifecycleResult> {
    const logger = new EventLogger(event.eventId, event.channelId, event.authorId);
    const lifecycle = new Lifecycle(event.eventId, logger);

    // Both gates are evaluated so each cache records the key.
    const messageFresh = this.messageDedup.checkAndRegister(messageKey(event));
    const commandFresh = this.commandDedup.checkAndRegister(commandKey(event));

    if (!messageFresh || !commandFresh) {
      lifecycle.transition("DEDUP_REJECTED");
      this.counters.duplicates++;
      logger.info("Duplicate event ignored", { outcome: "duplicate", kind: event.kind, messageFresh, commandFresh });
      return {
        eventId: event.eventId,
        correlationId: logger.getCorrelationId(),
        state: "DEDUP_REJECTED",
        history: lifecycle.history,
      };
    }

    lifecycle.transition("DEDUP_ACCEPTED");
    this.counters.accepted++;
    this.counters.inFlight++;
    logger.info("Event accepted", { kind: event.kind, command: event.commandName });

    try {
      return await this.run(event, lifecycle, logger);
    } finally {
      this.counters.inFlight--;
    }
  }

  private async run(event: InboundEvent, lifecycle: Lifecycle, logger: EventLogger): Promise<LifecycleResult> {
    lifecycle.transition("THREAD_RESOLVING");
    logger.startStage("resolve");
    const thread = await this.resolveThread(event, logger);
    const destination = destinationFor(event, thread);
    lifecycle.transition("THREAD_READY");
    logger.info("Thread ready", {
      destination: destination.kind,
      threadId: thread?.id,
      resolveMs: logger.endStage("resolve"),
    });

    lifecycle.transition("PROCESSING");
    const indicator = createWorkingIndicator({ platform: this.platform, destination, logger });
    await indicator.show();

    let query = "";
    let payload: ResponsePayload;
    logger.startStage("process");
    try {
      query = this.extractQuery(event);
      payload = await this.collaborator(event, query);
    } catch (err) {
      await indicator.clear();
      return this.fail(event, lifecycle, logger, destination, query, err);
    }
    logger.info("Collaborator finished", { processMs: logger.endStage("process"), length: payload.text.length });

    lifecycle.transition("DELIVERING");
    logger.startStage("deliver");
    try {
      const delivered = await this.delivery.deliver(destination, payload, {
        onFirstChunkSettled: () => indicator.clear(),
        logger,
      });
      lifecycle.transition("DELIVERED");
      this.counters.delivered++;
      logger.info("Response delivered", {
        state: "DELIVERED",
        parts: delivered.chunkCount,
        degraded: delivered.degraded,
        deliverMs: logger.endStage("deliver"),
        totalMs: logger.getDuration(),
      });
      this.record({ event, query, response: payload.text, status: "delivered", destination }, logger);
      return {
        eventId: event.eventId,
        correlationId: logger.getCorrelationId(),
        state: "DELIVERED",
        destination,
        firstMessageId: delivered.first.id,
        history: lifecycle.history,
      };
    } catch (err) {
      await indicator.clear();
      return this.fail(event, lifecycle, logger, destination, query, err);
    }
  }

  private async resolveThread(event: InboundEvent, logger: EventLogger): Promise<ResolvedThread> {
    try {
      return await this.resolver.resolve(event, threadNameFor(event), logger);
    } catch (err) {
      logger.warn("Thread resolution threw, replying in channel", err);
      return null;
    }
  }

  private async fail(
    event: InboundEvent,
    lifecycle: Lifecycle,
    logger: EventLogger,
    destination: Destination,
    query: string,
    err: unknown,
  ): Promise<LifecycleResult> {
    lifecycle.transition("FAILED");
    this.counters.failed++;
    const classified = classifyPipelineError(err);
    logger.error(`Lifecycle failed during ${lifecycle.history[lifecycle.history.length - 2]}`, err, {
      state: "FAILED",
      errorType: classified.type,
    });

    try {
      await this.platform.sendMessage(destination, classified.userMessage);
    } catch (noticeErr) {
      logger.error("Failed to post failure notice", noticeErr);
    }

    this.record({ event, query, response: classified.errorMessage, status: "failed", destination }, logger);
    return {
      eventId: event.eventId,
      correlationId: logger.getCorrelationId(),
      state: "FAILED",
      destination,
      error: classified,
      history: lifecycle.history,
    };
  }

  private record(record: ExchangeRecord, logger: EventLogger): void {
    if (!this.recorder) return;
    void this.recorder.recordExchange(record).catch((err) => {
      logger.warn("Failed to record exchange", err);
    });
  }

  getStats(): CoordinatorStats {
    return {
      ...this.counters,
      caches: {
        messageDedup: this.messageDedup.size,
        commandDedup: this.commandDedup.size,
        threadResolution: this.threadCache.size,
      },
    };
  }
}
