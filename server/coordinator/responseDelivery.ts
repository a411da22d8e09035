/**
 * Response Delivery
 *
 * Sends a collaborator payload to its destination:
 * - splits text over the platform limit into headed parts
 * - binds visualizations to the first part only
 * - retries transient failures of the first part with exponential backoff
 * - resends the first part text-only when attachments keep failing
 *
 * Later parts are plain text and are sent once each.
 */

import { DELIVERY_CONSTANTS } from "../config/constants";
import { DeliveryError, PlatformError, getErrorMessage } from "../utils/errorHandler";
import type { EventLogger } from "../utils/logger";
import { splitMessage, withPartHeaders } from "./messageSplitter";
import {
  defaultSleep,
  type Destination,
  type MessageHandle,
  type OutboundAttachment,
  type PlatformAdapter,
  type ResponsePayload,
  type Sleep,
  type Visualization,
} from "./types";

export interface ResponseDeliveryOptions {
  messageLimit?: number;
  chunkSize?: number;
  maxAttempts?: number;
  baseBackoffMs?: number;
  sleep?: Sleep;
}

export interface DeliveryHooks {
  /** Runs once the first part is delivered or has definitively failed. */
  onFirstChunkSettled?: () => Promise<void>;
  logger?: EventLogger;
}

export interface DeliveryResult {
  first: MessageHandle;
  handles: MessageHandle[];
  chunkCount: number;
  /** True when the first part went out without its attachments. */
  degraded: boolean;
  attempts: number;
}

interface FirstChunkOutcome {
  handle: MessageHandle;
  degraded: boolean;
  attempts: number;
}

function toPlatformError(err: unknown): PlatformError {
  if (err instanceof PlatformError) {
    return err;
  }
  return new PlatformError("other", getErrorMessage(err));
}

/**
 * Attachments are rebuilt from the source bytes for every attempt: a failed
 * upload may have consumed the previous buffers.
 */
export function buildAttachments(visualizations: Visualization[]): OutboundAttachment[] {
  return visualizations.map((v) => ({
    filename: v.filename,
    data: Buffer.from(v.data),
    description: v.description,
  }));
}

export class ResponseDelivery {
  private platform: PlatformAdapter;
  private messageLimit: number;
  private chunkSize: number;
  private maxAttempts: number;
  private baseBackoffMs: number;
  private sleep: Sleep;

  constructor(platform: PlatformAdapter, options: ResponseDeliveryOptions = {}) {
    this.platform = platform;
    this.messageLimit = options.messageLimit ?? DELIVERY_CONSTANTS.MESSAGE_LIMIT;
    this.chunkSize = options.chunkSize ?? DELIVERY_CONSTANTS.CHUNK_SIZE;
    this.maxAttempts = options.maxAttempts ?? DELIVERY_CONSTANTS.MAX_ATTEMPTS;
    this.baseBackoffMs = options.baseBackoffMs ?? DELIVERY_CONSTANTS.BASE_BACKOFF_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  buildChunks(text: string): string[] {
    if (text.length <= this.messageLimit) {
      return [text];
    }
    return withPartHeaders(splitMessage(text, this.chunkSize));
  }

  async deliver(destination: Destination, payload: ResponsePayload, hooks: DeliveryHooks = {}): Promise<DeliveryResult> {
    const chunks = this.buildChunks(payload.text);
    const logger = hooks.logger;

    let outcome: FirstChunkOutcome;
    try {
      outcome = await this.sendFirstChunk(destination, chunks[0], payload.visualizations, logger);
    } finally {
      await hooks.onFirstChunkSettled?.();
    }

    const handles: MessageHandle[] = [outcome.handle];
    for (let i = 1; i < chunks.length; i++) {
      try {
        handles.push(await this.platform.sendMessage(destination, chunks[i]));
      } catch (err) {
        const lastError = toPlatformError(err);
        logger?.error(`Failed to send part ${i + 1}/${chunks.length}`, lastError);
        throw new DeliveryError(lastError, 1);
      }
    }

    if (chunks.length > 1) {
      logger?.info("Delivered response in parts", { parts: chunks.length });
    }

    return {
      first: outcome.handle,
      handles,
      chunkCount: chunks.length,
      degraded: outcome.degraded,
      attempts: outcome.attempts,
    };
  }

  private backoffMs(attempt: number): number {
    return this.baseBackoffMs * 2 ** (attempt - 1);
  }

  private async sendFirstChunk(
    destination: Destination,
    content: string,
    visualizations: Visualization[],
    logger?: EventLogger,
  ): Promise<FirstChunkOutcome> {
    const withAttachments = visualizations.length > 0;
    let lastError = new PlatformError("other", "No delivery attempt was made");
    let attempts = 0;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      attempts = attempt;
      try {
        const attachments = withAttachments ? buildAttachments(visualizations) : undefined;
        const handle = await this.platform.sendMessage(destination, content, attachments);
        if (attempt > 1) {
          logger?.info("First part delivered after retry", { attempt });
        }
        return { handle, degraded: false, attempts };
      } catch (err) {
        lastError = toPlatformError(err);
        if (lastError.kind !== "transient") {
          logger?.warn("First part rejected, not retrying", lastError, { attempt, kind: lastError.kind });
          break;
        }
        logger?.warn(`Transient delivery failure (attempt ${attempt}/${this.maxAttempts})`, lastError);
        if (attempt < this.maxAttempts) {
          await this.sleep(this.backoffMs(attempt));
        }
      }
    }

    const degradable = lastError.kind === "transient" || lastError.kind === "too-large";
    if (!withAttachments || !degradable) {
      throw new DeliveryError(lastError, attempts);
    }

    if (lastError.kind === "transient") {
      await this.sleep(this.backoffMs(this.maxAttempts));
    }
    attempts++;
    logger?.warn("Resending first part without attachments", undefined, { dropped: visualizations.length });

    try {
      const handle = await this.platform.sendMessage(destination, content);
      return { handle, degraded: true, attempts };
    } catch (err) {
      throw new DeliveryError(toPlatformError(err), attempts);
    }
  }
}
