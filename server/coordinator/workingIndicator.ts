/**
 * Working Indicator
 *
 * The transient "processing" message posted while the collaborator chain
 * runs. Posting failures are logged and never fail the lifecycle; the
 * message is deleted at most once.
 */

import { USER_MESSAGES } from "../config/messages";
import type { EventLogger } from "../utils/logger";
import type { Destination, MessageHandle, PlatformAdapter } from "./types";

export interface WorkingIndicator {
  show(): Promise<void>;
  clear(): Promise<void>;
}

export interface WorkingIndicatorContext {
  platform: PlatformAdapter;
  destination: Destination;
  logger?: EventLogger;
  text?: string;
}

export function createWorkingIndicator(ctx: WorkingIndicatorContext): WorkingIndicator {
  let handle: MessageHandle | null = null;
  let cleared = false;

  const remove = async (posted: MessageHandle): Promise<void> => {
    try {
      await ctx.platform.deleteMessage(posted);
    } catch (err) {
      ctx.logger?.warn("Failed to delete working indicator", err, { messageId: posted.id });
    }
  };

  return {
    async show() {
      if (handle || cleared) {
        return;
      }
      let posted: MessageHandle;
      try {
        posted = await ctx.platform.sendMessage(ctx.destination, ctx.text ?? USER_MESSAGES.processing);
      } catch (err) {
        ctx.logger?.warn("Failed to post working indicator", err);
        return;
      }
      // clear() ran while the post was in flight
      if (cleared) {
        await remove(posted);
        return;
      }
      handle = posted;
    },

    async clear() {
      if (cleared) {
        return;
      }
      cleared = true;
      const current = handle;
      handle = null;
      if (current) {
        await remove(current);
      }
    },
  };
}
