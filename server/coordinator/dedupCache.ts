/**
 * Event Deduplication
 *
 * In-memory record of trigger keys already admitted. The platform redelivers
 * events with the same id, sometimes at different points of the pipeline,
 * so two granularities are tracked: (event, channel) and (event, author).
 *
 * Not persisted: a restart forgets every key.
 */

import { BoundedMap } from "./boundedCache";
import type { InboundEvent } from "./types";

export function messageKey(event: InboundEvent): string {
  return `${event.eventId}:${event.channelId}`;
}

export function commandKey(event: InboundEvent): string {
  return `${event.eventId}:${event.authorId}`;
}

export class DedupCache {
  private seen: BoundedMap<number>;

  constructor(readonly name: string, maxSize: number) {
    this.seen = new BoundedMap<number>(maxSize);
  }

  /**
   * Atomically check and register a key.
   *
   * @returns true if the key is new (proceed), false if already seen (abort)
   */
  checkAndRegister(key: string): boolean {
    return this.seen.setIfAbsent(key, Date.now()).inserted;
  }

  get size(): number {
    return this.seen.size;
  }
}
