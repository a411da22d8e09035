import { BoundedMap } from "./boundedCache";
import type { Thread } from "./types";

/**
 * Originating event id -> resolved thread. Once an event has a thread, every
 * later resolution for that event returns the same one.
 */
export class ThreadResolutionCache {
  private threads: BoundedMap<Thread>;

  constructor(maxSize: number) {
    this.threads = new BoundedMap<Thread>(maxSize);
  }

  resolve(eventId: string): Thread | undefined {
    return this.threads.get(eventId);
  }

  /**
   * First writer wins: if another path already registered a thread for this
   * event, that thread is kept and returned.
   */
  register(eventId: string, thread: Thread): Thread {
    return this.threads.setIfAbsent(eventId, thread).value;
  }

  get size(): number {
    return this.threads.size;
  }
}
