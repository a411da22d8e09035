/**
 * Coordinator Types
 *
 * The records passed between the platform adapter, the coordinator and the
 * collaborators. Platform-specific objects never cross this boundary.
 */

export type EventKind = "mention" | "slash-command" | "typed-command" | "thread-reply";

/** Commands that read the channel's stored messages over a window of hours. */
export type SummaryCommandName = "sum-day" | "sum-hr" | "chart-day" | "chart-hr";

export type SlashCommandName = "ask" | SummaryCommandName;

export function isSummaryCommand(name: SlashCommandName | undefined): name is SummaryCommandName {
  return name !== undefined && name !== "ask";
}

export function isChartCommand(name: SlashCommandName | undefined): name is "chart-day" | "chart-hr" {
  return name === "chart-day" || name === "chart-hr";
}

/**
 * One delivery of a user trigger. Redelivery reuses `eventId`.
 */
export interface InboundEvent {
  readonly eventId: string;
  readonly authorId: string;
  readonly authorName: string;
  readonly channelId: string;
  readonly channelName?: string;
  readonly guildId?: string;
  /** Set when the event was posted inside a thread. */
  readonly threadId?: string;
  readonly isAlreadyInThread: boolean;
  readonly hasAttachments: boolean;
  readonly kind: EventKind;
  readonly content: string;
  readonly commandName?: SlashCommandName;
  readonly commandOptions?: Readonly<Record<string, string | number>>;
  readonly receivedAt: Date;
}

export interface Thread {
  id: string;
  name?: string;
}

/** `null` means no thread: reply in the originating channel. */
export type ResolvedThread = Thread | null;

export type Destination =
  | { kind: "thread"; threadId: string }
  | { kind: "channel"; channelId: string };

export interface MessageHandle {
  id: string;
  channelId: string;
}

/**
 * A rendered image bound to the first chunk of a response. The bytes are
 * copied into a fresh buffer for every send attempt.
 */
export interface Visualization {
  filename: string;
  data: Uint8Array;
  description?: string;
}

export interface OutboundAttachment {
  filename: string;
  data: Buffer;
  description?: string;
}

export interface ResponsePayload {
  text: string;
  visualizations: Visualization[];
}

/**
 * Operations the coordinator needs from the chat platform. Every call may
 * reject with a PlatformError.
 */
export interface PlatformAdapter {
  sendMessage(destination: Destination, content: string, attachments?: OutboundAttachment[]): Promise<MessageHandle>;
  createThread(event: InboundEvent, name: string): Promise<Thread>;
  fetchExistingThread(event: InboundEvent): Promise<Thread | null>;
  deleteMessage(handle: MessageHandle): Promise<void>;
}

/**
 * The opaque collaborator chain: turn an event and its query into a response.
 */
export type Collaborator = (event: InboundEvent, query: string) => Promise<ResponsePayload>;

export type ExchangeStatus = "delivered" | "failed";

export interface ExchangeRecord {
  event: InboundEvent;
  query: string;
  response: string;
  status: ExchangeStatus;
  destination: Destination;
}

export interface ExchangeRecorder {
  recordExchange(record: ExchangeRecord): Promise<void>;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function destinationFor(event: InboundEvent, thread: ResolvedThread): Destination {
  if (thread) {
    return { kind: "thread", threadId: thread.id };
  }
  return { kind: "channel", channelId: event.channelId };
}

export function destinationId(destination: Destination): string {
  return destination.kind === "thread" ? destination.threadId : destination.channelId;
}
