import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
const LOG_DIR = path.join(process.cwd(), 'logs');

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

function currentLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL;
  return isLogLevel(level) ? level : 'info';
}

function fileLoggingEnabled(): boolean {
  return process.env.NODE_ENV !== 'test' && process.env.LOG_TO_FILE !== 'false';
}

export interface LogMeta {
  correlationId?: string;
  eventId?: string;
  channelId?: string;
  authorId?: string;
  state?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

export function logToFile(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLogLevel()]) return;

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta
  };

  if (fileLoggingEnabled()) {
    const dateStr = new Date().toISOString().split('T')[0];
    const logFile = path.join(LOG_DIR, `bot-${dateStr}.log`);
    try {
      if (!fs.existsSync(LOG_DIR)) {
        fs.mkdirSync(LOG_DIR, { recursive: true });
      }
      fs.appendFileSync(logFile, JSON.stringify(logEntry) + '\n');
    } catch (err) {
      console.error('[Logger] Failed to write to log file:', err);
    }
  }

  const correlationPrefix = meta?.correlationId ? `[${meta.correlationId}] ` : '';
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  const line = `[${level.toUpperCase()}] ${correlationPrefix}${message}${metaStr}`;
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logInfo(message: string, meta?: LogMeta): void {
  logToFile('info', message, meta);
}

export function logError(message: string, meta?: LogMeta): void {
  logToFile('error', message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  logToFile('warn', message, meta);
}

export function logDebug(message: string, meta?: LogMeta): void {
  logToFile('debug', message, meta);
}

function errorToMeta(err: unknown): Partial<LogMeta> {
  if (err instanceof Error) {
    return { error: err.message, stack: err.stack };
  }
  if (err !== undefined && err !== null) {
    return { error: String(err) };
  }
  return {};
}

/**
 * Logger bound to one inbound event's lifecycle. Every entry carries the
 * same correlation id plus the event, channel and author ids.
 */
export class EventLogger {
  private correlationId: string;
  private startTime: number;
  private eventId: string;
  private channelId?: string;
  private authorId?: string;
  private stages: Map<string, number> = new Map();

  constructor(eventId: string, channelId?: string, authorId?: string) {
    this.correlationId = generateCorrelationId();
    this.startTime = Date.now();
    this.eventId = eventId;
    this.channelId = channelId;
    this.authorId = authorId;
  }

  private getMeta(extra?: Partial<LogMeta>): LogMeta {
    return {
      correlationId: this.correlationId,
      eventId: this.eventId,
      channelId: this.channelId,
      authorId: this.authorId,
      duration: Date.now() - this.startTime,
      ...extra
    };
  }

  startStage(name: string): void {
    this.stages.set(name, Date.now());
  }

  endStage(name: string): number {
    const start = this.stages.get(name);
    if (start === undefined) return 0;
    const duration = Date.now() - start;
    this.stages.delete(name);
    return duration;
  }

  info(message: string, extra?: Partial<LogMeta>): void {
    logInfo(message, this.getMeta(extra));
  }

  error(message: string, err?: unknown, extra?: Partial<LogMeta>): void {
    logError(message, this.getMeta({ ...errorToMeta(err), ...extra }));
  }

  warn(message: string, err?: unknown, extra?: Partial<LogMeta>): void {
    logWarn(message, this.getMeta({ ...errorToMeta(err), ...extra }));
  }

  debug(message: string, extra?: Partial<LogMeta>): void {
    logDebug(message, this.getMeta(extra));
  }

  getCorrelationId(): string {
    return this.correlationId;
  }

  getDuration(): number {
    return Date.now() - this.startTime;
  }
}
