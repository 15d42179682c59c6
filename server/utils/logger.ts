import * as fs from "fs";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";

const LOG_DIR = path.join(process.cwd(), "logs");

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return "info";
  }
}

const CURRENT_LOG_LEVEL = parseLogLevel(process.env.LOG_LEVEL);
const WRITE_TO_FILE = process.env.NODE_ENV !== "test";

export interface LogMeta {
  correlationId?: string;
  chatId?: number;
  userId?: number;
  updateKind?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

let logDirReady = false;

function appendToLogFile(line: string): void {
  if (!logDirReady) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
    logDirReady = true;
  }
  const dateStr = new Date().toISOString().split("T")[0];
  fs.appendFileSync(path.join(LOG_DIR, `bot-${dateStr}.log`), line + "\n");
}

export function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[CURRENT_LOG_LEVEL]) return;

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta,
  };

  if (WRITE_TO_FILE) {
    try {
      appendToLogFile(JSON.stringify(logEntry));
    } catch (err) {
      console.error("[Logger] Failed to write to log file:", err);
    }
  }

  const correlationPrefix = meta?.correlationId ? `[${meta.correlationId}] ` : "";
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
  const line = `[${level.toUpperCase()}] ${correlationPrefix}${message}${metaStr}`;
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logInfo(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

/**
 * Per-update logger. Every line carries the same correlation id so one voice
 * memo can be followed from download to the final reply.
 */
export class RequestLogger {
  private correlationId: string;
  private startTime: number;
  private chatId?: number;
  private userId?: number;
  private updateKind?: string;

  constructor(chatId?: number, userId?: number, updateKind?: string) {
    this.correlationId = generateCorrelationId();
    this.startTime = Date.now();
    this.chatId = chatId;
    this.userId = userId;
    this.updateKind = updateKind;
  }

  private getMeta(extra?: Partial<LogMeta>): LogMeta {
    return {
      correlationId: this.correlationId,
      chatId: this.chatId,
      userId: this.userId,
      updateKind: this.updateKind,
      duration: Date.now() - this.startTime,
      ...extra,
    };
  }

  info(message: string, extra?: Partial<LogMeta>): void {
    log("info", message, this.getMeta(extra));
  }

  error(message: string, err?: unknown, extra?: Partial<LogMeta>): void {
    const errorMeta: Partial<LogMeta> = {};
    if (err instanceof Error) {
      errorMeta.error = err.message;
      errorMeta.stack = err.stack;
    } else if (err) {
      errorMeta.error = String(err);
    }
    log("error", message, this.getMeta({ ...errorMeta, ...extra }));
  }

  warn(message: string, extra?: Partial<LogMeta>): void {
    log("warn", message, this.getMeta(extra));
  }

  debug(message: string, extra?: Partial<LogMeta>): void {
    log("debug", message, this.getMeta(extra));
  }
}
