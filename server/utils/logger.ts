import * as fs from "fs";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";

const LOG_DIR = path.join(process.cwd(), "logs");

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = typeof LOG_LEVEL_NAMES[number];

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVEL_NAMES.some(level => level === value);
}

export interface LoggerSettings {
  level: LogLevel;
  toFile: boolean;
}

// Set once at startup from the validated runtime config; until then the raw
// environment is read on every call.
let settings: LoggerSettings | undefined;

export function configureLogger(next: LoggerSettings | undefined): void {
  settings = next;
}

function currentLogLevel(): LogLevel {
  if (settings) return settings.level;
  const configured = process.env.LOG_LEVEL;
  return isLogLevel(configured) ? configured : "info";
}

function fileLoggingEnabled(): boolean {
  if (settings) return settings.toFile;
  return process.env.LOG_TO_FILE === "true";
}

export interface LogMeta {
  correlationId?: string;
  sessionId?: string;
  userId?: string;
  node?: string;
  intent?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

function appendToLogFile(entry: Record<string, unknown>): void {
  const dateStr = new Date().toISOString().split("T")[0];
  const logFile = path.join(LOG_DIR, `turns-${dateStr}.log`);

  try {
    if (!fs.existsSync(LOG_DIR)) {
      fs.mkdirSync(LOG_DIR, { recursive: true });
    }
    fs.appendFileSync(logFile, JSON.stringify(entry) + "\n");
  } catch (err) {
    console.error("[Logger] Failed to write to log file:", err);
  }
}

export function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLogLevel()]) return;

  if (fileLoggingEnabled()) {
    appendToLogFile({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...meta,
    });
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

export function logDebug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

/**
 * Per-turn logger. Every line carries the turn's correlation id and session,
 * and stage timings are tracked per graph node.
 */
export class TurnLogger {
  private correlationId: string;
  private startTime: number;
  private sessionId: string;
  private userId?: string;
  private stages: Map<string, number> = new Map();

  constructor(sessionId: string, userId?: string) {
    this.correlationId = generateCorrelationId();
    this.startTime = Date.now();
    this.sessionId = sessionId;
    this.userId = userId;
  }

  private getMeta(extra?: Partial<LogMeta>): LogMeta {
    return {
      correlationId: this.correlationId,
      sessionId: this.sessionId,
      userId: this.userId,
      duration: Date.now() - this.startTime,
      ...extra,
    };
  }

  startStage(name: string): void {
    this.stages.set(name, Date.now());
  }

  endStage(name: string): number {
    const start = this.stages.get(name);
    if (!start) return 0;
    const duration = Date.now() - start;
    this.stages.delete(name);
    return duration;
  }

  info(message: string, extra?: Partial<LogMeta>): void {
    logInfo(message, this.getMeta(extra));
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
    logWarn(message, this.getMeta(extra));
  }

  debug(message: string, extra?: Partial<LogMeta>): void {
    logDebug(message, this.getMeta(extra));
  }

  getCorrelationId(): string {
    return this.correlationId;
  }
}
