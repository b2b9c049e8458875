/**
 * Levelled console logger with a bounded in-memory history.
 *
 * The threshold comes from `LOG_LEVEL` (see `loadConfig`); entries below it are
 * still kept in history so tests and hosts can inspect what the engine did.
 */

import { LOG_LEVELS, type LogLevel, loadConfig } from "./config";

export interface LogEntry {
  level: LogLevel;
  message: string;
  data?: unknown;
  timestamp: string;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function initialLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  const known = LOG_LEVELS.find((l) => l === raw);
  if (known) return known;
  return process.env.NODE_ENV === "development" ? "debug" : "warn";
}

export class Logger {
  private level: LogLevel;
  private logHistory: LogEntry[] = [];
  private readonly maxHistorySize: number;

  constructor(level: LogLevel = initialLevel(), maxHistorySize = 100) {
    this.level = level;
    this.maxHistorySize = maxHistorySize;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = {
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    };

    this.logHistory.push(entry);
    if (this.logHistory.length > this.maxHistorySize) {
      this.logHistory.shift();
    }

    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
      return;
    }

    const logMessage = `[${level.toUpperCase()}] ${message}`;
    const extra = data === undefined ? "" : data;

    switch (level) {
      case "debug":
        console.debug(logMessage, extra);
        break;
      case "info":
        console.log(logMessage, extra);
        break;
      case "warn":
        console.warn(logMessage, extra);
        break;
      case "error":
        console.error(logMessage, extra);
        break;
    }
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown): void {
    const errorData = error instanceof Error
      ? { name: error.name, message: error.message, stack: error.stack }
      : error;
    this.log("error", message, errorData);
  }

  /**
   * Recent entries, optionally filtered by level.
   */
  getHistory(level?: LogLevel): LogEntry[] {
    if (level) {
      return this.logHistory.filter((entry) => entry.level === level);
    }
    return [...this.logHistory];
  }

  clearHistory(): void {
    this.logHistory = [];
  }
}

export const logger = new Logger();

/**
 * Applies a loaded config to the shared logger.
 */
export function configureLogger(config = loadConfig()): Logger {
  logger.setLevel(config.logLevel);
  return logger;
}
