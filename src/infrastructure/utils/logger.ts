/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";

/**
 * Logging utility for the ecosystem backend.
 *
 * Features:
 * - Console output with colored levels
 * - Memory ring buffer with filtered queries
 * - Category-based logging for subsystem identification
 * - Turn context attached to every entry
 * - Throttling to prevent log spam
 * - Optional JSON Lines export on flush
 */

import { LogLevel, LogCategory } from "../../shared/constants/LogEnums";

/**
 * Log entry with category and turn context.
 */
export interface LogEntry {
  /** Sequential identifier for this log entry */
  id: number;
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** ISO timestamp */
  timestamp: string;
  /** Simulation turn when the log was created */
  turn: number;
  /** Additional structured data */
  data?: unknown;
}

/**
 * Filter options for log queries.
 */
export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  /** Text search in message */
  messageContains?: string;
  /** Maximum results, newest kept */
  limit?: number;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  /** Suppress console output; entries are still buffered */
  silent: boolean;
  maxMemoryLogs: number;
  throttleWindowMs: number;
  maxThrottleCount: number;
  /** Directory for JSON Lines output written by flush(); unset disables files */
  logDir?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function parseLevel(value: string | undefined): LogLevel {
  const match = Object.values(LogLevel).find((level) => level === value);
  return match ?? LogLevel.INFO;
}

function isLogCategory(value: unknown): value is LogCategory {
  return Object.values(LogCategory).some((category) => category === value);
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: parseLevel(process.env.LOG_LEVEL),
  silent: process.env.LOG_SILENT === "true",
  maxMemoryLogs: Number(process.env.LOG_MAX_MEMORY ?? 5000),
  throttleWindowMs: Number(process.env.LOG_THROTTLE_WINDOW_MS ?? 5000),
  maxThrottleCount: Number(process.env.LOG_MAX_THROTTLE_COUNT ?? 20),
  logDir: process.env.LOG_DIR ? path.resolve(process.env.LOG_DIR) : undefined,
};

/**
 * Logger class with memory buffering and analysis support.
 * Console: levels at or above minLevel, with colors
 * Memory: levels at or above minLevel, with full metadata
 * Files: appended as JSON Lines when flushed, if a log directory is set
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private pendingWrite: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private nextId = 1;
  private currentTurn = 0;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
  ): string {
    const timestamp = new Date().toISOString();
    const levelColors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: "\x1b[36m",
      [LogLevel.INFO]: "\x1b[32m",
      [LogLevel.WARN]: "\x1b[33m",
      [LogLevel.ERROR]: "\x1b[31m",
    };
    const reset = "\x1b[0m";
    return `${levelColors[level]}[${timestamp}] [${level.toUpperCase()}] [${category}] [turn ${this.currentTurn}]${reset} ${message}`;
  }

  private shouldThrottle(message: string): boolean {
    const now = Date.now();
    const key = message.substring(0, 100);
    const entry = this.throttleMap.get(key);

    if (!entry) {
      this.throttleMap.set(key, { count: 1, lastTime: now });
      return false;
    }

    if (now - entry.lastTime > this.config.throttleWindowMs) {
      entry.count = 1;
      entry.lastTime = now;
      return false;
    }

    entry.count++;
    return entry.count > this.config.maxThrottleCount;
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
      this.memoryBuffer.shift();
    }
    if (this.config.logDir) {
      this.pendingWrite.push(entry);
    }
  }

  /**
   * Set the current simulation turn for log context.
   */
  setTurn(turn: number): void {
    this.currentTurn = turn;
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Log with explicit category.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: unknown,
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.config.minLevel]) return;
    if (level !== LogLevel.ERROR && this.shouldThrottle(message)) return;

    const entry: LogEntry = {
      id: this.nextId++,
      level,
      category,
      message,
      timestamp: new Date().toISOString(),
      turn: this.currentTurn,
      data,
    };
    this.addToMemory(entry);

    if (this.config.silent) return;

    const consoleMsg = this.formatConsoleMessage(level, category, message);
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, data ?? "");
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, data ?? "");
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, data ?? "");
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, data ?? "");
        break;
    }
  }

  private dispatch(
    level: LogLevel,
    message: string,
    categoryOrData?: unknown,
    data?: unknown,
  ): void {
    if (isLogCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, data);
    } else {
      this.log(level, LogCategory.GENERAL, message, categoryOrData);
    }
  }

  debug(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.WARN, message, categoryOrData, data);
  }

  error(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.ERROR, message, categoryOrData, data);
  }

  /**
   * Query logs from memory buffer with filters.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, messageContains, limit } = filter;
    let results = [...this.memoryBuffer];

    if (levels?.length) {
      results = results.filter((e) => levels.includes(e.level));
    }
    if (categories?.length) {
      results = results.filter((e) => categories.includes(e.category));
    }
    if (messageContains) {
      const search = messageContains.toLowerCase();
      results = results.filter((e) => e.message.toLowerCase().includes(search));
    }
    if (limit) {
      results = results.slice(-limit);
    }

    return results;
  }

  /**
   * Appends buffered entries to the daily JSON Lines file.
   */
  async flush(): Promise<void> {
    const logDir = this.config.logDir;
    if (!logDir || this.pendingWrite.length === 0) return;

    const logsToWrite = this.pendingWrite;
    this.pendingWrite = [];
    const date = new Date().toISOString().split("T")[0];
    const filePath = path.join(logDir, `logs-${date}.jsonl`);

    try {
      await fs.promises.mkdir(logDir, { recursive: true });
      const lines = logsToWrite.map((log) => JSON.stringify(log)).join("\n");
      await fs.promises.appendFile(filePath, lines + "\n", "utf-8");
    } catch (error) {
      this.pendingWrite = [...logsToWrite, ...this.pendingWrite];
      console.error("Failed to write logs:", {
        error: error instanceof Error ? error.message : String(error),
        bufferSize: logsToWrite.length,
        filePath,
      });
    }
  }

  getBufferSize(): number {
    return this.memoryBuffer.length;
  }

  clear(): void {
    this.memoryBuffer = [];
    this.pendingWrite = [];
    this.throttleMap.clear();
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
