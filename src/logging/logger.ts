/**
 * Structured JSON logging with optional file output and rotation
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  CLogLevel,
  type ConsoleWriter,
  type LogEntry,
  type LoggerConfig,
  type TLogLevel,
} from "./logger-types.js";

type ResolvedLoggerConfig = Required<Omit<LoggerConfig, "logFile">> & {
  logFile?: string;
};

const defaultConsoleWriter: ConsoleWriter = {
  log: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

const DEFAULT_CONFIG: ResolvedLoggerConfig = {
  logLevel: CLogLevel.INFO,
  consoleOutput: true,
  maxFileSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
  consoleWriter: defaultConsoleWriter,
};

/**
 * Log level priorities for filtering
 */
const LOG_LEVEL_PRIORITY: Record<TLogLevel, number> = {
  [CLogLevel.DEBUG]: 0,
  [CLogLevel.INFO]: 1,
  [CLogLevel.WARN]: 2,
  [CLogLevel.ERROR]: 3,
};

const SENSITIVE_KEY = /token|password|secret|authorization/i;

const REDACTED = "[REDACTED]";

/**
 * Replace values stored under credential-like keys, at any depth
 */
export function redact(
  metadata: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (SENSITIVE_KEY.test(key)) {
      result[key] = REDACTED;
    } else if (isPlainObject(value)) {
      result[key] = redact(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Structured logger writing one JSON object per line.
 *
 * Features:
 * - Configurable minimum level
 * - Console output through a replaceable writer
 * - File output with size-based rotation
 * - Redaction of credential-like metadata keys
 *
 * @example
 * ```ts
 * const logger = new Logger({ logLevel: 'debug' });
 *
 * logger.info('backport.start', 'Backporting PR #42');
 * logger.timing('backport.done', 'Opened PR #57', 1250);
 * ```
 */
export class Logger {
  private readonly config: ResolvedLoggerConfig;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
    };

    if (this.config.logFile) {
      this.ensureLogDirectory(this.config.logFile);
    }
  }

  debug(
    event: string,
    message?: string,
    metadata?: Record<string, unknown>,
  ): void {
    this.log({ level: CLogLevel.DEBUG, event, message, metadata });
  }

  info(
    event: string,
    message: string,
    metadata?: Record<string, unknown>,
  ): void {
    this.log({ level: CLogLevel.INFO, event, message, metadata });
  }

  /**
   * Log an info entry with a duration in milliseconds
   */
  timing(
    event: string,
    message: string,
    duration: number,
    metadata?: Record<string, unknown>,
  ): void {
    this.log({ level: CLogLevel.INFO, event, message, duration, metadata });
  }

  warn(
    event: string,
    message: string,
    metadata?: Record<string, unknown>,
  ): void {
    this.log({ level: CLogLevel.WARN, event, message, metadata });
  }

  error(
    event: string,
    error: Error | string,
    metadata?: Record<string, unknown>,
  ): void {
    this.log({
      level: CLogLevel.ERROR,
      event,
      error: error instanceof Error ? error.message : error,
      metadata,
    });
  }

  /**
   * Core logging method - writes structured log entry
   */
  private log(entry: Omit<LogEntry, "timestamp">): void {
    if (
      LOG_LEVEL_PRIORITY[entry.level] < LOG_LEVEL_PRIORITY[this.config.logLevel]
    ) {
      return;
    }

    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      ...entry,
      metadata: entry.metadata ? redact(entry.metadata) : undefined,
    };

    if (this.config.consoleOutput) {
      this.writeToConsole(logEntry);
    }

    if (this.config.logFile) {
      this.writeToFile(this.config.logFile, logEntry);
    }
  }

  private writeToConsole(entry: LogEntry): void {
    const logLine = JSON.stringify(entry);
    const writer = this.config.consoleWriter;

    switch (entry.level) {
      case CLogLevel.ERROR:
        writer.error(logLine);
        break;
      case CLogLevel.WARN:
        writer.warn(logLine);
        break;
      default:
        writer.log(logLine);
        break;
    }
  }

  private writeToFile(logFile: string, entry: LogEntry): void {
    try {
      const logLine = `${JSON.stringify(entry)}\n`;

      if (this.shouldRotate(logFile)) {
        this.rotateLogFile(logFile);
      }

      fs.appendFileSync(logFile, logLine, "utf-8");
    } catch (error) {
      // Never throw from logging
      this.config.consoleWriter.error(
        `Failed to write to log file: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private shouldRotate(logFile: string): boolean {
    try {
      if (!fs.existsSync(logFile)) {
        return false;
      }

      const stats = fs.statSync(logFile);
      return stats.size >= this.config.maxFileSize;
    } catch {
      return false;
    }
  }

  /**
   * Rotate log file - move current to .1, .1 to .2, etc.
   */
  private rotateLogFile(logFile: string): void {
    try {
      const oldestLog = `${logFile}.${this.config.maxFiles}`;
      if (fs.existsSync(oldestLog)) {
        fs.unlinkSync(oldestLog);
      }

      for (let i = this.config.maxFiles - 1; i >= 1; i--) {
        const currentLog = `${logFile}.${i}`;
        const nextLog = `${logFile}.${i + 1}`;

        if (fs.existsSync(currentLog)) {
          fs.renameSync(currentLog, nextLog);
        }
      }

      if (fs.existsSync(logFile)) {
        fs.renameSync(logFile, `${logFile}.1`);
      }
    } catch (error) {
      this.config.consoleWriter.error(
        `Failed to rotate log file: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private ensureLogDirectory(logFile: string): void {
    try {
      const logDir = path.dirname(logFile);
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
    } catch (error) {
      this.config.consoleWriter.error(
        `Failed to create log directory: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}

/**
 * Logger that drops every entry
 */
export function createSilentLogger(): Logger {
  return new Logger({ consoleOutput: false });
}
