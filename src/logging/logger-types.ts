/**
 * Types for structured logging
 */

/**
 * Log levels in order of severity
 */
export const CLogLevel = {
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
} as const;

export type TLogLevel = (typeof CLogLevel)[keyof typeof CLogLevel];

/**
 * Structured log entry
 */
export type LogEntry = {
  /** ISO timestamp of log entry */
  timestamp: string;
  /** Log level */
  level: TLogLevel;
  /** Short event name, e.g. `command.start` */
  event: string;
  /** Human readable message */
  message?: string;
  /** Duration in milliseconds */
  duration?: number;
  /** Error message */
  error?: string;
  /** Additional metadata (sensitive keys are redacted) */
  metadata?: Record<string, unknown>;
};

/**
 * Line writer used for console output
 */
export type ConsoleWriter = {
  log: (line: string) => void;
  warn: (line: string) => void;
  error: (line: string) => void;
};

/**
 * Configuration for Logger
 */
export type LoggerConfig = {
  /** Minimum log level to output (default: 'info') */
  logLevel?: TLogLevel;
  /** Path to log file (file output is off when unset) */
  logFile?: string;
  /** Enable console output (default: true) */
  consoleOutput?: boolean;
  /** Maximum log file size in bytes before rotation (default: 10MB) */
  maxFileSize?: number;
  /** Maximum number of rotated log files to keep (default: 5) */
  maxFiles?: number;
  /** Console writer implementation (defaults to process console) */
  consoleWriter?: ConsoleWriter;
};
