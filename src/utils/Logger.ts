import type { LogLevel } from '../types/index.js';

/**
 * Log entry with metadata.
 */
export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  timestamp: Date;
}

/**
 * Destination for formatted log entries.
 */
export type LogSink = (entry: LogEntry, formatted: string) => void;

/**
 * Line format: human-readable text or one JSON object per line.
 */
export type LogFormat = 'text' | 'json';

/**
 * Logger interface for the rendering pipeline.
 */
export interface ILogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(context: string): ILogger;
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  format?: LogFormat;
  sink?: LogSink;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Writes to stderr so stdout stays free for artifacts piped by callers.
 */
const stderrSink: LogSink = (_entry, formatted) => {
  process.stderr.write(`${formatted}\n`);
};

/**
 * Level-filtered logger with hierarchical contexts.
 */
export class Logger implements ILogger {
  private readonly level: LogLevel;
  private readonly context?: string;
  private readonly format: LogFormat;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'warn';
    this.context = options.context;
    this.format = options.format ?? 'text';
    this.sink = options.sink ?? stderrSink;
  }

  /**
   * Creates a child logger whose context is appended to this one's.
   */
  child(context: string): ILogger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      format: this.format,
      sink: this.sink,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogEntry['level'], message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.level]) {
      return;
    }

    const entry: LogEntry = { level, message, context: this.context, data, timestamp: new Date() };
    this.sink(entry, this.format === 'json' ? formatJson(entry) : formatText(entry));
  }
}

function formatText(entry: LogEntry): string {
  const prefix = entry.context ? ` [${entry.context}]` : '';
  const line = `${entry.timestamp.toISOString()} ${entry.level.toUpperCase().padEnd(5)}${prefix} ${entry.message}`;
  return entry.data ? `${line} ${JSON.stringify(entry.data)}` : line;
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    time: entry.timestamp.toISOString(),
    level: entry.level,
    context: entry.context,
    msg: entry.message,
    ...entry.data,
  });
}

/**
 * Creates a logger for the given level and optional context.
 * 'silent' drops every entry through the priority filter.
 */
export function createLogger(level: LogLevel = 'warn', context?: string, options: Omit<LoggerOptions, 'level' | 'context'> = {}): ILogger {
  return new Logger({ ...options, level, context });
}

/**
 * Converts an unknown thrown value into a log-friendly message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
