// Centralized logging service for infra-drift

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

/**
 * Receives each formatted log line. Defaults to stderr so that
 * stdout carries nothing but rendered reports.
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  sink?: LogSink;
}

const stderrSink: LogSink = (level, line) => {
  if (level >= LogLevel.WARN) {
    console.error(line);
  } else {
    process.stderr.write(`${line}\n`);
  }
};

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: '[drift]',
  timestamps: false,
  sink: stderrSink
};

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

/**
 * Parses a level name such as "debug" or "WARN".
 * Unknown names fall back to INFO.
 */
export function parseLogLevel(name: string | undefined): LogLevel {
  if (!name) return LogLevel.INFO;
  return LEVEL_NAMES[name.trim().toLowerCase()] ?? LogLevel.INFO;
}

/**
 * Centralized logger with structured output
 */
export class Logger {
  private config: LoggerConfig;
  private readonly parent: Logger | null;

  constructor(config: Partial<LoggerConfig> = {}, parent: Logger | null = null) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.parent = parent;
  }

  /**
   * Set log level
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  /**
   * Derive a logger with a longer prefix that shares level and sink
   */
  child(scope: string): Logger {
    return new Logger({ ...this.config, prefix: `${this.config.prefix ?? ''}[${scope}]` }, this);
  }

  /**
   * Format a log message
   */
  private format(level: string, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }

    parts.push(`[${level}]`);
    parts.push(message);

    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }

    return parts.join(' ');
  }

  private enabled(level: LogLevel): boolean {
    if (this.parent) return this.parent.enabled(level);
    return this.config.level <= level;
  }

  private emit(level: LogLevel, line: string): void {
    if (this.parent) {
      this.parent.emit(level, line);
      return;
    }
    (this.config.sink ?? stderrSink)(level, line);
  }

  /**
   * Log a debug message
   */
  debug(message: string, context?: Record<string, unknown>): void {
    if (this.enabled(LogLevel.DEBUG)) {
      this.emit(LogLevel.DEBUG, this.format('DEBUG', message, context));
    }
  }

  /**
   * Log an info message
   */
  info(message: string, context?: Record<string, unknown>): void {
    if (this.enabled(LogLevel.INFO)) {
      this.emit(LogLevel.INFO, this.format('INFO', message, context));
    }
  }

  /**
   * Log a warning message
   */
  warn(message: string, context?: Record<string, unknown>): void {
    if (this.enabled(LogLevel.WARN)) {
      this.emit(LogLevel.WARN, this.format('WARN', message, context));
    }
  }

  /**
   * Log an error message
   */
  error(message: string, context?: Record<string, unknown>): void {
    if (this.enabled(LogLevel.ERROR)) {
      this.emit(LogLevel.ERROR, this.format('ERROR', message, context));
    }
  }

  /**
   * Log an error message for a caught error; its stack is appended at debug level
   */
  exception(message: string, error: Error, context?: Record<string, unknown>): void {
    if (!this.enabled(LogLevel.ERROR)) return;
    const errorContext = this.enabled(LogLevel.DEBUG) ? { ...context, name: error.name, stack: error.stack } : context;
    this.emit(LogLevel.ERROR, this.format('ERROR', message, errorContext));
  }
}

// Shared instance, reconfigured by the CLI at startup
export const logger = new Logger();
