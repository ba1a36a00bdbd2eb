/**
 * Logging
 *
 * Structured logging for device authorization. The core only ever sees the
 * {@link Logger} interface; the sink and its lifecycle belong to the caller.
 */

import pino from "pino";

/**
 * Log level.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

/**
 * Log level accepted from configuration, `none` disables logging.
 */
export type LogLevelSetting = LogLevel | "none";

/**
 * Log context fields.
 */
export interface LogContext {
  /** Flow step */
  step?: string;
  /** Local account under authentication */
  user?: string;
  /** Client ID (not secret) */
  clientId?: string;
  /** Requested scopes */
  scopes?: string;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Error code */
  errorCode?: string;
  /** Error kind */
  errorKind?: string;
  /** Additional fields */
  [key: string]: unknown;
}

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;

  /**
   * Create child logger with additional context.
   */
  child(context: LogContext): Logger;
}

/**
 * No-op logger implementation.
 */
export const noOpLogger: Logger = {
  trace(): void {},
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
  child(): Logger {
    return noOpLogger;
  },
};

const LOG_LEVEL_SETTINGS: readonly LogLevelSetting[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "none",
];

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Parse a log level setting, falling back to `info` for unknown values.
 */
export function parseLogLevel(value: string | undefined): LogLevelSetting {
  const normalized = value?.toLowerCase();
  return LOG_LEVEL_SETTINGS.find((level) => level === normalized) ?? "info";
}

/**
 * Log entry for in-memory logger.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
}

/**
 * In-memory logger for testing.
 *
 * Children share the parent's entry list.
 */
export class InMemoryLogger implements Logger {
  private logs: LogEntry[];
  private baseContext: LogContext;

  constructor(baseContext: LogContext = {}, sink: LogEntry[] = []) {
    this.baseContext = baseContext;
    this.logs = sink;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.logs.push({
      level,
      message,
      context: { ...this.baseContext, ...context },
      timestamp: new Date(),
    });
  }

  trace(message: string, context?: LogContext): void {
    this.log("trace", message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log("error", message, context);
  }

  child(context: LogContext): Logger {
    return new InMemoryLogger({ ...this.baseContext, ...context }, this.logs);
  }

  /**
   * Get all log entries.
   */
  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  /**
   * Get logs by level.
   */
  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.logs.filter((l) => l.level === level);
  }

  /**
   * Get log messages, optionally for one level.
   */
  getMessages(level?: LogLevel): string[] {
    return this.logs.filter((l) => level === undefined || l.level === level).map((l) => l.message);
  }

  /**
   * Get logs containing message.
   */
  getLogsContaining(substring: string): LogEntry[] {
    return this.logs.filter((l) => l.message.includes(substring));
  }

  /**
   * Clear all logs.
   */
  clear(): void {
    this.logs.length = 0;
  }
}

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private baseContext: LogContext;
  private minLevel: LogLevel;

  constructor(options?: { minLevel?: LogLevel; context?: LogContext }) {
    this.minLevel = options?.minLevel ?? "info";
    this.baseContext = options?.context ?? {};
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.minLevel];
  }

  private formatContext(context?: LogContext): string {
    const merged = { ...this.baseContext, ...context };
    const entries = Object.entries(merged).filter(([, v]) => v !== undefined);
    if (entries.length === 0) return "";
    return " " + JSON.stringify(Object.fromEntries(entries));
  }

  trace(message: string, context?: LogContext): void {
    if (this.shouldLog("trace")) {
      console.debug(`[TRACE] ${message}${this.formatContext(context)}`);
    }
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog("debug")) {
      console.debug(`[DEBUG] ${message}${this.formatContext(context)}`);
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog("info")) {
      console.info(`[INFO] ${message}${this.formatContext(context)}`);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog("warn")) {
      console.warn(`[WARN] ${message}${this.formatContext(context)}`);
    }
  }

  error(message: string, context?: LogContext): void {
    if (this.shouldLog("error")) {
      console.error(`[ERROR] ${message}${this.formatContext(context)}`);
    }
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger({
      minLevel: this.minLevel,
      context: { ...this.baseContext, ...context },
    });
  }
}

/**
 * Keys whose values never reach a log sink.
 */
export const REDACTED_LOG_PATHS = [
  "access_token",
  "*.access_token",
  "refresh_token",
  "*.refresh_token",
  "device_code",
  "*.device_code",
  "client_secret",
  "*.client_secret",
  "token",
  "*.token",
  "authorization",
  "*.authorization",
];

/**
 * Logger backed by pino.
 */
export class PinoLogger implements Logger {
  private logger: pino.Logger;

  constructor(logger: pino.Logger) {
    this.logger = logger;
  }

  trace(message: string, context?: LogContext): void {
    this.logger.trace(context ?? {}, message);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context ?? {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context ?? {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context ?? {}, message);
  }

  error(message: string, context?: LogContext): void {
    this.logger.error(context ?? {}, message);
  }

  child(context: LogContext): Logger {
    return new PinoLogger(this.logger.child(context));
  }
}

function toPinoLevel(level: LogLevelSetting): pino.LevelWithSilent {
  return level === "none" ? "silent" : level;
}

/**
 * Create a pino-backed logger writing to `destination`.
 */
export function createPinoLogger(options: {
  level: LogLevelSetting;
  destination: pino.DestinationStream;
  name?: string;
}): PinoLogger {
  const logger = pino(
    {
      name: options.name,
      level: toPinoLevel(options.level),
      redact: { paths: REDACTED_LOG_PATHS, censor: "[REDACTED]" },
    },
    options.destination
  );
  return new PinoLogger(logger);
}

/**
 * Create the file-backed logger used by the PAM entry point.
 */
export function createFileLogger(options: { path: string; level: LogLevelSetting }): PinoLogger {
  return createPinoLogger({
    name: "pam-oauth2-device",
    level: options.level,
    destination: pino.destination({ dest: options.path, sync: true, mkdir: true }),
  });
}

/**
 * Create in-memory logger for testing.
 */
export function createInMemoryLogger(context?: LogContext): InMemoryLogger {
  return new InMemoryLogger(context);
}

/**
 * Create console logger.
 */
export function createConsoleLogger(options?: {
  minLevel?: LogLevel;
  context?: LogContext;
}): ConsoleLogger {
  return new ConsoleLogger(options);
}
