import * as util from "util";

/**
 * Insights Logger
 * Human-readable lines with local timestamps, or JSON lines on stderr when
 * `structured` is enabled.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LoggerConfig {
  level: LogLevel;
  useColor: boolean;
  structured: boolean;
}

export type LogLevelName = "debug" | "info" | "warn" | "error";

/**
 * Maps a level name ("debug", "INFO", ...) to a {@link LogLevel}.
 * Returns undefined for anything else.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  switch (name.trim().toLowerCase()) {
    case "debug":
      return LogLevel.DEBUG;
    case "info":
      return LogLevel.INFO;
    case "warn":
      return LogLevel.WARN;
    case "error":
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

/**
 * Serializes log data, keeping Error messages and stacks and surviving
 * circular references.
 */
export function safeStringify(arg: unknown): string {
  if (typeof arg === "object" && arg !== null) {
    // JSON.stringify(new Error("x")) returns "{}"
    if (arg instanceof Error) {
      return util.inspect(arg, { depth: 2, breakLength: Infinity });
    }
    try {
      return JSON.stringify(arg, null, 2);
    } catch {
      return util.inspect(arg, { depth: 2, breakLength: Infinity });
    }
  }
  if (typeof arg === "string") {
    return arg;
  }
  return util.inspect(arg);
}

export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      useColor: config.useColor ?? true,
      structured: config.structured ?? false,
    };
  }

  /**
   * Get current timestamp in local time format
   */
  private getTimestamp(): string {
    const now = new Date();
    const year = now.getFullYear();
    const month = String(now.getMonth() + 1).padStart(2, "0");
    const day = String(now.getDate()).padStart(2, "0");
    const hours = String(now.getHours()).padStart(2, "0");
    const minutes = String(now.getMinutes()).padStart(2, "0");
    const seconds = String(now.getSeconds()).padStart(2, "0");
    const ms = String(now.getMilliseconds()).padStart(3, "0");

    return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}.${ms}`;
  }

  /**
   * Format log message with timestamp and level
   */
  private formatMessage(
    level: string,
    message: string,
    color?: string,
  ): string {
    const timestamp = this.getTimestamp();
    const levelStr = `[${level}]`.padEnd(8);

    if (this.config.useColor && color) {
      return `${color}${timestamp} ${levelStr}${message}\x1b[0m`;
    }

    return `${timestamp} ${levelStr}${message}`;
  }

  private formatData(data?: unknown): string {
    if (data === undefined) return "";
    if (typeof data === "object" && data !== null) {
      return "\n" + safeStringify(data);
    }
    return " " + safeStringify(data);
  }

  private emitStructured(
    level: LogLevelName,
    message: string,
    data?: unknown,
  ): void {
    process.stderr.write(
      JSON.stringify({
        level,
        message,
        ...(data === undefined ? {} : { data: safeStringify(data) }),
        timestamp: new Date().toISOString(),
      }) + "\n",
    );
  }

  debug(message: string, data?: unknown): void {
    if (this.config.level > LogLevel.DEBUG) return;
    if (this.config.structured) {
      this.emitStructured("debug", message, data);
      return;
    }
    console.log(
      this.formatMessage("DEBUG", message, "\x1b[36m") + this.formatData(data),
    );
  }

  info(message: string, data?: unknown): void {
    if (this.config.level > LogLevel.INFO) return;
    if (this.config.structured) {
      this.emitStructured("info", message, data);
      return;
    }
    console.log(
      this.formatMessage("INFO", message, "\x1b[32m") + this.formatData(data),
    );
  }

  warn(message: string, data?: unknown): void {
    if (this.config.level > LogLevel.WARN) return;
    if (this.config.structured) {
      this.emitStructured("warn", message, data);
      return;
    }
    console.warn(
      this.formatMessage("WARN", message, "\x1b[33m") + this.formatData(data),
    );
  }

  error(message: string, error?: unknown): void {
    if (this.config.level > LogLevel.ERROR) return;
    if (this.config.structured) {
      this.emitStructured("error", message, error);
      return;
    }
    const errorDetails =
      error instanceof Error ?
        `\n${error.stack || error.message}`
      : this.formatData(error);

    console.error(
      this.formatMessage("ERROR", message, "\x1b[31m") + errorDetails,
    );
  }

  /**
   * Create a scoped logger with a prefix
   */
  scope(prefix: string): ScopedLogger {
    return new ScopedLogger(this, prefix);
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }
}

/**
 * Scoped logger that adds a prefix to all messages
 */
export class ScopedLogger {
  constructor(
    private logger: Logger,
    private prefix: string,
  ) {}

  private addPrefix(message: string): string {
    return `[${this.prefix}] ${message}`;
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(this.addPrefix(message), data);
  }

  info(message: string, data?: unknown): void {
    this.logger.info(this.addPrefix(message), data);
  }

  warn(message: string, data?: unknown): void {
    this.logger.warn(this.addPrefix(message), data);
  }

  error(message: string, error?: unknown): void {
    this.logger.error(this.addPrefix(message), error);
  }

  scope(subPrefix: string): ScopedLogger {
    return new ScopedLogger(this.logger, `${this.prefix}:${subPrefix}`);
  }
}

const logger = new Logger();

const envLevel = parseLogLevel(process.env.INSIGHTS_LOG_LEVEL);
if (envLevel !== undefined) {
  logger.setLevel(envLevel);
} else if (process.env.DEBUG === "true" || process.env.DEBUG === "1") {
  logger.setLevel(LogLevel.DEBUG);
}

export { logger };
