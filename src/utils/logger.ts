/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

export type LogMeta = Record<string, unknown>;

export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

export class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(config: LoggerConfig = { level: "info" }) {
    this.level = config.level;
    this.prefix = config.prefix || "SchemaMirror";
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  error(message: string, meta?: LogMeta): void {
    if (this.shouldLog("error")) {
      console.error(`[${this.prefix}] ERROR:`, message, meta || "");
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.shouldLog("warn")) {
      console.warn(`[${this.prefix}] WARN:`, message, meta || "");
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.shouldLog("info")) {
      // stderr keeps stdout free for the CLI's JSON summary
      process.stderr.write(
        `[${this.prefix}] INFO: ${message} ${meta ? JSON.stringify(meta) : ""}\n`,
      );
    }
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.shouldLog("debug")) {
      process.stderr.write(
        `[${this.prefix}] DEBUG: ${message} ${meta ? JSON.stringify(meta) : ""}\n`,
      );
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

// Default logger instance
export const logger = new Logger({ level: "warn" });

// Factory function for custom loggers
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
