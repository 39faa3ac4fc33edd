/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(config: LoggerConfig = { level: "warn" }) {
    this.level = config.level;
    this.prefix = config.prefix || "tablelint";
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  private format(meta?: Record<string, unknown>): string {
    return meta ? ` ${JSON.stringify(meta)}` : "";
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog("error")) {
      process.stderr.write(`[${this.prefix}] ERROR: ${message}${this.format(meta)}\n`);
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog("warn")) {
      process.stderr.write(`[${this.prefix}] WARN: ${message}${this.format(meta)}\n`);
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog("info")) {
      // stderr only; stdout is left to the caller
      process.stderr.write(`[${this.prefix}] INFO: ${message}${this.format(meta)}\n`);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog("debug")) {
      process.stderr.write(`[${this.prefix}] DEBUG: ${message}${this.format(meta)}\n`);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "warn";
}

// Default logger instance
export const logger = new Logger({ level: initialLevel() });

// Factory function for custom loggers
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
