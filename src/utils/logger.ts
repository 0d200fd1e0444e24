/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export type LogMeta = Record<string, unknown>;

const LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

// Spellings accepted from LOG_LEVEL, including the upper-case names
// operators are used to from other logging stacks
const LEVEL_ALIASES: Record<string, LogLevel> = {
  error: "error",
  critical: "error",
  fatal: "error",
  warn: "warn",
  warning: "warn",
  info: "info",
  debug: "debug",
};

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

export class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(config: LoggerConfig = { level: "info" }) {
    this.level = config.level;
    this.prefix = config.prefix || "Animalia";
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.level);
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
      // stderr, so the JSON summary on stdout stays pipeable
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

}

/**
 * Map a user-supplied level name onto a LogLevel, or undefined if unknown
 *
 * @example
 * parseLogLevel("WARNING"); // "warn"
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const key = value.trim().toLowerCase();
  return Object.hasOwn(LEVEL_ALIASES, key) ? LEVEL_ALIASES[key] : undefined;
}

// Default logger instance
export const logger = new Logger();

// Factory function for custom loggers
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
