/**
 * Structured Logger
 * =================
 * Consistent logging across the application
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LogContext {
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function parseLevel(raw: string | undefined): LogLevel | null {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "error" || v === "warn" || v === "info" || v === "debug" ? v : null;
}

function defaultLevel(): LogLevel {
  const fromEnv = parseLevel(process.env.LOG_LEVEL);
  if (fromEnv) {return fromEnv;}
  return process.env.NODE_ENV === "development" ? "debug" : "info";
}

type LevelState = { level: LogLevel };

export class Logger {
  private readonly state: LevelState;

  constructor(
    level: LogLevel | LevelState = defaultLevel(),
    private readonly bindings: LogContext = {}
  ) {
    this.state = typeof level === "string" ? { level } : level;
  }

  /**
   * Also applies to every child created from this logger.
   */
  setLevel(level: LogLevel) {
    this.state.level = level;
  }

  /**
   * Logger that adds `bindings` to every entry and shares this logger's level.
   */
  child(bindings: LogContext): Logger {
    return new Logger(this.state, { ...this.bindings, ...bindings });
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] <= LEVEL_RANK[this.state.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    context?: LogContext
  ): string {
    const timestamp = new Date().toISOString();
    const merged = { ...this.bindings, ...context };
    const contextStr = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : "";
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  info(message: string, context?: LogContext) {
    if (!this.enabled("info")) {return;}
    console.log(this.formatMessage("info", message, context));
  }

  warn(message: string, context?: LogContext) {
    if (!this.enabled("warn")) {return;}
    console.warn(this.formatMessage("warn", message, context));
  }

  error(message: string, error?: Error | LogContext) {
    if (!this.enabled("error")) {return;}
    if (error instanceof Error) {
      console.error(
        this.formatMessage("error", message, {
          error: error.message,
          stack: error.stack,
        })
      );
    } else {
      console.error(this.formatMessage("error", message, error));
    }
  }

  debug(message: string, context?: LogContext) {
    if (!this.enabled("debug")) {return;}
    console.log(this.formatMessage("debug", message, context));
  }
}

export const logger = new Logger();
