// Centralized logging
export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = "info";

/**
 * Set the minimum level written by every logger.
 * Called once at startup from the loaded config.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (cause: ${error.cause.message})` : "";
    return `${error.name}: ${error.message}${cause}`;
  }
  return String(error);
}

export class Logger {
  constructor(private readonly scope: string) {}

  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log("warn", message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const details = error === undefined ? context : { ...context, error: describeError(error) };
    this.log("error", message, details);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${this.scope}: ${message}`;
    const consoleMethod = level === "debug" ? "log" : level;
    if (context && Object.keys(context).length > 0) {
      console[consoleMethod](line, JSON.stringify(context));
    } else {
      console[consoleMethod](line);
    }
  }
}

export const logger = new Logger("roster");
