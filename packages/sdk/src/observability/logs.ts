/**
 * Structured logging for table, query and index operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  table?: string;
  field?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Pick the starting level from FLATSTORE_DEBUG / FLATSTORE_LOG_LEVEL
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.FLATSTORE_DEBUG) {
    return "debug";
  }
  const requested = env.FLATSTORE_LOG_LEVEL?.toLowerCase();
  return LEVELS.find((level) => level === requested) ?? "warn";
}

export class Logger {
  #enabled = true;
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = levelFromEnv()) {
    this.#minLevel = minLevel;
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled || LEVELS.indexOf(level) < LEVELS.indexOf(this.#minLevel)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    // Format for console output
    const prefix = `[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`;
    const parts = [prefix];

    if (entry.table || entry.field) {
      parts.push(`${entry.table ?? ""}/${entry.field ?? ""}`);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    // Route to appropriate console method
    switch (level) {
      case "debug":
        console.debug(parts.join(" "));
        break;
      case "info":
        console.log(parts.join(" "));
        break;
      case "warn":
        console.warn(parts.join(" "));
        break;
      case "error":
        console.error(parts.join(" "));
        break;
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  get level(): LogLevel {
    return this.#minLevel;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
