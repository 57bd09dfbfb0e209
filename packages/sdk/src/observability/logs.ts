/**
 * Structured logging for store operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  path?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry, line: string) => void;

function consoleSink(entry: LogEntry, line: string): void {
  // Route to appropriate console method
  switch (entry.level) {
    case "debug":
      if (process.env.DEALBOOK_DEBUG) {
        console.debug(line);
      }
      break;
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

class Logger {
  #enabled = true;
  #sink: LogSink = consoleSink;

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    if (!this.#enabled) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    // Format for console output
    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.path) {
      parts.push(entry.path);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    this.#sink(entry, parts.join(" "));
  }

  debug(event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  /**
   * Replace the output sink; pass nothing to restore console output
   */
  setSink(sink?: LogSink): void {
    this.#sink = sink ?? consoleSink;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
