/**
 * Structured logging for index build and fetch operations
 *
 * Lines go to a sink, stderr by default; stdout is left to command output.
 * Debug lines are written only while SERIESINDEX_DEBUG is set.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  table?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogSink = (line: string, entry: LogEntry) => void;

/**
 * `[timestamp] [LEVEL] [event] table=… message {details}`
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];
  if (entry.table) parts.push(`table=${entry.table}`);
  if (entry.message) parts.push(entry.message);
  if (entry.details) parts.push(JSON.stringify(entry.details));
  return parts.join(" ");
}

const consoleSink: LogSink = (line, entry) => {
  if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.error(line);
  }
};

class Logger {
  #enabled = true;
  #sink: LogSink = consoleSink;

  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.SERIESINDEX_DEBUG) return;

    const entry: LogEntry = {
      ...data,
      timestamp: data?.timestamp ?? new Date().toISOString(),
      level,
      event,
    };
    this.#sink(formatLogEntry(entry), entry);
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

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  /**
   * Route lines somewhere else; no argument restores the console
   */
  setSink(sink?: LogSink): void {
    this.#sink = sink ?? consoleSink;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
