// =============================================================================
// Logging — Structured heap event entries with an injectable sink
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: string;
  data?: Record<string, unknown>;
}

export type Logger = (entry: LogEntry) => void;

export interface ConsoleLoggerOptions {
  /** Entries below this level are dropped (default: "info") */
  minLevel?: LogLevel;
  /** Output sink (defaults to console.log) */
  write?: (line: string, data: Record<string, unknown> | "") => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Heaps are silent unless a logger is supplied. */
export const noopLogger: Logger = () => {};

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minRank = LEVEL_RANK[options.minLevel ?? "info"];
  const write = options.write ?? ((line: string, data: Record<string, unknown> | "") => {
    // eslint-disable-next-line no-console
    console.log(line, data);
  });

  return (entry: LogEntry) => {
    if (LEVEL_RANK[entry.level] < minRank) return;
    const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}]`;
    write(`${prefix} ${entry.event}`, entry.data ?? "");
  };
}

/** Delivers an entry; a throwing sink never reaches the heap operation that logged. */
export function emit(
  logger: Logger,
  level: LogLevel,
  event: string,
  data?: Record<string, unknown>,
): void {
  try {
    logger({ timestamp: Date.now(), level, event, data });
  } catch {
    // ignore sink failures
  }
}
