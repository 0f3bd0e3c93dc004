// =============================================================================
// Logger — Structured log records with a pluggable sink
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "critical";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  critical: 50,
};

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  /** Short machine-readable event name, e.g. `photopea:update-failed` */
  event: string;
  source: string;
  message: string;
  data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Name stamped on every record (default: "photopea") */
  source?: string;
  /** Custom sink (defaults to the console) */
  sink?: LogSink;
  /** Minimum level that reaches the sink (default: "info") */
  level?: LogLevel;
}

export interface Logger {
  debug(event: string, message: string, data?: Record<string, unknown>): void;
  info(event: string, message: string, data?: Record<string, unknown>): void;
  warn(event: string, message: string, data?: Record<string, unknown>): void;
  error(event: string, message: string, data?: Record<string, unknown>): void;
  critical(event: string, message: string, data?: Record<string, unknown>): void;
}

function consoleSink(entry: LogEntry): void {
  const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}] [${entry.source}]`;
  const line = `${prefix} ${entry.message}`;
  // eslint-disable-next-line no-console
  const write = LEVEL_ORDER[entry.level] >= LEVEL_ORDER.warn ? console.error : console.log;
  write(line, entry.data ?? "");
}

/** Flatten an unknown thrown value into log-friendly data */
export function errorData(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const data: Record<string, unknown> = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    if (error.cause !== undefined) data.cause = errorData(error.cause);
    return data;
  }
  return { message: String(error) };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const source = options.source ?? "photopea";
  const sink = options.sink ?? consoleSink;
  const threshold = LEVEL_ORDER[options.level ?? "info"];

  function emit(
    level: LogLevel,
    event: string,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_ORDER[level] < threshold) return;
    sink({ timestamp: Date.now(), level, event, source, message, data });
  }

  return {
    debug: (event, message, data) => emit("debug", event, message, data),
    info: (event, message, data) => emit("info", event, message, data),
    warn: (event, message, data) => emit("warn", event, message, data),
    error: (event, message, data) => emit("error", event, message, data),
    critical: (event, message, data) => emit("critical", event, message, data),
  };
}
