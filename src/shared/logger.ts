// src/shared/logger.ts — Structured component logger
//
// Writes one JSON object per line through console, filtered by level.
// Components take a Logger and derive children for sub-components.

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

/** Structured log entry shape */
export interface LogEntry {
  timestamp: string
  level: LogLevel
  component: string
  message: string
  [key: string]: unknown
}

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void
  info(message: string, metadata?: Record<string, unknown>): void
  warn(message: string, metadata?: Record<string, unknown>): void
  /** Log an error; `error` is flattened to its message and name */
  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void
  child(component: string): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  /** Receives each serialized line. Defaults to console.log / console.error by level. */
  sink?: (line: string, level: LogLevel) => void
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

export function parseLogLevel(value: string | undefined): LogLevel {
  const v = (value ?? "info").trim().toLowerCase()
  for (const level of LOG_LEVELS) {
    if (level === v) return level
  }
  return "info"
}

// ---------------------------------------------------------------------------
// Default Implementation
// ---------------------------------------------------------------------------

function consoleSink(line: string, level: LogLevel): void {
  if (level === "warn" || level === "error") {
    console.error(line)
  } else {
    console.log(line)
  }
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly component: string,
    private readonly level: LogLevel,
    private readonly sink: (line: string, level: LogLevel) => void,
  ) {}

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.write("debug", message, metadata)
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.write("info", message, metadata)
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.write("warn", message, metadata)
  }

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    const errorFields = error === undefined
      ? {}
      : {
          error: error instanceof Error ? error.message : String(error),
          ...(error instanceof Error ? { error_name: error.name } : {}),
        }
    this.write("error", message, { ...errorFields, ...(metadata ?? {}) })
  }

  child(component: string): Logger {
    return new ConsoleLogger(`${this.component}.${component}`, this.level, this.sink)
  }

  private write(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      ...(metadata ?? {}),
    }
    this.sink(JSON.stringify(entry), level)
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createLogger(component: string, opts: LoggerOptions = {}): Logger {
  return new ConsoleLogger(component, opts.level ?? "info", opts.sink ?? consoleSink)
}

/** Logger that drops everything. Used where a caller passes none. */
export function createSilentLogger(): Logger {
  return createLogger("silent", { sink: () => {} })
}
