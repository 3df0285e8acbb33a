/**
 * Recipe RAG Logger
 *
 * Structured JSON logging for the retrieval pipeline, the ingestion job and
 * the evaluation harness.
 *
 * Features:
 * - One JSON line per entry, prefixed with the logger scope
 * - Minimum level filtering
 * - Sensitive data masking
 */

// =============================================================================
// TYPES
// =============================================================================

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR"

export type LogMetadata = Record<string, unknown>

/**
 * Structured log entry
 */
export interface LogEntry {
  timestamp: string
  level: LogLevel
  scope: string
  message: string
  metadata?: LogMetadata
  error?: {
    message: string
    type?: string
    stack?: string
  }
}

/**
 * Logger contract shared by every module
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void
  info(message: string, metadata?: LogMetadata): void
  warn(message: string, metadata?: LogMetadata): void
  error(message: string, metadata?: LogMetadata, error?: unknown): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40
}

// =============================================================================
// SENSITIVE DATA MASKING
// =============================================================================

/**
 * Fields that should be masked in logs
 */
const SENSITIVE_FIELDS = [
  "api_key",
  "apiKey",
  "password",
  "token",
  "secret",
  "authorization"
]

const MASK = "***MASKED***"

/**
 * Masks sensitive data in a value
 *
 * @param data - The data to mask
 * @param depth - Current recursion depth (max 10)
 * @returns Masked copy of the data
 */
export function maskSensitiveData(data: unknown, depth: number = 0): unknown {
  if (depth > 10) return data

  if (data === null || data === undefined) {
    return data
  }

  if (typeof data === "string") {
    // Bearer tokens and OpenAI-style keys
    if (/^Bearer\s+\S+$/.test(data) || /^sk-[A-Za-z0-9_-]{8,}$/.test(data)) {
      return MASK
    }
    return data
  }

  if (Array.isArray(data)) {
    return data.map(item => maskSensitiveData(item, depth + 1))
  }

  if (typeof data === "object") {
    const masked: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase()

      if (
        SENSITIVE_FIELDS.some(field => lowerKey.includes(field.toLowerCase()))
      ) {
        masked[key] = MASK
      } else {
        masked[key] = maskSensitiveData(value, depth + 1)
      }
    }

    return masked
  }

  return data
}

// =============================================================================
// LOGGER CLASS
// =============================================================================

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: INFO) */
  level?: LogLevel
  /** Include stack traces in error entries (default: false) */
  includeStack?: boolean
}

/**
 * Writes structured entries to the console
 */
export class ConsoleLogger implements Logger {
  private readonly scope: string
  private readonly level: LogLevel
  private readonly includeStack: boolean

  constructor(scope: string, options: ConsoleLoggerOptions = {}) {
    this.scope = scope
    this.level = options.level ?? "INFO"
    this.includeStack = options.includeStack ?? false
  }

  /**
   * Creates a logger for a sub-scope with the same options
   */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(`${this.scope}:${scope}`, {
      level: this.level,
      includeStack: this.includeStack
    })
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log("DEBUG", message, metadata)
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log("INFO", message, metadata)
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log("WARN", message, metadata)
  }

  error(message: string, metadata?: LogMetadata, error?: unknown): void {
    this.log("ERROR", message, metadata, error)
  }

  /**
   * Builds the entry written for a call (exposed for tests)
   */
  buildEntry(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata,
    error?: unknown
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      scope: this.scope,
      message
    }

    if (metadata && Object.keys(metadata).length > 0) {
      const masked = maskSensitiveData(metadata)
      if (masked && typeof masked === "object" && !Array.isArray(masked)) {
        entry.metadata = { ...masked }
      }
    }

    if (error !== undefined) {
      entry.error = this.formatError(error)
    }

    return entry
  }

  private log(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata,
    error?: unknown
  ): void {
    if (!this.isEnabled(level)) return

    const prefix = `[${this.scope}]`
    const json = JSON.stringify(this.buildEntry(level, message, metadata, error))

    switch (level) {
      case "ERROR":
        console.error(prefix, json)
        break
      case "WARN":
        console.warn(prefix, json)
        break
      case "DEBUG":
        console.debug(prefix, json)
        break
      default:
        console.log(prefix, json)
    }
  }

  private formatError(error: unknown): {
    message: string
    type?: string
    stack?: string
  } {
    if (error instanceof Error) {
      return {
        message: error.message,
        type: error.name,
        stack: this.includeStack ? error.stack : undefined
      }
    }
    return { message: String(error) }
  }
}

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

/**
 * Creates a scoped console logger
 */
export function createLogger(
  scope: string,
  options: ConsoleLoggerOptions = {}
): ConsoleLogger {
  return new ConsoleLogger(scope, options)
}

/**
 * Creates a logger that drops everything (tests, library callers)
 */
export function createNoopLogger(): Logger {
  return {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined
  }
}
