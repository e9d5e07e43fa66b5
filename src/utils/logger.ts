/**
 * @fileoverview Structured logging utility for packlens.
 *
 * Produces JSON-friendly log entries through a pluggable handler. The
 * interactive explorer owns the terminal, so its logger either appends JSON
 * lines to a log file or discards everything; the one-shot subcommands
 * send entries to stderr.
 *
 * @module utils/logger
 *
 * @example Basic usage
 * ```typescript
 * import { createLogger, LogLevel } from './utils/logger'
 *
 * const logger = createLogger({ component: 'pack-decoder' })
 * logger.info('Pack opened', { path, objectCount: 12 })
 * logger.error('Failed to decode entry', new Error('bad header'), { offset: 42 })
 * ```
 */

import { appendFileSync } from 'node:fs'

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

/**
 * Priority mapping for log level filtering.
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
}

/**
 * Structured log entry that will be serialized to JSON.
 */
export interface LogEntry {
  /** ISO-8601 timestamp */
  timestamp: string
  level: LogLevel
  message: string
  /** Component or module name */
  component?: string
  error?: {
    name: string
    message: string
    code?: string
  }
  /** Additional structured data */
  data?: Record<string, unknown>
}

/**
 * Logger interface supporting structured logging.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, error?: unknown, data?: Record<string, unknown>): void
  /**
   * Create a child logger with additional context.
   * @param context - Context to add to all log entries from child logger
   */
  child(context: Record<string, unknown>): Logger
}

export type LogHandler = (entry: LogEntry) => void

/**
 * Options for creating a logger.
 */
export interface LoggerOptions {
  /** Component or module name */
  component?: string
  /** Minimum log level to output (default: INFO) */
  minLevel?: LogLevel
  /** Additional context to include in all log entries */
  context?: Record<string, unknown>
  /** Log handler (defaults to JSON lines on stderr) */
  handler?: LogHandler
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * Writes each entry as one JSON line on stderr.
 */
export function stderrHandler(entry: LogEntry): void {
  process.stderr.write(JSON.stringify(entry) + '\n')
}

/**
 * Returns a handler that appends JSON lines to `filePath`.
 *
 * A failed write is reported once on stderr and further entries are dropped,
 * so a broken log destination never interrupts the explorer.
 */
export function createFileHandler(filePath: string): LogHandler {
  let broken = false
  return (entry) => {
    if (broken) return
    try {
      appendFileSync(filePath, JSON.stringify(entry) + '\n')
    } catch (error) {
      broken = true
      const reason = error instanceof Error ? error.message : String(error)
      process.stderr.write(`packlens: logging disabled, cannot write ${filePath}: ${reason}\n`)
    }
  }
}

/**
 * Parses a level name (case-insensitive).
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  const lower = value.toLowerCase()
  for (const level of Object.values(LogLevel)) {
    if (level === lower) return level
  }
  return undefined
}

// ============================================================================
// Logger Implementation
// ============================================================================

function describeLoggedError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
    return {
      name: error.name,
      message: error.message,
      ...(code !== undefined && { code }),
    }
  }
  return { name: 'NonError', message: String(error) }
}

/**
 * Create a structured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   component: 'tree-builder',
 *   minLevel: LogLevel.DEBUG,
 *   handler: createFileHandler('/tmp/packlens.log'),
 * })
 * logger.debug('Skipped unreadable entry', { path })
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    component,
    minLevel = LogLevel.INFO,
    context = {},
    handler = stderrHandler,
  } = options

  function shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel]
  }

  function log(
    level: LogLevel,
    message: string,
    error?: unknown,
    data?: Record<string, unknown>
  ): void {
    if (!shouldLog(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    }

    if (component) {
      entry.component = component
    }

    if (error !== undefined) {
      entry.error = describeLoggedError(error)
    }

    // Merge context and data
    const mergedData = { ...context, ...data }
    if (Object.keys(mergedData).length > 0) {
      entry.data = mergedData
    }

    handler(entry)
  }

  return {
    debug(message, data) {
      log(LogLevel.DEBUG, message, undefined, data)
    },
    info(message, data) {
      log(LogLevel.INFO, message, undefined, data)
    },
    warn(message, data) {
      log(LogLevel.WARN, message, undefined, data)
    },
    error(message, error, data) {
      log(LogLevel.ERROR, message, error, data)
    },
    child(childContext) {
      return createLogger({
        ...(component !== undefined && { component }),
        minLevel,
        context: { ...context, ...childContext },
        handler,
      })
    },
  }
}

// ============================================================================
// Pre-configured Loggers
// ============================================================================

/**
 * No-op logger that discards all messages.
 * Used by the explorer when no log file is configured, and by tests.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
}
