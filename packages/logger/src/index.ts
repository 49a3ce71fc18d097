/**
 * @guitar-registry/logger
 *
 * Structured logging for the guitar registry services.
 *
 * Features:
 * - JSON-formatted output for production (machine-parseable)
 * - Colored output for development (human-readable)
 * - ISO 8601 timestamps
 * - Log levels: debug, info, warn, error, fatal
 * - Child loggers with inherited component path and context
 * - Request/submission correlation via AsyncLocalStorage
 *
 * Environment variables:
 * - LOG_LEVEL: Minimum log level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: Output format (json, pretty). Default: json in production, pretty otherwise
 * - NODE_ENV: Used to determine defaults
 */

import { AsyncLocalStorage } from 'async_hooks'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/**
 * Context carried across every entry logged inside withRequestContext()
 */
export interface RequestContext {
  requestId?: string
  [key: string]: unknown
}

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

/**
 * Receives formatted lines. Defaults to the console method matching the level.
 */
export type LogWriter = (level: LogLevel, line: string) => void

const requestContextStorage = new AsyncLocalStorage<RequestContext>()

/**
 * Run a function with request context.
 * All log entries within the callback (sync or async) include the context fields.
 */
export function withRequestContext<T>(context: RequestContext, fn: () => T): T {
  return requestContextStorage.run(context, fn)
}

export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore()
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS
}

function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

function getLogFormat(): 'json' | 'pretty' {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()]
}

function formatError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

// ANSI colors for terminal output
const ANSI_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  fatal: '\x1b[35m', // Magenta
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const color = ANSI_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)

  const componentPath = entry.component
    ? `${entry.service}:${entry.component}`
    : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr =
    Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''

  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

const consoleWriter: LogWriter = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line)
      break
    case 'info':
      console.info(line)
      break
    case 'warn':
      console.warn(line)
      break
    case 'error':
    case 'fatal':
      console.error(line)
      break
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger. The component name is appended to the parent's
   * component path (`resolver:scoring`).
   */
  child(component: string, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext
  private readonly writer: LogWriter

  constructor(
    service: string,
    component?: string,
    defaultContext: LogContext = {},
    writer: LogWriter = consoleWriter
  ) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
    this.writer = writer
  }

  private log(
    level: LogLevel,
    message: string,
    meta?: LogContext,
    error?: unknown
  ): void {
    if (!shouldLog(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      // Request context first so explicit meta wins on key collisions
      ...getRequestContext(),
      ...this.defaultContext,
      ...meta,
    }

    if (this.component) {
      entry.component = this.component
    }

    if (error !== undefined) {
      entry.error = formatError(error)
    }

    const line = getLogFormat() === 'json' ? formatJson(entry) : formatPretty(entry)
    this.writer(level, line)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log('fatal', message, meta, error)
  }

  child(component: string, defaultContext: LogContext = {}): ILogger {
    const newComponent = this.component ? `${this.component}:${component}` : component
    return new Logger(
      this.service,
      newComponent,
      { ...this.defaultContext, ...defaultContext },
      this.writer
    )
  }
}

/**
 * Create a logger for a service
 *
 * @example
 * ```ts
 * import { createLogger } from '@guitar-registry/logger'
 *
 * const logger = createLogger('intake')
 * logger.info('Batch started', { size: 12 })
 *
 * const resolverLog = logger.child('resolver')
 * resolverLog.debug('CANDIDATES_LOADED', { count: 3 })
 * ```
 */
export function createLogger(service: string, writer?: LogWriter): ILogger {
  return new Logger(service, undefined, {}, writer)
}
