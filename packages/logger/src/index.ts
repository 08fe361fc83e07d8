/**
 * @gtin-validate/logger
 *
 * Structured logging for gtin-validate tooling.
 *
 * Features:
 * - JSON-formatted output for production (machine-parseable)
 * - Colored output for development (human-readable)
 * - ISO 8601 timestamps
 * - Log levels: debug, info, warn, error, fatal
 * - Child loggers with inherited context
 * - Pluggable sink so callers can route lines anywhere
 */

import { resolveLoggerConfig, type LogLevel, type LoggerConfig } from './config'

export { resolveLoggerConfig, LOG_LEVEL_NAMES, LOG_FORMATS } from './config'
export type { LogFormat, LogLevel, LoggerConfig, LoggerEnv } from './config'

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

/** Receives one formatted line per entry that passes the level filter. */
export type LogSink = (level: LogLevel, line: string) => void

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  fatal: '\x1b[35m', // Magenta
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

function formatError(error: unknown): LogEntry['error'] | undefined {
  if (!error) return undefined

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

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
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

export const consoleSink: LogSink = (level, line) => {
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
   * Create a child logger. Component names nest as `parent:child`.
   */
  child(component: string, defaultContext?: LogContext): ILogger
}

export interface LoggerOptions extends Partial<LoggerConfig> {
  sink?: LogSink
  /** Clock override, mostly for tests */
  now?: () => Date
}

interface ResolvedOptions {
  config: LoggerConfig
  sink: LogSink
  now: () => Date
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext
  private readonly options: ResolvedOptions

  constructor(
    service: string,
    options: ResolvedOptions,
    component?: string,
    defaultContext: LogContext = {}
  ) {
    this.service = service
    this.options = options
    this.component = component
    this.defaultContext = defaultContext
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    const { config, sink, now } = this.options
    if (LOG_LEVELS[level] < LOG_LEVELS[config.level]) return

    const entry: LogEntry = {
      timestamp: now().toISOString(),
      level,
      service: this.service,
      message,
      ...this.defaultContext,
      ...meta,
    }

    if (this.component) {
      entry.component = this.component
    }

    const errorData = formatError(error)
    if (errorData) {
      entry.error = errorData
    }

    sink(level, config.format === 'json' ? formatJson(entry) : formatPretty(entry))
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
    return new Logger(this.service, this.options, newComponent, {
      ...this.defaultContext,
      ...defaultContext,
    })
  }
}

/**
 * Create a logger for a service
 *
 * @example
 * ```ts
 * import { createLogger } from '@gtin-validate/logger'
 *
 * const logger = createLogger('catalog-import')
 * const auditLogger = logger.child('audit')
 * auditLogger.info('Batch checked', { total: 120 })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  const { sink = consoleSink, now = () => new Date(), ...overrides } = options
  return new Logger(service, {
    config: resolveLoggerConfig(process.env, overrides),
    sink,
    now,
  })
}

const noop = (): void => {}

/** Logger that drops every entry. */
export function createSilentLogger(): ILogger {
  const silent: ILogger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    fatal: noop,
    child: () => silent,
  }
  return silent
}
