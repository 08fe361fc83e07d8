/**
 * Logger configuration
 *
 * Environment variables:
 * - LOG_LEVEL: Minimum log level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: Output format (json, pretty). Default: json in production, pretty otherwise
 * - NODE_ENV: Used to determine defaults
 */

import { z } from 'zod'

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'fatal'] as const
export type LogLevel = (typeof LOG_LEVEL_NAMES)[number]

export const LOG_FORMATS = ['json', 'pretty'] as const
export type LogFormat = (typeof LOG_FORMATS)[number]

export interface LoggerConfig {
  level: LogLevel
  format: LogFormat
}

export type LoggerEnv = Record<string, string | undefined>

const lowercased = z
  .string()
  .trim()
  .transform((value) => value.toLowerCase())

const levelSchema = lowercased.pipe(z.enum(LOG_LEVEL_NAMES))
const formatSchema = lowercased.pipe(z.enum(LOG_FORMATS))

/**
 * Resolve logger settings from the environment. Unknown values fall back
 * to the defaults rather than failing startup.
 */
export function resolveLoggerConfig(
  env: LoggerEnv = process.env,
  overrides: Partial<LoggerConfig> = {}
): LoggerConfig {
  const level = levelSchema.safeParse(env.LOG_LEVEL)
  const format = formatSchema.safeParse(env.LOG_FORMAT)

  return {
    level: overrides.level ?? (level.success ? level.data : 'info'),
    format:
      overrides.format ??
      (format.success ? format.data : env.NODE_ENV === 'production' ? 'json' : 'pretty'),
  }
}
