/**
 * Logger
 *
 * Leveled console output for the CLI and the generated-client runtime.
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export interface Logger {
  debug(message: string): void
  info(message: string): void
  success(message: string): void
  warn(message: string): void
  error(message: string): void
}

export interface LoggerOptions {
  level?: LogLevel
  /** Replaces console output, e.g. to capture lines in tests */
  sink?: (level: Exclude<LogLevel, 'silent'>, line: string) => void
  /** Prefix every line, e.g. with the component name */
  scope?: string
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value)
}

function defaultSink(level: Exclude<LogLevel, 'silent'>, line: string): void {
  if (level === 'warn' || level === 'error') {
    console.error(line)
  } else {
    console.log(line)
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.BMRS_CODEGEN_LOG_LEVEL
  const level: LogLevel = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info')
  const sink = options.sink ?? defaultSink
  const prefix = options.scope ? `${chalk.dim(`[${options.scope}]`)} ` : ''

  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level]

  return {
    debug(message) {
      if (enabled('debug')) sink('debug', `${prefix}${chalk.gray(message)}`)
    },
    info(message) {
      if (enabled('info')) sink('info', `${prefix}${message}`)
    },
    success(message) {
      if (enabled('info')) sink('info', `${prefix}${chalk.green('✓')} ${message}`)
    },
    warn(message) {
      if (enabled('warn')) sink('warn', `${prefix}${chalk.yellow('⚠')} ${message}`)
    },
    error(message) {
      if (enabled('error')) sink('error', `${prefix}${chalk.red('✗')} ${message}`)
    },
  }
}
