/**
 * Console-backed loggers
 * @module services/logger
 */

import type { LogLevel, Logger } from './types'

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

/**
 * Creates a console logger that drops messages below the given level
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger('warn')
 * logger.info('hidden')
 * logger.warn('Tag mapping unavailable') // [WARN] Tag mapping unavailable
 * ```
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const enabled = (messageLevel: LogLevel) =>
    LEVEL_RANK[messageLevel] >= LEVEL_RANK[level]

  return {
    debug: (message, context) => {
      if (enabled('debug')) console.log(`[DEBUG] ${message}`, context ?? '')
    },
    info: (message, context) => {
      if (enabled('info')) console.log(`[INFO] ${message}`, context ?? '')
    },
    warn: (message, context) => {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, context ?? '')
    },
    error: (message, context) => {
      if (enabled('error')) console.error(`[ERROR] ${message}`, context ?? '')
    },
  }
}

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = createConsoleLogger('info')

/**
 * Creates a no-op logger for silent operation
 */
export function createSilentLogger(): Logger {
  const noop = () => {}
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  }
}

/**
 * Creates a logger that prefixes messages with a component name
 */
export function createPrefixedLogger(prefix: string, baseLogger: Logger): Logger {
  const tag = `[${prefix}]`
  return {
    debug: (message, context) => baseLogger.debug(`${tag} ${message}`, context),
    info: (message, context) => baseLogger.info(`${tag} ${message}`, context),
    warn: (message, context) => baseLogger.warn(`${tag} ${message}`, context),
    error: (message, context) => baseLogger.error(`${tag} ${message}`, context),
  }
}
