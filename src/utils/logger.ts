/**
 * Logger utility for aspectdb
 *
 * Every component logs through the {@link Logger} interface. The global
 * logger is silent until something (the CLI, a test, `debug: true` in
 * configuration) installs a real one with {@link setLogger}.
 *
 * @module utils/logger
 */

/**
 * Logger interface used across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/**
 * Console logger, one level prefix per line
 */
export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args)
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args)
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args)
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args)
    } else {
      console.error(`[ERROR] ${message}`, ...args)
    }
  },
}

/**
 * Discards everything
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Global logger instance
 */
export let logger: Logger = noopLogger

/**
 * Replace the global logger
 *
 * @example
 * ```typescript
 * import { setLogger, consoleLogger } from './utils/logger'
 *
 * setLogger(consoleLogger)
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}

/**
 * Resolve the logger a component should use: its own if one was injected,
 * otherwise whatever is installed globally at call time.
 */
export function resolveLogger(l?: Logger | undefined): Logger {
  return l ?? logger
}
