/**
 * Safe Callback Wrapper Utility
 *
 * Invokes callbacks that may be sync or async so that a failing callback is
 * logged and never reaches the caller, whether it throws or rejects.
 *
 * @module utils/safe-callback
 */

import type { Logger } from './logger'
import { resolveLogger } from './logger'

// =============================================================================
// Types
// =============================================================================

/**
 * A callback that can be either synchronous or asynchronous
 */
export type MaybeAsyncCallback<TArgs extends unknown[] = []> = (
  ...args: TArgs
) => void | Promise<void>

export interface SafeCallbackOptions {
  /** Defaults to the global logger */
  logger?: Logger | undefined

  /**
   * Prefix for log messages
   * @default '[SafeCallback]'
   */
  logPrefix?: string | undefined

  /** Included in the log line of a failure */
  context?: Record<string, unknown> | undefined
}

export type SafeCallbackResult =
  | { type: 'sync'; success: true }
  | { type: 'sync'; success: false; error: Error }
  | { type: 'async'; promise: Promise<void> }

// =============================================================================
// Implementation
// =============================================================================

/**
 * Invoke a callback, catching both sync throws and async rejections
 *
 * @example
 * ```typescript
 * const result = safeCallback(
 *   handler,
 *   { context: { slug: doc.slug }, logPrefix: '[commit]' },
 *   event
 * )
 * if (result.type === 'async') {
 *   await result.promise // never rejects
 * }
 * ```
 */
export function safeCallback<TArgs extends unknown[]>(
  callback: MaybeAsyncCallback<TArgs>,
  options: SafeCallbackOptions = {},
  ...args: TArgs
): SafeCallbackResult {
  const log = resolveLogger(options.logger)
  const prefix = options.logPrefix ?? '[SafeCallback]'

  const handleError = (error: unknown): Error => {
    const err = error instanceof Error ? error : new Error(String(error))
    const contextStr = options.context ? ` (context: ${formatContext(options.context)})` : ''
    log.warn(`${prefix} Callback error${contextStr}: ${err.message}`, err)
    return err
  }

  try {
    const result = callback(...args)

    if (result instanceof Promise) {
      const handled = result.then(
        () => undefined,
        (error: unknown) => {
          handleError(error)
        }
      )
      return { type: 'async', promise: handled }
    }

    return { type: 'sync', success: true }
  } catch (error) {
    return { type: 'sync', success: false, error: handleError(error) }
  }
}

function formatContext(context: Record<string, unknown>): string {
  try {
    return JSON.stringify(context)
  } catch {
    return String(context)
  }
}
