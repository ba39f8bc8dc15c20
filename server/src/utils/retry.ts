/**
 * @fileoverview Retry utility with exponential backoff.
 * Scans never retry on their own; batch callers opt in to re-running
 * targets whose page failed to load.
 */

import { ScanError, getErrorMessage } from './errors.js'
import { createLogger } from './logger.js'

const log = createLogger('Retry')

/** Options for configuring retry behavior */
export interface RetryOptions {
  /** Maximum number of retry attempts (default: 0) */
  maxRetries?: number
  /** Initial delay in milliseconds before first retry (default: 1000) */
  initialDelayMs?: number
  /** Maximum delay in milliseconds between retries (default: 10000) */
  maxDelayMs?: number
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number
  /** Decides whether a failure is worth another attempt (default: isRetryableScanError) */
  shouldRetry?: (error: unknown) => boolean
  /** Optional context string for logging */
  context?: string
}

const DEFAULT_OPTIONS = {
  maxRetries: 0,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
}

/**
 * Navigation timeouts and failures are transient from the caller's point of view;
 * malformed targets, launch failures and capture failures are not.
 */
export function isRetryableScanError(error: unknown): boolean {
  return error instanceof ScanError && (error.kind === 'NavigationTimeout' || error.kind === 'NavigationFailure')
}

/**
 * Sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Execute an async function, retrying failures accepted by `shouldRetry`.
 *
 * @param fn - The async function to execute
 * @param options - Retry configuration options
 * @returns The result of the first successful attempt
 * @throws The last error if it is not retryable or all retries are exhausted
 *
 * @example
 * const result = await withRetry(() => scan(url, options), { maxRetries: 2, context: url })
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries, initialDelayMs, maxDelayMs, backoffMultiplier } = { ...DEFAULT_OPTIONS, ...options }
  const shouldRetry = options.shouldRetry ?? isRetryableScanError
  const context = options.context

  let delay = initialDelayMs

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error
      }

      if (attempt >= maxRetries) {
        if (maxRetries > 0) {
          log.warn('All retry attempts exhausted', { context, attempts: attempt + 1, error: getErrorMessage(error) })
        }
        throw error
      }

      const wait = Math.min(delay, maxDelayMs)
      log.warn('Retrying after failure', {
        context,
        attempt: attempt + 1,
        maxRetries,
        delayMs: wait,
        error: getErrorMessage(error).slice(0, 100),
      })

      await sleep(wait)
      delay = Math.min(delay * backoffMultiplier, maxDelayMs)
    }
  }
}
