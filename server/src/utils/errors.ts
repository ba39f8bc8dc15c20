/**
 * @fileoverview Error types and helpers for the audit engine.
 * Every way a scan can fail is a ScanError with a `kind` discriminant,
 * so callers can decide between skipping a target and aborting the run.
 */

/**
 * Kinds of scan-level failure.
 * - NavigationTimeout: the page did not settle within the timeout budget
 * - NavigationFailure: DNS, connection, certificate or HTTP-level failure
 * - BrowserLaunchFailure: the browser engine could not be started (fatal)
 * - MalformedTarget: the input is not a usable http(s) URL
 * - CaptureFailure: the DOM snapshot could not be taken
 */
export type ScanErrorKind =
  | 'NavigationTimeout'
  | 'NavigationFailure'
  | 'BrowserLaunchFailure'
  | 'MalformedTarget'
  | 'CaptureFailure'

/**
 * A failure that prevents a scan from producing a result.
 * No partial result ever accompanies a ScanError.
 */
export class ScanError extends Error {
  readonly kind: ScanErrorKind
  readonly target: string

  constructor(kind: ScanErrorKind, target: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = kind
    this.kind = kind
    this.target = target
  }
}

/**
 * Whether an error must abort the whole run instead of a single target.
 */
export function isFatalScanError(error: unknown): error is ScanError {
  return error instanceof ScanError && error.kind === 'BrowserLaunchFailure'
}

/**
 * Safely extract an error message from an unknown error type.
 * Handles both Error instances and unknown thrown values.
 *
 * @param error - The caught error of unknown type
 * @returns The error message string, or 'Unknown error' for non-Error values
 *
 * @example
 * try {
 *   await riskyOperation()
 * } catch (error) {
 *   log.error('Operation failed', { error: getErrorMessage(error) })
 * }
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error'
}

/** Ordered (needle, message) pairs for browser navigation errors; first match wins */
const PAGE_ERROR_MESSAGES: ReadonlyArray<readonly [string, string]> = [
  ['timeout', 'Page load timed out - site may be slow or blocking automated browsers'],
  ['net::err_name_not_resolved', 'Domain not found - check the URL'],
  ['net::err_connection_refused', 'Connection refused - site may be down'],
  ['net::err_connection_timed_out', 'Connection timed out - site may be slow or unreachable'],
  ['net::err_ssl', 'SSL certificate error'],
  ['certificate', 'SSL certificate error'],
  ['net::err_cert', 'SSL certificate error'],
  ['net::err_aborted', 'Page load aborted - site may be blocking automated access'],
  ['net::err_failed', 'Network request failed - site may be blocking automated browsers'],
  ['blocked', 'Page load blocked - site is rejecting automated browsers'],
]

/**
 * Turn a raw browser navigation error into a short readable message.
 * Unrecognized errors are returned unchanged.
 *
 * @example
 * describeNavigationError('page.goto: net::ERR_NAME_NOT_RESOLVED at https://nope.test/')
 * // Returns 'Domain not found - check the URL'
 */
export function describeNavigationError(raw: string): string {
  const lower = raw.toLowerCase()
  for (const [needle, message] of PAGE_ERROR_MESSAGES) {
    if (lower.includes(needle)) {
      return message
    }
  }
  return raw
}
