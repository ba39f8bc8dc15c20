/**
 * @fileoverview Streaming audit endpoint with progress updates.
 * Provides a Server-Sent Events (SSE) endpoint that reports scan phases
 * in real time and finishes with the script report.
 */

import { z } from 'zod'
import { scan } from '../services/scanner.js'
import { toScanReport } from '../services/result-assembler.js'
import {
  ScanError,
  createLogger,
  extractDomain,
  formatIssues,
  getErrorMessage,
  type ResolvedScanOptions,
  type ScanOptions,
} from '../utils/index.js'
import { openEventStream, sendEvent, sendProgress, type EventStreamResponse } from './sse.js'

const log = createLogger('Audit')

/** Bounds for a caller-supplied timeout, in seconds */
const MIN_TIMEOUT_SECONDS = 5
const MAX_TIMEOUT_SECONDS = 120

// ============================================================================
// Query Validation
// ============================================================================

const auditQuerySchema = z.object({
  url: z.string().trim().min(1, 'URL is required'),
  timeout: z.coerce
    .number()
    .int()
    .transform((value) => Math.max(MIN_TIMEOUT_SECONDS, Math.min(value, MAX_TIMEOUT_SECONDS)))
    .optional(),
})

/** Validated query of an audit request */
export type AuditQuery = z.infer<typeof auditQuerySchema>

/**
 * Validate the query string of an audit request.
 * The timeout is clamped to 5..120 seconds.
 *
 * @returns The parsed query, or an error message
 *
 * @example
 * parseAuditQuery({ url: 'https://example.com', timeout: '300' })
 * // { success: true, query: { url: 'https://example.com', timeout: 120 } }
 */
export function parseAuditQuery(
  query: unknown
): { success: true; query: AuditQuery } | { success: false; error: string } {
  const parsed = auditQuerySchema.safeParse(query)
  if (!parsed.success) {
    return { success: false, error: formatIssues(parsed.error) }
  }
  return { success: true, query: parsed.data }
}

// ============================================================================
// Streaming Handler
// ============================================================================

/**
 * Create the GET /api/audit-stream handler.
 *
 * Query parameters:
 * - url: The URL to audit (required, http or https)
 * - timeout: Timeout budget in seconds (optional, clamped to 5..120)
 *
 * SSE Events emitted:
 * - progress: { step, message, progress } - Phase updates
 * - complete: { report } - The script report
 * - error: { error, kind } - If the scan fails
 *
 * Each request runs its own scan with its own browser, so concurrent
 * requests never share browser state.
 *
 * @param defaults - Scan options applied when the query does not override them
 * @param runScan - Scan implementation (default: the Playwright-backed scanner)
 */
export function createAuditStreamHandler(
  defaults: ResolvedScanOptions,
  runScan: typeof scan = scan
): (req: { query: unknown }, res: EventStreamResponse) => Promise<void> {
  return async (req, res) => {
    openEventStream(res)

    const parsed = parseAuditQuery(req.query)
    if (!parsed.success) {
      sendEvent(res, 'error', { error: parsed.error, kind: 'MalformedTarget' })
      res.end()
      return
    }

    const { url, timeout } = parsed.query
    const options: ScanOptions = { ...defaults, timeoutSeconds: timeout ?? defaults.timeoutSeconds }

    const requestLog = log.child(extractDomain(url))
    requestLog.section(`Auditing: ${url}`)
    requestLog.info('Request received', { url, timeoutSeconds: options.timeoutSeconds })
    requestLog.startTimer('request')

    try {
      sendProgress(res, 'init', 'Starting audit...', 2)
      const result = await runScan(url, options, {
        onProgress: (step, message, progress) => sendProgress(res, step, message, progress),
      })

      sendEvent(res, 'complete', { report: toScanReport(result) })
      requestLog.endTimer('request', 'Audit streamed')
    } catch (error) {
      const kind = error instanceof ScanError ? error.kind : 'Unexpected'
      requestLog.error('Audit failed', { kind, error: getErrorMessage(error) })
      sendEvent(res, 'error', { error: getErrorMessage(error), kind })
    } finally {
      requestLog.clearTimer('request')
      res.end()
    }
  }
}
