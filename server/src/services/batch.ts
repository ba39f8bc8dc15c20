/**
 * @fileoverview Batch runner for auditing many URLs in one process.
 * Shares one browser across scans (each scan still gets its own isolated
 * context), caps how many scans run at once and turns per-URL failures
 * into failed entries so one bad URL never aborts the batch.
 */

import { getVendorCatalog, type VendorCatalog } from '../data/index.js'
import type { AuditEntry } from '../types.js'
import {
  ScanError,
  createLogger,
  getErrorMessage,
  isFatalScanError,
  resolveScanOptions,
  withRetry,
  type ScanOptions,
} from '../utils/index.js'
import type { BrowserLauncher } from './browser-driver.js'
import { launchChromium } from './playwright-driver.js'
import { toFailedReport, toScanReport } from './result-assembler.js'
import { openBrowser, scan } from './scanner.js'

/** Options for a batch run */
export interface BatchOptions {
  /** Options applied to every scan */
  scan?: ScanOptions
  /** Maximum number of scans in flight (default: 1) */
  concurrency?: number
  /** Extra attempts for targets whose page failed to load (default: 0) */
  retries?: number
  /** Delay before the first retry in milliseconds (default: 1000) */
  retryDelayMs?: number
  launcher?: BrowserLauncher
  catalog?: VendorCatalog
  /** Stops new scans from starting; entries finished so far are returned */
  signal?: AbortSignal
  /** Called as each entry completes, in completion order */
  onEntry?: (entry: AuditEntry, index: number, total: number) => void
}

/**
 * Audit a list of URLs.
 *
 * @param urls - Targets to audit
 * @param options - Scan, concurrency, retry and callback options
 * @returns One entry per completed target, in input order
 * @throws ScanError (BrowserLaunchFailure) if the browser cannot be started or dies mid-run
 */
export async function runBatch(urls: readonly string[], options: BatchOptions = {}): Promise<AuditEntry[]> {
  const log = createLogger('Batch')
  const settings = resolveScanOptions(options.scan)
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1))
  const catalog = options.catalog ?? getVendorCatalog()
  const total = urls.length
  const entries: Array<AuditEntry | undefined> = new Array(total)

  if (total === 0) {
    return []
  }

  log.section(`Auditing ${total} URL(s)`)
  log.info('Batch settings', { concurrency, retries: options.retries ?? 0, timeoutSeconds: settings.timeoutSeconds })

  const browser = await openBrowser(options.launcher ?? launchChromium, settings.headless)
  log.startTimer('batch')

  let next = 0
  const state: { fatal: ScanError | null } = { fatal: null }

  const worker = async (): Promise<void> => {
    while (state.fatal === null && !options.signal?.aborted) {
      const index = next++
      if (index >= total) return
      const url = urls[index]

      let entry: AuditEntry
      try {
        const result = await withRetry(
          () => scan(url, settings, { browser, catalog }),
          {
            maxRetries: options.retries ?? 0,
            initialDelayMs: options.retryDelayMs ?? 1000,
            context: url,
          }
        )
        entry = toScanReport(result)
      } catch (error) {
        if (isFatalScanError(error)) {
          state.fatal = error
          return
        }
        log.warn('Recording failed target and moving on', { url, error: getErrorMessage(error) })
        entry = toFailedReport(url, getErrorMessage(error))
      }

      entries[index] = entry
      options.onEntry?.(entry, index, total)
    }
  }

  try {
    const workerCount = Math.min(concurrency, total)
    await Promise.all(Array.from({ length: workerCount }, () => worker()))
  } finally {
    await browser.close().catch((error: unknown) => {
      log.warn('Error closing browser', { error: getErrorMessage(error) })
    })
  }

  if (state.fatal !== null) {
    log.clearTimer('batch')
    log.error('Batch aborted', { error: getErrorMessage(state.fatal) })
    throw state.fatal
  }

  const completed = entries.filter((entry): entry is AuditEntry => entry !== undefined)
  log.endTimer('batch', 'Batch complete')
  log.success('Batch summary', {
    completed: completed.length,
    failed: completed.filter((entry) => 'error' in entry).length,
    skipped: total - completed.length,
  })
  return completed
}
