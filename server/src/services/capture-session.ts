/**
 * @fileoverview Capture session for a single script audit.
 * Each CaptureSession owns one isolated browser context and page, records
 * script requests from the network and takes one DOM snapshot once the page
 * has settled, so concurrent scans never share state.
 */

import type { CaptureResult, DomScriptEntry, NetworkScriptRequest, ProgressCallback } from '../types.js'
import type { ResolvedScanOptions } from '../utils/config.js'
import {
  ScanError,
  describeNavigationError,
  extractDomain,
  getErrorMessage,
  isFilteredUrl,
  isScriptRequest,
  isTagManagerLoader,
  normalizeScriptUrl,
  type Logger,
} from '../utils/index.js'
import {
  DriverTimeoutError,
  type BrowserDriver,
  type DriverContext,
  type DriverPage,
  type PageRequestEvent,
} from './browser-driver.js'

// ============================================================================
// CaptureSession Class
// ============================================================================

/**
 * Drives one page through navigation with network interception and a DOM
 * snapshot pass. Call `close()` on every exit path.
 */
export class CaptureSession {
  /** Isolated context owned by this session */
  private context: DriverContext | null = null
  /** Page being captured */
  private page: DriverPage | null = null
  /** Script requests in discovery order, first occurrence of each URL only */
  private readonly networkScripts: NetworkScriptRequest[] = []
  private readonly seenUrls = new Set<string>()
  /** Whether a tag-manager loader was requested */
  private tagManagerRequested = false

  constructor(
    private readonly browser: BrowserDriver,
    private readonly target: string,
    private readonly log: Logger
  ) {}

  // ==========================================================================
  // State Getters
  // ==========================================================================

  /**
   * Check if a browser context is currently open.
   */
  isActive(): boolean {
    return this.context !== null && this.page !== null
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Open an isolated context and page, and start recording script requests.
   * Interception is installed here, before any navigation starts.
   *
   * @throws ScanError (BrowserLaunchFailure) if the browser cannot open a context
   */
  async open(): Promise<void> {
    try {
      this.context = await this.browser.newContext()
      this.page = await this.context.newPage()
    } catch (error) {
      throw new ScanError(
        'BrowserLaunchFailure',
        this.target,
        `Browser could not open a page: ${getErrorMessage(error)}`,
        { cause: error }
      )
    }

    this.page.onRequest((request) => this.handleRequest(request))
  }

  private handleRequest(request: PageRequestEvent): void {
    const url = normalizeScriptUrl(request.url)
    if (!isScriptRequest(url, request.resourceType) || isFilteredUrl(url)) {
      return
    }
    if (isTagManagerLoader(url)) {
      this.tagManagerRequested = true
    }
    if (this.seenUrls.has(url)) {
      return
    }
    this.seenUrls.add(url)
    this.networkScripts.push({ url, sequence: this.networkScripts.length })
  }

  /**
   * Navigate to the target and wait for the network to go idle,
   * both within one timeout budget.
   *
   * @param timeoutMs - Budget for navigation plus the idle wait
   * @throws ScanError (NavigationTimeout) if the budget runs out
   * @throws ScanError (NavigationFailure) on DNS, connection or certificate errors
   */
  async navigate(timeoutMs: number): Promise<void> {
    const page = this.requirePage()
    const startedAt = Date.now()

    try {
      const response = await page.goto(this.target, timeoutMs)
      if (response.status !== null && response.status >= 400) {
        // Error pages still run scripts, so the scan continues
        this.log.warn('Page responded with an error status', { status: response.status, statusText: response.statusText })
      }
    } catch (error) {
      if (error instanceof DriverTimeoutError) {
        throw new ScanError('NavigationTimeout', this.target, describeNavigationError(error.message), { cause: error })
      }
      throw new ScanError('NavigationFailure', this.target, describeNavigationError(getErrorMessage(error)), { cause: error })
    }

    // A zero timeout means "wait forever" to Playwright, so a spent budget fails here
    const remainingMs = timeoutMs - (Date.now() - startedAt)
    const idle = remainingMs > 0 && (await page.waitForNetworkIdle(remainingMs))
    if (!idle) {
      throw new ScanError(
        'NavigationTimeout',
        this.target,
        `Page load timed out - network did not settle within ${timeoutMs}ms`
      )
    }
  }

  /**
   * Keep the page running for a fixed grace period so late tag-manager tags can fire.
   * Tags that fire after this window are not seen.
   */
  async settle(gracePeriodMs: number): Promise<void> {
    if (gracePeriodMs <= 0) return
    await this.requirePage().waitForTimeout(gracePeriodMs)
  }

  /**
   * Take the single DOM snapshot of `<script>` elements.
   * A page whose main thread never answers within `timeoutMs` fails the capture.
   *
   * @throws ScanError (CaptureFailure) if the page cannot be read in time
   */
  async snapshot(timeoutMs: number): Promise<DomScriptEntry[]> {
    const page = this.requirePage()
    let timer: ReturnType<typeof setTimeout> | undefined
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`page did not respond within ${timeoutMs}ms`)), timeoutMs)
    })

    try {
      const entries = await Promise.race([page.snapshotScripts(), expired])
      return entries.filter((entry) => entry.src === null || !isFilteredUrl(entry.src))
    } catch (error) {
      throw new ScanError(
        'CaptureFailure',
        this.target,
        `Could not read scripts from the page: ${getErrorMessage(error)}`,
        { cause: error }
      )
    } finally {
      clearTimeout(timer)
    }
  }

  /**
   * Combine recorded requests with a DOM snapshot into the capture output.
   * Tag-manager presence counts loader requests and loader `<script src>` tags alike.
   */
  buildResult(domScripts: DomScriptEntry[]): CaptureResult {
    const loaderInDom = domScripts.some((entry) => entry.src !== null && isTagManagerLoader(entry.src))
    return {
      networkScripts: [...this.networkScripts],
      domScripts,
      gtmDetected: this.tagManagerRequested || loaderInDom,
    }
  }

  /**
   * Close the context and release the page.
   * Safe to call multiple times; failures are logged, never thrown.
   */
  async close(): Promise<void> {
    this.page = null
    if (this.context) {
      const context = this.context
      this.context = null
      await context.close().catch((error: unknown) => {
        this.log.warn('Error closing browser context', { error: getErrorMessage(error) })
      })
    }
  }

  private requirePage(): DriverPage {
    if (!this.page) {
      throw new Error('No capture session active')
    }
    return this.page
  }
}

// ============================================================================
// Capture Protocol
// ============================================================================

/**
 * Run the full capture protocol for one target:
 * open context → intercept → navigate → idle-wait → grace-wait → snapshot → teardown.
 * The context is torn down whether the capture succeeds or fails.
 *
 * @param browser - Launched browser to open the isolated context in
 * @param target - Absolute http(s) URL to load
 * @param options - Resolved scan options
 * @param log - Logger scoped to this scan
 * @param onProgress - Optional progress callback
 */
export async function captureScripts(
  browser: BrowserDriver,
  target: string,
  options: ResolvedScanOptions,
  log: Logger,
  onProgress?: ProgressCallback
): Promise<CaptureResult> {
  const session = new CaptureSession(browser, target, log)
  const hostname = extractDomain(target)
  const progress: ProgressCallback = (step, message, percent) => onProgress?.(step, message, percent)

  try {
    progress('context', 'Opening isolated browser context...', 15)
    await session.open()

    log.startTimer('navigation')
    progress('navigate', `Connecting to ${hostname}...`, 25)
    await session.navigate(options.timeoutSeconds * 1000)
    log.endTimer('navigation', 'Page loaded and network idle')

    progress('grace', 'Waiting for late tag-manager tags...', 60)
    await session.settle(options.gracePeriodSeconds * 1000)

    progress('snapshot', 'Reading script tags from the page...', 75)
    const domScripts = await session.snapshot(options.timeoutSeconds * 1000)
    const result = session.buildResult(domScripts)

    log.info('Capture complete', {
      networkScripts: result.networkScripts.length,
      domScripts: result.domScripts.length,
      gtmDetected: result.gtmDetected,
    })
    return result
  } finally {
    log.clearTimer('navigation')
    log.debug('Closing browser context...')
    await session.close()
  }
}
