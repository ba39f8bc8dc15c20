/**
 * @fileoverview Scan entry point: audits one URL end to end.
 * Validates the target, captures scripts in an isolated browser context,
 * reconciles the network and DOM views, classifies vendors and assembles
 * the immutable result.
 */

import { getVendorCatalog, type VendorCatalog } from '../data/index.js'
import type { ProgressCallback, ScanResult } from '../types.js'
import {
  ScanError,
  createLogger,
  getErrorMessage,
  parseTargetUrl,
  resolveScanOptions,
  type ScanOptions,
} from '../utils/index.js'
import type { BrowserDriver, BrowserLauncher } from './browser-driver.js'
import { captureScripts } from './capture-session.js'
import { launchChromium } from './playwright-driver.js'
import { reconcileScripts } from './reconciler.js'
import { assembleScanResult } from './result-assembler.js'

const log = createLogger('Scan')

/**
 * Collaborators a scan can be given instead of the defaults.
 */
export interface ScanDependencies {
  /** Already-launched browser to open the scan's context in; left open afterwards */
  browser?: BrowserDriver
  /** Launches a browser when none is given (default: Chromium via Playwright) */
  launcher?: BrowserLauncher
  /** Vendor catalog (default: the bundled catalog) */
  catalog?: VendorCatalog
  /** Receives phase updates */
  onProgress?: ProgressCallback
  /** Clock used for `scannedAt` */
  now?: () => Date
}

/**
 * Launch a browser, mapping any failure to a fatal ScanError.
 *
 * @throws ScanError (BrowserLaunchFailure)
 */
export async function openBrowser(
  launcher: BrowserLauncher,
  headless: boolean,
  target: string = ''
): Promise<BrowserDriver> {
  try {
    return await launcher({ headless })
  } catch (error) {
    throw new ScanError(
      'BrowserLaunchFailure',
      target,
      `Browser could not be launched: ${getErrorMessage(error)}`,
      { cause: error }
    )
  }
}

/**
 * Audit one URL and return its classified scripts.
 *
 * @param url - Absolute http(s) URL to audit
 * @param options - Timeout, headless mode and grace period
 * @param deps - Optional browser, launcher, catalog and progress hook
 * @returns Frozen ScanResult
 * @throws ScanError describing why the scan produced no result
 *
 * @example
 * const result = await scan('https://example.com', { timeoutSeconds: 45 })
 * console.log(result.gtmDetected, result.scripts.length)
 */
export async function scan(url: string, options: ScanOptions = {}, deps: ScanDependencies = {}): Promise<ScanResult> {
  const target = parseTargetUrl(url)
  if (!target) {
    throw new ScanError('MalformedTarget', url, `Not a usable http(s) URL: ${url}`)
  }

  const settings = resolveScanOptions(options)
  const catalog = deps.catalog ?? getVendorCatalog()
  const progress: ProgressCallback = (step, message, percent) => deps.onProgress?.(step, message, percent)
  const scanLog = log.child(target.hostname)
  const requested = url.trim()

  scanLog.info('Starting scan', {
    url: requested,
    timeoutSeconds: settings.timeoutSeconds,
    gracePeriodSeconds: settings.gracePeriodSeconds,
    headless: settings.headless,
  })
  scanLog.startTimer('scan')

  let browser = deps.browser ?? null
  let ownsBrowser = false

  try {
    if (!browser) {
      progress('launch', 'Launching browser...', 5)
      scanLog.startTimer('browser-launch')
      browser = await openBrowser(deps.launcher ?? launchChromium, settings.headless, requested)
      ownsBrowser = true
      scanLog.endTimer('browser-launch', 'Browser launched')
    }

    const capture = await captureScripts(browser, target.href, settings, scanLog, progress)

    progress('classify', 'Classifying scripts...', 90)
    const observations = reconcileScripts(capture)
    let result: ScanResult
    try {
      result = assembleScanResult({
        url: requested,
        gtmDetected: capture.gtmDetected,
        observations,
        catalog,
        scannedAt: deps.now?.(),
      })
    } catch (error) {
      throw new ScanError('CaptureFailure', requested, getErrorMessage(error), { cause: error })
    }

    const injected = result.scripts.filter((script) => script.injected).length
    scanLog.endTimer('scan', 'Scan complete')
    scanLog.success('Scripts classified', {
      scripts: result.scripts.length,
      injected,
      viaGtm: result.scripts.filter((script) => script.viaGtm).length,
      gtmDetected: result.gtmDetected,
    })
    progress('complete', `Found ${result.scripts.length} scripts`, 100)
    return result
  } catch (error) {
    scanLog.endTimer('scan', 'Scan failed')
    scanLog.error('Scan failed', {
      kind: error instanceof ScanError ? error.kind : 'Unexpected',
      error: getErrorMessage(error),
    })
    throw error
  } finally {
    scanLog.clearTimer('browser-launch')
    if (ownsBrowser && browser) {
      await browser.close().catch((error: unknown) => {
        scanLog.warn('Error closing browser', { error: getErrorMessage(error) })
      })
    }
  }
}
