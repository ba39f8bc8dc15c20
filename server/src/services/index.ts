// Service layer exports

export { scan, openBrowser, type ScanDependencies } from './scanner.js'
export { runBatch, type BatchOptions } from './batch.js'
export { CaptureSession, captureScripts } from './capture-session.js'
export { reconcileScripts, inlineIdentity, INLINE_SCRIPT_NAME } from './reconciler.js'
export { classifyScript, classifyUrl, classifyInline, findUrlRule, findInlineRule } from './vendor-classifier.js'
export { assembleScanResult, toScanReport, toFailedReport, formatScanTimestamp } from './result-assembler.js'
export { launchChromium } from './playwright-driver.js'
export {
  DriverTimeoutError,
  type BrowserDriver,
  type BrowserLauncher,
  type DriverContext,
  type DriverPage,
  type LaunchOptions,
  type NavigationResponse,
  type PageRequestEvent,
} from './browser-driver.js'
