/**
 * @fileoverview Browser driver port used by the capture session.
 * The capture session only talks to these interfaces, so any browser
 * automation library that can report script requests and read the DOM's
 * `<script>` elements can stand behind it.
 */

import type { DomScriptEntry } from '../types.js'

// ============================================================================
// Events
// ============================================================================

/**
 * A request issued by the page, as reported by the driver.
 */
export interface PageRequestEvent {
  /** Fully resolved request URL */
  url: string
  /** Driver-reported resource type ('script', 'image', 'xhr', ...) */
  resourceType: string
}

/**
 * Response of the main document navigation.
 */
export interface NavigationResponse {
  /** HTTP status code, or null when the driver got no response (e.g., about:blank) */
  status: number | null
  statusText: string | null
}

/**
 * Raised by a driver when navigation exceeds its timeout.
 * Any other navigation rejection is treated as a navigation failure.
 */
export class DriverTimeoutError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DriverTimeoutError'
  }
}

// ============================================================================
// Driver Interfaces
// ============================================================================

/**
 * A single page inside an isolated context.
 */
export interface DriverPage {
  /**
   * Register a listener for every request the page issues.
   * Must be called before `goto` so requests from the earliest parse phase are seen.
   */
  onRequest(listener: (request: PageRequestEvent) => void): void

  /**
   * Navigate to a URL and resolve once the DOM content has loaded.
   * @throws DriverTimeoutError if the timeout elapses first
   */
  goto(url: string, timeoutMs: number): Promise<NavigationResponse>

  /**
   * Wait until no requests have been in flight for the driver's quiet window.
   * @returns True if the network became idle, false if the timeout elapsed
   */
  waitForNetworkIdle(timeoutMs: number): Promise<boolean>

  /** Wait a fixed amount of time while the page keeps running */
  waitForTimeout(ms: number): Promise<void>

  /** Read every `<script>` element currently in the document, in document order */
  snapshotScripts(): Promise<DomScriptEntry[]>
}

/**
 * An isolated browser context (no cookies, cache or storage shared with other contexts).
 */
export interface DriverContext {
  newPage(): Promise<DriverPage>
  /** Close the context and all of its pages */
  close(): Promise<void>
}

/**
 * A launched browser able to open isolated contexts.
 */
export interface BrowserDriver {
  newContext(): Promise<DriverContext>
  /** Close the browser process */
  close(): Promise<void>
}

/** Options for launching a browser */
export interface LaunchOptions {
  /** Run without a visible window */
  headless: boolean
}

/** Starts a browser */
export type BrowserLauncher = (options: LaunchOptions) => Promise<BrowserDriver>
