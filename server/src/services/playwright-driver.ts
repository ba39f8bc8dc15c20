/**
 * @fileoverview Playwright implementation of the browser driver port.
 * Launches Chromium, opens a fresh incognito-like context per scan and
 * reads `<script>` elements straight from the live DOM.
 */

import { chromium, errors, type Browser, type BrowserContext, type Page } from 'playwright'
import type { DomScriptEntry } from '../types.js'
import {
  DriverTimeoutError,
  type BrowserDriver,
  type DriverContext,
  type DriverPage,
  type LaunchOptions,
  type NavigationResponse,
  type PageRequestEvent,
} from './browser-driver.js'

// ============================================================================
// Constants
// ============================================================================

/** Desktop Chrome user agent, so sites serve their regular tag setup */
const DESKTOP_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36'

/** Chromium flags; the sandbox flags let the browser start inside containers */
const LAUNCH_ARGS = [
  '--no-first-run',
  '--no-default-browser-check',
  '--no-sandbox',
  '--disable-dev-shm-usage',
]

// ============================================================================
// Page
// ============================================================================

class PlaywrightPage implements DriverPage {
  constructor(private readonly page: Page) {}

  onRequest(listener: (request: PageRequestEvent) => void): void {
    this.page.on('request', (request) => {
      listener({ url: request.url(), resourceType: request.resourceType() })
    })
  }

  async goto(url: string, timeoutMs: number): Promise<NavigationResponse> {
    try {
      const response = await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs })
      return {
        status: response?.status() ?? null,
        statusText: response?.statusText() ?? null,
      }
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new DriverTimeoutError(error.message, { cause: error })
      }
      throw error
    }
  }

  async waitForNetworkIdle(timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForLoadState('networkidle', { timeout: timeoutMs })
      return true
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return false
      }
      throw error
    }
  }

  async waitForTimeout(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms)
  }

  async snapshotScripts(): Promise<DomScriptEntry[]> {
    return this.page.evaluate(() =>
      Array.from(document.querySelectorAll('script')).map((el) => {
        const src = el.getAttribute('src')
        if (src !== null && src.trim() !== '') {
          return { src: el.src, text: '' }
        }
        return { src: null, text: el.textContent ?? '' }
      })
    )
  }

  detach(): void {
    this.page.removeAllListeners()
  }
}

// ============================================================================
// Context
// ============================================================================

class PlaywrightContext implements DriverContext {
  private readonly pages: PlaywrightPage[] = []

  constructor(private readonly context: BrowserContext) {}

  async newPage(): Promise<DriverPage> {
    const page = new PlaywrightPage(await this.context.newPage())
    this.pages.push(page)
    return page
  }

  async close(): Promise<void> {
    // Remove event listeners from pages before closing
    for (const page of this.pages) {
      page.detach()
    }
    this.pages.length = 0
    await this.context.close()
  }
}

// ============================================================================
// Browser
// ============================================================================

class PlaywrightBrowser implements BrowserDriver {
  constructor(private readonly browser: Browser) {}

  async newContext(): Promise<DriverContext> {
    const context = await this.browser.newContext({
      userAgent: DESKTOP_USER_AGENT,
      viewport: { width: 1440, height: 900 },
      locale: 'en-GB',
      timezoneId: 'Europe/London',
      javaScriptEnabled: true,
      // Service workers could answer script requests without the page seeing them
      serviceWorkers: 'block',
    })
    return new PlaywrightContext(context)
  }

  async close(): Promise<void> {
    await this.browser.close()
  }
}

/**
 * Launch a fresh Chromium instance with no stored state.
 *
 * @param options - Launch options (headless or visible window)
 */
export async function launchChromium(options: LaunchOptions): Promise<BrowserDriver> {
  const browser = await chromium.launch({ headless: options.headless, args: LAUNCH_ARGS })
  return new PlaywrightBrowser(browser)
}
