import type { DomScriptEntry } from '../../types.js'
import {
  DriverTimeoutError,
  type BrowserDriver,
  type DriverContext,
  type DriverPage,
  type LaunchOptions,
  type NavigationResponse,
  type PageRequestEvent,
} from '../browser-driver.js'

/** How a fake page behaves once navigated */
export interface PageBehavior {
  /** Requests fired while navigating */
  requests?: PageRequestEvent[]
  /** Requests fired during the grace wait */
  lateRequests?: PageRequestEvent[]
  /** `<script>` elements returned by the snapshot */
  dom?: DomScriptEntry[]
  /** Rejects navigation with a driver timeout */
  timeout?: boolean
  /** Rejects navigation with this message */
  gotoError?: string
  /** Result of the network-idle wait (default: true) */
  idle?: boolean
  /** Rejects the snapshot with this message */
  snapshotError?: string
  /** Snapshot never settles, like a page with a blocked main thread */
  snapshotHangs?: boolean
  status?: number
  /** Milliseconds navigation takes */
  delayMs?: number
}

/** Resolves the behavior for a navigated URL; `attempt` counts visits to that URL from 0 */
export type BehaviorFor = (url: string, attempt: number) => PageBehavior

export const script = (url: string): PageRequestEvent => ({ url, resourceType: 'script' })
export const external = (src: string): DomScriptEntry => ({ src, text: '' })
export const inline = (text: string): DomScriptEntry => ({ src: null, text })

export class FakePage implements DriverPage {
  private listeners: Array<(request: PageRequestEvent) => void> = []
  private behavior: PageBehavior = {}

  constructor(private readonly browser: FakeBrowser) {}

  onRequest(listener: (request: PageRequestEvent) => void): void {
    this.browser.events.push('onRequest')
    this.listeners.push(listener)
  }

  private emit(requests: PageRequestEvent[] | undefined): void {
    for (const request of requests ?? []) {
      for (const listener of this.listeners) listener(request)
    }
  }

  async goto(url: string, timeoutMs: number): Promise<NavigationResponse> {
    this.browser.events.push(`goto:${url}`)
    this.browser.gotoTimeouts.push(timeoutMs)
    const attempt = this.browser.visits.get(url) ?? 0
    this.browser.visits.set(url, attempt + 1)
    this.behavior = this.browser.behaviorFor(url, attempt)

    if (this.behavior.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, this.behavior.delayMs))
    }
    this.emit(this.behavior.requests)
    if (this.behavior.timeout) {
      throw new DriverTimeoutError(`page.goto: Timeout ${timeoutMs}ms exceeded.`)
    }
    if (this.behavior.gotoError) {
      throw new Error(this.behavior.gotoError)
    }
    return { status: this.behavior.status ?? 200, statusText: 'OK' }
  }

  async waitForNetworkIdle(timeoutMs: number): Promise<boolean> {
    this.browser.events.push(`idle:${timeoutMs > 0}`)
    return this.behavior.idle ?? true
  }

  async waitForTimeout(ms: number): Promise<void> {
    this.browser.events.push(`wait:${ms}`)
    this.emit(this.behavior.lateRequests)
  }

  async snapshotScripts(): Promise<DomScriptEntry[]> {
    this.browser.events.push('snapshot')
    if (this.behavior.snapshotError) {
      throw new Error(this.behavior.snapshotError)
    }
    if (this.behavior.snapshotHangs) {
      return new Promise<DomScriptEntry[]>(() => {})
    }
    return this.behavior.dom ?? []
  }
}

export class FakeContext implements DriverContext {
  closed = false

  constructor(private readonly browser: FakeBrowser) {}

  async newPage(): Promise<DriverPage> {
    this.browser.events.push('newPage')
    return new FakePage(this.browser)
  }

  async close(): Promise<void> {
    this.browser.events.push('context.close')
    this.closed = true
    this.browser.openContexts--
  }
}

export class FakeBrowser implements BrowserDriver {
  readonly events: string[] = []
  readonly contexts: FakeContext[] = []
  readonly visits = new Map<string, number>()
  readonly gotoTimeouts: number[] = []
  closed = false
  openContexts = 0
  maxOpenContexts = 0
  /** Makes every newContext() call reject */
  contextError: string | null = null

  constructor(readonly behaviorFor: BehaviorFor = () => ({})) {}

  async newContext(): Promise<DriverContext> {
    this.events.push('newContext')
    if (this.contextError) {
      throw new Error(this.contextError)
    }
    const context = new FakeContext(this)
    this.contexts.push(context)
    this.openContexts++
    this.maxOpenContexts = Math.max(this.maxOpenContexts, this.openContexts)
    return context
  }

  async close(): Promise<void> {
    this.events.push('browser.close')
    this.closed = true
  }
}

/**
 * Launcher that hands out one fake browser and records launch options.
 */
export function fakeLauncher(browser: FakeBrowser): {
  launch: (options: LaunchOptions) => Promise<BrowserDriver>
  launches: LaunchOptions[]
} {
  const launches: LaunchOptions[] = []
  return {
    launches,
    launch: async (options) => {
      launches.push(options)
      return browser
    },
  }
}
