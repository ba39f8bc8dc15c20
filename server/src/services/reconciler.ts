/**
 * @fileoverview Reconciles the network view and the DOM view of a page's scripts.
 * Both views are merged by script identity: a script seen in both produces one
 * observation, and a script fetched but missing from the settled DOM is
 * marked as injected.
 */

import { createHash } from 'crypto'
import type { CaptureResult, ScriptObservation } from '../types.js'
import { inferScriptName, normalizeScriptUrl } from '../utils/index.js'

/** Display name for inline scripts */
export const INLINE_SCRIPT_NAME = 'inline'

/**
 * Stable identity for an inline script body.
 *
 * @example
 * inlineIdentity('fbq("init", "1");') // 'inline:<64 hex chars>'
 */
export function inlineIdentity(text: string): string {
  return `inline:${createHash('sha256').update(text).digest('hex')}`
}

/**
 * Merge network requests and the DOM snapshot into deduplicated observations.
 *
 * Output order: network-captured scripts in discovery order, then external
 * scripts only present in the DOM, then inline scripts, both in document order.
 *
 * `viaGtm` is set only for injected scripts on pages where a tag manager was detected.
 */
export function reconcileScripts(capture: CaptureResult): ScriptObservation[] {
  const observations = new Map<string, ScriptObservation>()

  const domExternal: string[] = []
  const domInline: string[] = []
  for (const entry of capture.domScripts) {
    if (entry.src !== null) {
      const url = normalizeScriptUrl(entry.src)
      if (url) domExternal.push(url)
    } else {
      const text = entry.text.trim()
      if (text) domInline.push(text)
    }
  }
  const inDom = new Set(domExternal)

  const addExternal = (url: string, injected: boolean): void => {
    if (observations.has(url)) return
    observations.set(url, {
      identity: url,
      url,
      displayName: inferScriptName(url),
      origin: 'external',
      injected,
      viaGtm: injected && capture.gtmDetected,
      content: '',
    })
  }

  const networkInOrder = [...capture.networkScripts].sort((a, b) => a.sequence - b.sequence)
  for (const request of networkInOrder) {
    const url = normalizeScriptUrl(request.url)
    addExternal(url, !inDom.has(url))
  }

  for (const url of domExternal) {
    addExternal(url, false)
  }

  for (const text of domInline) {
    const identity = inlineIdentity(text)
    if (observations.has(identity)) continue
    observations.set(identity, {
      identity,
      url: null,
      displayName: INLINE_SCRIPT_NAME,
      origin: 'inline',
      injected: false,
      viaGtm: false,
      content: text,
    })
  }

  return [...observations.values()]
}
