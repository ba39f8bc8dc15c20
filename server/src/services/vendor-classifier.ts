/**
 * @fileoverview Vendor classification against the ordered vendor catalog.
 * Rules are evaluated top to bottom and the first match wins, so catalog
 * order is the tie-break whenever several patterns fit the same script.
 */

import { UNKNOWN_VENDOR, getVendorCatalog, type InlineFingerprintRule, type UrlRule, type VendorCatalog } from '../data/index.js'
import type { ScriptObservation } from '../types.js'

/**
 * Check whether a URL rule matches a script URL.
 * Substring rules compare case-insensitively; regex rules are compiled with the `i` flag.
 */
function matchesUrl(rule: UrlRule, url: string, lowerUrl: string): boolean {
  switch (rule.matchKind) {
    case 'urlSubstring':
      return lowerUrl.includes(rule.needle)
    case 'urlRegex':
      return rule.regex.test(url)
  }
}

/**
 * Find the first URL rule matching a script URL.
 *
 * @returns The winning rule, or null if none matches
 */
export function findUrlRule(url: string, catalog: VendorCatalog = getVendorCatalog()): UrlRule | null {
  const lowerUrl = url.toLowerCase()
  for (const rule of catalog.urlRules) {
    if (matchesUrl(rule, url, lowerUrl)) {
      return rule
    }
  }
  return null
}

/**
 * Find the first inline fingerprint contained in a script body (case-sensitive).
 *
 * @returns The winning rule, or null if none matches
 */
export function findInlineRule(content: string, catalog: VendorCatalog = getVendorCatalog()): InlineFingerprintRule | null {
  for (const rule of catalog.inlineRules) {
    if (content.includes(rule.pattern)) {
      return rule
    }
  }
  return null
}

/**
 * Classify an external script URL.
 *
 * @example
 * classifyUrl('https://static.hotjar.com/c/hotjar-123.js') // 'Hotjar'
 * classifyUrl('https://cdn.example.com/app.js')            // 'Unknown'
 */
export function classifyUrl(url: string, catalog?: VendorCatalog): string {
  return findUrlRule(url, catalog)?.vendorName ?? UNKNOWN_VENDOR
}

/**
 * Classify an inline script body.
 *
 * @example
 * classifyInline("fbq('init', '123');") // 'Facebook Pixel'
 */
export function classifyInline(content: string, catalog?: VendorCatalog): string {
  return findInlineRule(content, catalog)?.vendorName ?? UNKNOWN_VENDOR
}

/**
 * Classify one observation: URL rules for external scripts,
 * inline fingerprints for inline ones. Never throws on a miss.
 */
export function classifyScript(observation: ScriptObservation, catalog?: VendorCatalog): string {
  if (observation.origin === 'inline') {
    return classifyInline(observation.content, catalog)
  }
  return observation.url === null ? UNKNOWN_VENDOR : classifyUrl(observation.url, catalog)
}
