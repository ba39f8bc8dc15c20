/**
 * @fileoverview URL helpers for script capture and reporting.
 * Provides target validation, script-name inference and tag-manager detection.
 */

/** Tag-manager internal and debug endpoints that are not page scripts */
const FILTERED_URL_FRAGMENTS = [
  'googletagmanager.com/gtm/init',
  'googletagmanager.com/gtm/preview',
  'googletagmanager.com/debug',
]

/** File extensions that mark a request as a script regardless of resource type */
const SCRIPT_EXTENSIONS = ['.js', '.mjs', '.cjs']

/**
 * Extract the hostname from a URL string.
 *
 * @param url - The full URL to parse
 * @returns The hostname (e.g., 'www.example.com') or 'unknown' if parsing fails
 *
 * @example
 * extractDomain('https://www.example.com/path') // Returns 'www.example.com'
 * extractDomain('invalid-url') // Returns 'unknown'
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).hostname
  } catch {
    return 'unknown'
  }
}

/**
 * Parse an audit target, accepting only absolute http(s) URLs.
 *
 * @returns The parsed URL, or null if the input is not a usable target
 */
export function parseTargetUrl(input: string): URL | null {
  const trimmed = input.trim()
  if (!/^https?:\/\//i.test(trimmed)) {
    return null
  }
  try {
    const parsed = new URL(trimmed)
    return parsed.hostname ? parsed : null
  } catch {
    return null
  }
}

/**
 * Normalize a script URL for matching network and DOM views.
 * Only surrounding whitespace is removed: query strings and fragments
 * often carry vendor IDs and stay significant.
 */
export function normalizeScriptUrl(url: string): string {
  return url.trim()
}

/**
 * Derive a readable script name from its URL.
 * Uses the last path segment, falling back to the hostname.
 *
 * @example
 * inferScriptName('https://static.hotjar.com/c/hotjar-123.js?sv=6') // Returns 'hotjar-123.js'
 * inferScriptName('https://cdn.example.com/') // Returns 'cdn.example.com'
 */
export function inferScriptName(url: string): string {
  try {
    const parsed = new URL(url)
    const segments = parsed.pathname.split('/').filter(Boolean)
    const last = segments[segments.length - 1]
    if (last) {
      return decodeURIComponentSafe(last)
    }
    return parsed.hostname || url
  } catch {
    return url
  }
}

function decodeURIComponentSafe(value: string): string {
  try {
    return decodeURIComponent(value)
  } catch {
    return value
  }
}

/**
 * Whether a request should be recorded as a script.
 * Trusts the browser's resource type first, then the URL path's extension.
 */
export function isScriptRequest(url: string, resourceType: string): boolean {
  if (resourceType === 'script') {
    return true
  }
  try {
    const pathname = new URL(url).pathname.toLowerCase()
    return SCRIPT_EXTENSIONS.some((ext) => pathname.endsWith(ext))
  } catch {
    return false
  }
}

/**
 * Whether a URL is a tag-manager internal or debug endpoint to be ignored.
 */
export function isFilteredUrl(url: string): boolean {
  const lower = url.toLowerCase()
  return FILTERED_URL_FRAGMENTS.some((fragment) => lower.includes(fragment))
}

/**
 * Whether a URL is a Google Tag Manager container loader.
 * Covers the standard hosts and server-side GTM proxies on custom domains.
 *
 * @example
 * isTagManagerLoader('https://www.googletagmanager.com/gtm.js?id=GTM-ABC') // true
 * isTagManagerLoader('https://metrics.example.com/gtm.js?id=GTM-ABC')      // true
 * isTagManagerLoader('https://example.com/gtm.js')                        // false
 */
export function isTagManagerLoader(url: string): boolean {
  const lower = url.toLowerCase()
  if (lower.includes('googletagmanager.com/gtm.js') || lower.includes('googletagmanager.com/gtag/js')) {
    return true
  }
  if (lower.includes('/gtm.js') && lower.includes('id=gtm-')) {
    return true
  }
  return lower.includes('/gtag/js') && (lower.includes('id=g-') || lower.includes('id=gtm-'))
}
