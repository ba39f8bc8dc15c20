/**
 * @fileoverview Data loader for the vendor catalog.
 * Loads the JSON catalog, validates it and compiles patterns into
 * matchers. The compiled catalog is frozen and shared read-only by every
 * scan in the process.
 *
 * Patterns come from the vendors' documented embed snippets and script
 * hosts. Keep more specific patterns above general ones for the same
 * vendor, since the first matching row wins.
 */

import { readFileSync } from 'fs'
import { join, dirname } from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import { formatIssues } from '../utils/config.js'
import type {
  InlineFingerprintRule,
  UrlRule,
  VendorCatalog,
  VendorCatalogRaw,
} from './types.js'

const __dirname = dirname(fileURLToPath(import.meta.url))

/** Default catalog location, next to this module */
const DEFAULT_CATALOG_PATH = join(__dirname, 'vendors', 'vendor-catalog.json')

// ============================================================================
// Validation
// ============================================================================

const vendorRuleSchema = z.object({
  matchKind: z.enum(['urlSubstring', 'urlRegex', 'inlineFingerprint']),
  pattern: z.string().min(1),
  vendorName: z.string().min(1),
})

const vendorCatalogSchema = z.object({
  version: z.number().int(),
  rules: z.array(vendorRuleSchema),
})

// ============================================================================
// Compilation
// ============================================================================

/**
 * Validate raw catalog data and compile it into ordered rule lists.
 * Each rule's priority is its position in the raw list.
 *
 * @param raw - Parsed JSON content of a catalog file
 * @throws Error if the data is malformed or a regex pattern does not compile
 */
export function compileVendorCatalog(raw: unknown): VendorCatalog {
  const parsed = vendorCatalogSchema.safeParse(raw)
  if (!parsed.success) {
    throw new Error(`Invalid vendor catalog: ${formatIssues(parsed.error)}`)
  }

  const catalog: VendorCatalogRaw = parsed.data
  const urlRules: UrlRule[] = []
  const inlineRules: InlineFingerprintRule[] = []

  catalog.rules.forEach((rule, priority) => {
    const base = { pattern: rule.pattern, vendorName: rule.vendorName, priority }
    switch (rule.matchKind) {
      case 'urlSubstring':
        urlRules.push({ ...base, matchKind: 'urlSubstring', needle: rule.pattern.toLowerCase() })
        break
      case 'urlRegex': {
        let regex: RegExp
        try {
          regex = new RegExp(rule.pattern, 'i')
        } catch (error) {
          throw new Error(`Invalid vendor catalog: rules.${priority}.pattern is not a valid regular expression`, { cause: error })
        }
        urlRules.push({ ...base, matchKind: 'urlRegex', regex })
        break
      }
      case 'inlineFingerprint':
        inlineRules.push({ ...base, matchKind: 'inlineFingerprint' })
        break
    }
  })

  return Object.freeze({
    urlRules: Object.freeze(urlRules.map((rule) => Object.freeze(rule))),
    inlineRules: Object.freeze(inlineRules.map((rule) => Object.freeze(rule))),
  })
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load and compile a catalog file.
 *
 * @param filePath - Path to a catalog JSON file (default: the bundled catalog)
 */
export function loadVendorCatalog(filePath: string = DEFAULT_CATALOG_PATH): VendorCatalog {
  const content = readFileSync(filePath, 'utf-8')
  const raw: unknown = JSON.parse(content)
  return compileVendorCatalog(raw)
}

/** Bundled catalog - loaded once per process */
let _vendorCatalog: VendorCatalog | null = null

/**
 * Get the bundled vendor catalog (lazy loaded and cached).
 */
export function getVendorCatalog(): VendorCatalog {
  if (!_vendorCatalog) {
    _vendorCatalog = loadVendorCatalog()
  }
  return _vendorCatalog
}
