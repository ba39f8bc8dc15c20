/**
 * @fileoverview Type definitions for the vendor catalog.
 * These types define the structure of data loaded from JSON files
 * and the compiled rules the classifier evaluates.
 */

// ============================================================================
// Raw Catalog Types
// ============================================================================

/** How a rule's pattern is matched */
export type VendorMatchKind = 'urlSubstring' | 'urlRegex' | 'inlineFingerprint'

/**
 * Vendor rule as stored in JSON.
 */
export interface VendorRuleRaw {
  matchKind: VendorMatchKind
  /** Substring, regular expression source (without delimiters) or inline code token */
  pattern: string
  /** Human-readable vendor label */
  vendorName: string
}

/**
 * Vendor catalog file as stored in JSON.
 * Rule order is significant: the first matching rule wins.
 */
export interface VendorCatalogRaw {
  version: number
  rules: VendorRuleRaw[]
}

// ============================================================================
// Compiled Catalog Types
// ============================================================================

interface VendorRuleBase {
  /** Pattern text as written in the catalog */
  pattern: string
  vendorName: string
  /** Position in the catalog; lower wins */
  priority: number
}

/** URL rule matched by case-insensitive substring search */
export interface UrlSubstringRule extends VendorRuleBase {
  matchKind: 'urlSubstring'
  /** Lower-cased pattern, precomputed for matching */
  needle: string
}

/** URL rule matched by a case-insensitive regular expression */
export interface UrlRegexRule extends VendorRuleBase {
  matchKind: 'urlRegex'
  regex: RegExp
}

/** Inline rule matched by case-sensitive substring search on script text */
export interface InlineFingerprintRule extends VendorRuleBase {
  matchKind: 'inlineFingerprint'
}

/** A rule that can attribute an external script URL */
export type UrlRule = UrlSubstringRule | UrlRegexRule

/** A compiled catalog entry */
export type VendorRule = UrlRule | InlineFingerprintRule

/**
 * Compiled, immutable vendor catalog.
 * URL and inline rules are kept in catalog order.
 */
export interface VendorCatalog {
  readonly urlRules: readonly UrlRule[]
  readonly inlineRules: readonly InlineFingerprintRule[]
}

/** Vendor label used when no rule matches */
export const UNKNOWN_VENDOR = 'Unknown'
