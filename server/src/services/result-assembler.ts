/**
 * @fileoverview Assembles classified observations into the final scan result
 * and converts results to the serialized report shape.
 */

import type { VendorCatalog } from '../data/index.js'
import type {
  ClassifiedScript,
  FailedScanReport,
  ScanReport,
  ScanResult,
  ScriptObservation,
} from '../types.js'
import { classifyScript } from './vendor-classifier.js'

/**
 * Format a date as an ISO-8601 UTC timestamp with second precision.
 *
 * @example
 * formatScanTimestamp(new Date('2026-03-01T09:30:15.250Z')) // '2026-03-01T09:30:15Z'
 */
export function formatScanTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

/** Input for assembling one scan result */
export interface AssembleInput {
  url: string
  gtmDetected: boolean
  /** Reconciled observations in final order */
  observations: readonly ScriptObservation[]
  catalog?: VendorCatalog
  scannedAt?: Date
}

/**
 * Classify each observation and build an immutable ScanResult.
 *
 * @throws Error if two observations share an identity or a script claims
 *   tag-manager injection on a page without a tag manager
 */
export function assembleScanResult(input: AssembleInput): ScanResult {
  const identities = new Set<string>()
  const scripts: ClassifiedScript[] = []

  for (const observation of input.observations) {
    if (identities.has(observation.identity)) {
      throw new Error(`Duplicate script identity in scan result: ${observation.identity}`)
    }
    if (observation.viaGtm && !input.gtmDetected) {
      throw new Error(`Script marked as tag-manager injected without a tag manager: ${observation.identity}`)
    }
    identities.add(observation.identity)
    scripts.push(Object.freeze({ ...observation, vendor: classifyScript(observation, input.catalog) }))
  }

  return Object.freeze({
    url: input.url,
    scannedAt: formatScanTimestamp(input.scannedAt ?? new Date()),
    gtmDetected: input.gtmDetected,
    scripts: Object.freeze(scripts),
  })
}

/**
 * Convert a scan result into the persisted/transmitted report shape.
 */
export function toScanReport(result: ScanResult): ScanReport {
  return {
    url: result.url,
    scanned_at: result.scannedAt,
    gtm_detected: result.gtmDetected,
    scripts: result.scripts.map((script) => ({
      url: script.url,
      name: script.displayName,
      vendor: script.vendor,
      via_gtm: script.viaGtm,
      type: script.origin,
    })),
  }
}

/**
 * Build the report entry recorded for a target that could not be scanned.
 */
export function toFailedReport(url: string, message: string, failedAt: Date = new Date()): FailedScanReport {
  return {
    url,
    scanned_at: formatScanTimestamp(failedAt),
    gtm_detected: false,
    error: message,
    scripts: [],
  }
}
