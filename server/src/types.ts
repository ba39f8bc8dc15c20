/**
 * @fileoverview Type definitions for the script audit engine.
 * Contains the raw capture records, reconciled script observations,
 * scan results and the serialized report shape.
 */

// ============================================================================
// Capture Types
// ============================================================================

/**
 * A script request observed on the network during page load.
 */
export interface NetworkScriptRequest {
  /** Fully resolved request URL, query string and fragment included */
  url: string
  /** Order in which the request was first seen (0-based) */
  sequence: number
}

/**
 * A `<script>` element found in the DOM snapshot.
 * External scripts carry their resolved `src`, inline scripts their text.
 */
export interface DomScriptEntry {
  /** Resolved `src` URL, or null for inline scripts */
  src: string | null
  /** Inline text content (empty for external scripts) */
  text: string
}

/**
 * Raw output of one capture session.
 */
export interface CaptureResult {
  /** Script requests in network discovery order */
  networkScripts: NetworkScriptRequest[]
  /** `<script>` elements in document order at snapshot time */
  domScripts: DomScriptEntry[]
  /** Whether a tag-manager loader script was seen on the network or in the DOM */
  gtmDetected: boolean
}

// ============================================================================
// Observation Types
// ============================================================================

/** Where a script's code came from */
export type ScriptOrigin = 'external' | 'inline'

/**
 * One detected script after reconciling network and DOM views.
 */
export interface ScriptObservation {
  /** Resolved URL for external scripts, content hash for inline scripts */
  identity: string
  /** Resolved URL for external scripts, null for inline scripts */
  url: string | null
  /** Last path segment of the URL, or 'inline' */
  displayName: string
  origin: ScriptOrigin
  /** Fetched over the network but absent from the settled DOM */
  injected: boolean
  /** Injected while a tag manager was present on the page */
  viaGtm: boolean
  /** Inline text content (empty for external scripts) */
  content: string
}

/**
 * A script observation with its vendor attribution.
 */
export interface ClassifiedScript extends ScriptObservation {
  /** Vendor label, or 'Unknown' when no catalog rule matched */
  vendor: string
}

/**
 * The audit result for one target URL.
 * Frozen once returned by the scanner.
 */
export interface ScanResult {
  url: string
  /** ISO-8601 UTC timestamp, second precision */
  scannedAt: string
  gtmDetected: boolean
  scripts: readonly ClassifiedScript[]
}

// ============================================================================
// Report Types (wire format shared with CLI, server and persisted files)
// ============================================================================

/**
 * One script row of the serialized report.
 */
export interface ScriptReport {
  url: string | null
  name: string
  vendor: string
  via_gtm: boolean
  type: ScriptOrigin
}

/**
 * Serialized report for a successful scan.
 */
export interface ScanReport {
  url: string
  scanned_at: string
  gtm_detected: boolean
  scripts: ScriptReport[]
}

/**
 * Serialized entry for a target that could not be scanned.
 */
export interface FailedScanReport {
  url: string
  scanned_at: string
  gtm_detected: false
  error: string
  scripts: []
}

/** One entry of a batch output collection */
export type AuditEntry = ScanReport | FailedScanReport

// ============================================================================
// Progress Types
// ============================================================================

/**
 * Callback invoked as a scan moves through its phases.
 *
 * @param step - Phase identifier (e.g., 'launch', 'navigate', 'snapshot')
 * @param message - Human-readable progress message
 * @param progress - Progress percentage (0-100)
 */
export type ProgressCallback = (step: string, message: string, progress: number) => void
