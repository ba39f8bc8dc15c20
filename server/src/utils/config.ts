/**
 * @fileoverview Configuration schemas for scans and the process environment.
 * Values are validated with zod so a bad .env or option fails fast with a
 * readable message instead of surfacing mid-scan.
 */

import { z } from 'zod'

// ============================================================================
// Scan Options
// ============================================================================

/**
 * Options recognized by a single scan.
 * The timeout covers navigation and the network-idle wait; the grace period
 * runs afterwards so late tag-manager tags can fire.
 */
export const scanOptionsSchema = z.object({
  timeoutSeconds: z.number().int().positive().default(30),
  headless: z.boolean().default(true),
  gracePeriodSeconds: z.number().int().min(0).default(2),
})

/** Scan options as accepted from callers (every field optional) */
export type ScanOptions = z.input<typeof scanOptionsSchema>

/** Scan options with defaults applied */
export type ResolvedScanOptions = z.output<typeof scanOptionsSchema>

/**
 * Apply defaults to caller-supplied scan options and validate them.
 *
 * @throws Error describing every invalid field
 */
export function resolveScanOptions(options: ScanOptions = {}): ResolvedScanOptions {
  const parsed = scanOptionsSchema.safeParse(options)
  if (!parsed.success) {
    throw new Error(`Invalid scan options: ${formatIssues(parsed.error)}`)
  }
  return parsed.data
}

// ============================================================================
// Environment
// ============================================================================

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  SCAN_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(30),
  SCAN_GRACE_PERIOD_SECONDS: z.coerce.number().int().min(0).default(2),
  SCAN_HEADLESS: booleanFlag.default('true'),
  SCAN_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
  SCAN_RETRIES: z.coerce.number().int().min(0).max(5).default(0),
})

/**
 * Process-level configuration shared by the CLI and the HTTP server.
 */
export interface AppConfig {
  port: number
  /** Default options for every scan started by this process */
  scan: ResolvedScanOptions
  /** Maximum number of scans (browser contexts) in flight during a batch */
  concurrency: number
  /** Extra attempts for targets that failed to load; 0 disables retries */
  retries: number
}

/**
 * Read and validate configuration from environment variables.
 * Empty variables are treated as unset.
 *
 * @param env - Environment to read (default: process.env)
 * @throws Error describing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  )
  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${formatIssues(parsed.error)}`)
  }

  const values = parsed.data
  return {
    port: values.PORT,
    scan: {
      timeoutSeconds: values.SCAN_TIMEOUT_SECONDS,
      headless: values.SCAN_HEADLESS,
      gracePeriodSeconds: values.SCAN_GRACE_PERIOD_SECONDS,
    },
    concurrency: values.SCAN_CONCURRENCY,
    retries: values.SCAN_RETRIES,
  }
}

/**
 * Join zod issues into a single line, e.g. 'PORT: Expected number, received nan'.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}
