/**
 * @fileoverview Plain-text summaries of audit entries for the terminal.
 */

import type { AuditEntry, ScanReport } from '../types.js'

/** Column widths of the verbose script table */
const COLUMNS = { url: 55, name: 20, vendor: 30, gtm: 5 }

/**
 * Count scripts per vendor, most frequent first (ties keep first-seen order).
 */
export function vendorBreakdown(report: ScanReport): Array<[vendor: string, count: number]> {
  const counts = new Map<string, number>()
  for (const script of report.scripts) {
    counts.set(script.vendor, (counts.get(script.vendor) ?? 0) + 1)
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1])
}

function truncate(value: string, width: number): string {
  return value.length > width - 2 ? `${value.slice(0, width - 5)}...` : value
}

/**
 * Render one entry as terminal lines.
 *
 * @param entry - Successful report or failed entry
 * @param verbose - Append a table of every script
 * @param position - 1-based position and total, shown as a `[i/n]` prefix
 */
export function formatEntry(entry: AuditEntry, verbose: boolean, position?: { index: number; total: number }): string[] {
  const prefix = position ? `[${position.index}/${position.total}] ` : ''
  const lines = ['', `${prefix}Auditing: ${entry.url}`]

  if ('error' in entry) {
    lines.push(`  ERROR: ${entry.error}`)
    return lines
  }

  const scripts = entry.scripts
  const inline = scripts.filter((s) => s.type === 'inline').length
  const external = scripts.length - inline
  const viaGtm = scripts.filter((s) => s.via_gtm).length

  lines.push(`  Found ${scripts.length} scripts (${inline} inline, ${external} external)`)
  lines.push(`  GTM detected: ${entry.gtm_detected ? 'YES' : 'NO'}`)
  if (entry.gtm_detected) {
    lines.push(`  Scripts injected via GTM: ${viaGtm}`)
  }

  const breakdown = vendorBreakdown(entry)
  if (breakdown.length > 0) {
    lines.push('  Vendor breakdown:')
    for (const [vendor, count] of breakdown) {
      lines.push(`    ${vendor.padEnd(35)} ${count}`)
    }
  }

  if (verbose && scripts.length > 0) {
    const header = `  ${'URL'.padEnd(COLUMNS.url)} ${'Name'.padEnd(COLUMNS.name)} ${'Vendor'.padEnd(COLUMNS.vendor)} ${'GTM'.padEnd(COLUMNS.gtm)} Type`
    lines.push('', header, `  ${'-'.repeat(header.length - 2)}`)
    for (const s of scripts) {
      const url = truncate(s.url ?? 'inline', COLUMNS.url)
      lines.push(
        `  ${url.padEnd(COLUMNS.url)} ${s.name.padEnd(COLUMNS.name)} ${s.vendor.padEnd(COLUMNS.vendor)} ${(s.via_gtm ? 'Yes' : 'No').padEnd(COLUMNS.gtm)} ${s.type}`
      )
    }
  }

  return lines
}
