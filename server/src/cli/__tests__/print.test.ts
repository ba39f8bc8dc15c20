import { describe, it, expect } from 'vitest'
import { formatEntry, vendorBreakdown } from '../print.js'
import type { ScanReport } from '../../types.js'

const report: ScanReport = {
  url: 'https://shop.test',
  scanned_at: '2026-03-01T09:30:15Z',
  gtm_detected: true,
  scripts: [
    { url: 'https://www.googletagmanager.com/gtm.js?id=GTM-ABC', name: 'gtm.js', vendor: 'Google Tag Manager', via_gtm: false, type: 'external' },
    { url: 'https://static.hotjar.com/c/hotjar-123.js', name: 'hotjar-123.js', vendor: 'Hotjar', via_gtm: true, type: 'external' },
    { url: null, name: 'inline', vendor: 'Hotjar', via_gtm: false, type: 'inline' },
  ],
}

describe('vendorBreakdown', () => {
  it('counts scripts per vendor, most frequent first', () => {
    expect(vendorBreakdown(report)).toEqual([
      ['Hotjar', 2],
      ['Google Tag Manager', 1],
    ])
  })

  it('keeps first-seen order for ties', () => {
    const tied: ScanReport = { ...report, scripts: report.scripts.slice(0, 2) }
    expect(vendorBreakdown(tied).map(([vendor]) => vendor)).toEqual(['Google Tag Manager', 'Hotjar'])
  })
})

describe('formatEntry', () => {
  it('summarizes a successful scan', () => {
    expect(formatEntry(report, false, { index: 1, total: 2 })).toEqual([
      '',
      '[1/2] Auditing: https://shop.test',
      '  Found 3 scripts (1 inline, 2 external)',
      '  GTM detected: YES',
      '  Scripts injected via GTM: 1',
      '  Vendor breakdown:',
      `    ${'Hotjar'.padEnd(35)} 2`,
      `    ${'Google Tag Manager'.padEnd(35)} 1`,
    ])
  })

  it('omits the injected count without a tag manager', () => {
    const lines = formatEntry({ ...report, gtm_detected: false, scripts: [] }, false)

    expect(lines).toEqual(['', 'Auditing: https://shop.test', '  Found 0 scripts (0 inline, 0 external)', '  GTM detected: NO'])
  })

  it('prints the error of a failed target', () => {
    const lines = formatEntry(
      { url: 'https://down.test', scanned_at: '2026-03-01T09:30:15Z', gtm_detected: false, error: 'Connection refused - site may be down', scripts: [] },
      true
    )

    expect(lines).toEqual(['', 'Auditing: https://down.test', '  ERROR: Connection refused - site may be down'])
  })

  it('appends a script table in verbose mode', () => {
    const row = (url: string, name: string, vendor: string, gtm: string, type: string) =>
      `  ${url.padEnd(55)} ${name.padEnd(20)} ${vendor.padEnd(30)} ${gtm.padEnd(5)} ${type}`
    const header = row('URL', 'Name', 'Vendor', 'GTM', 'Type')

    expect(formatEntry(report, true).slice(8)).toEqual([
      '',
      header,
      `  ${'-'.repeat(header.length - 2)}`,
      row('https://www.googletagmanager.com/gtm.js?id=GTM-ABC', 'gtm.js', 'Google Tag Manager', 'No', 'external'),
      row('https://static.hotjar.com/c/hotjar-123.js', 'hotjar-123.js', 'Hotjar', 'Yes', 'external'),
      row('inline', 'inline', 'Hotjar', 'No', 'inline'),
    ])
  })

  it('truncates long URLs in the script table', () => {
    const url = `https://cdn.shop.test/${'a'.repeat(40)}.js`
    const lines = formatEntry({ ...report, scripts: [{ url, name: 'a.js', vendor: 'Unknown', via_gtm: false, type: 'external' }] }, true)

    expect(lines.at(-1)).toBe(
      `  ${`${url.slice(0, 50)}...`.padEnd(55)} ${'a.js'.padEnd(20)} ${'Unknown'.padEnd(30)} ${'No'.padEnd(5)} external`
    )
  })
})
