import { describe, it, expect } from 'vitest'
import { loadConfig, resolveScanOptions } from '../config.js'

describe('resolveScanOptions', () => {
  it('applies defaults', () => {
    expect(resolveScanOptions()).toEqual({ timeoutSeconds: 30, headless: true, gracePeriodSeconds: 2 })
  })

  it('keeps supplied values', () => {
    expect(resolveScanOptions({ timeoutSeconds: 45, headless: false, gracePeriodSeconds: 0 })).toEqual({
      timeoutSeconds: 45,
      headless: false,
      gracePeriodSeconds: 0,
    })
  })

  it('rejects non-positive timeouts', () => {
    expect(() => resolveScanOptions({ timeoutSeconds: 0 })).toThrow(/^Invalid scan options: timeoutSeconds: /)
  })

  it('rejects negative grace periods', () => {
    expect(() => resolveScanOptions({ gracePeriodSeconds: -1 })).toThrow(/^Invalid scan options: gracePeriodSeconds: /)
  })
})

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      scan: { timeoutSeconds: 30, headless: true, gracePeriodSeconds: 2 },
      concurrency: 1,
      retries: 0,
    })
  })

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      SCAN_TIMEOUT_SECONDS: '60',
      SCAN_GRACE_PERIOD_SECONDS: '5',
      SCAN_HEADLESS: 'false',
      SCAN_CONCURRENCY: '4',
      SCAN_RETRIES: '2',
    })

    expect(config).toEqual({
      port: 8080,
      scan: { timeoutSeconds: 60, headless: false, gracePeriodSeconds: 5 },
      concurrency: 4,
      retries: 2,
    })
  })

  it('treats empty variables as unset', () => {
    expect(loadConfig({ PORT: '', SCAN_HEADLESS: '' }).port).toBe(3001)
  })

  it('accepts 0 and 1 as boolean flags', () => {
    expect(loadConfig({ SCAN_HEADLESS: '0' }).scan.headless).toBe(false)
    expect(loadConfig({ SCAN_HEADLESS: '1' }).scan.headless).toBe(true)
  })

  it('names every invalid variable', () => {
    expect(() => loadConfig({ PORT: 'abc', SCAN_CONCURRENCY: '0' })).toThrow(
      /^Invalid environment configuration: PORT: .+; SCAN_CONCURRENCY: /
    )
  })
})
