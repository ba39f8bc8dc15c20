import { describe, it, expect } from 'vitest'
import { compileVendorCatalog, getVendorCatalog } from '../index.js'

describe('compileVendorCatalog', () => {
  it('splits rules by kind and keeps catalog positions as priorities', () => {
    const catalog = compileVendorCatalog({
      version: 1,
      rules: [
        { matchKind: 'urlSubstring', pattern: 'Static.Hotjar.com', vendorName: 'Hotjar' },
        { matchKind: 'inlineFingerprint', pattern: 'hj(', vendorName: 'Hotjar' },
        { matchKind: 'urlRegex', pattern: 'clarity\\.ms', vendorName: 'Microsoft Clarity' },
      ],
    })

    expect(catalog.urlRules.map((r) => [r.matchKind, r.priority])).toEqual([
      ['urlSubstring', 0],
      ['urlRegex', 2],
    ])
    expect(catalog.inlineRules.map((r) => [r.pattern, r.priority])).toEqual([['hj(', 1]])

    const [substring] = catalog.urlRules
    expect(substring.matchKind === 'urlSubstring' && substring.needle).toBe('static.hotjar.com')
  })

  it('returns a frozen catalog', () => {
    const catalog = compileVendorCatalog({
      version: 1,
      rules: [{ matchKind: 'urlSubstring', pattern: 'a.test', vendorName: 'A' }],
    })

    expect(Object.isFrozen(catalog)).toBe(true)
    expect(Object.isFrozen(catalog.urlRules)).toBe(true)
    expect(Object.isFrozen(catalog.urlRules[0])).toBe(true)
  })

  it('rejects unknown match kinds', () => {
    expect(() =>
      compileVendorCatalog({ version: 1, rules: [{ matchKind: 'domain', pattern: 'a.test', vendorName: 'A' }] })
    ).toThrow(/^Invalid vendor catalog: rules\.0\.matchKind: /)
  })

  it('rejects empty patterns', () => {
    expect(() =>
      compileVendorCatalog({ version: 1, rules: [{ matchKind: 'urlSubstring', pattern: '', vendorName: 'A' }] })
    ).toThrow(/^Invalid vendor catalog: rules\.0\.pattern: /)
  })

  it('rejects regex patterns that do not compile', () => {
    expect(() =>
      compileVendorCatalog({ version: 1, rules: [{ matchKind: 'urlRegex', pattern: '(unclosed', vendorName: 'A' }] })
    ).toThrow('Invalid vendor catalog: rules.0.pattern is not a valid regular expression')
  })
})

describe('getVendorCatalog', () => {
  it('loads the bundled catalog once', () => {
    const catalog = getVendorCatalog()

    expect(getVendorCatalog()).toBe(catalog)
    expect(catalog.urlRules[0]).toMatchObject({
      matchKind: 'urlSubstring',
      pattern: 'googletagmanager.com/gtm.js',
      vendorName: 'Google Tag Manager',
      priority: 0,
    })
    expect(catalog.inlineRules.length).toBeGreaterThan(0)
  })

  it('evaluates inline rules in ascending priority', () => {
    const priorities = getVendorCatalog().inlineRules.map((rule) => rule.priority)
    expect([...priorities].sort((a, b) => a - b)).toEqual(priorities)
  })
})
