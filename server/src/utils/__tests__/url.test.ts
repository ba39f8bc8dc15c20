import { describe, it, expect } from 'vitest'
import {
  extractDomain,
  inferScriptName,
  isFilteredUrl,
  isScriptRequest,
  isTagManagerLoader,
  normalizeScriptUrl,
  parseTargetUrl,
} from '../url.js'

describe('parseTargetUrl', () => {
  it('accepts http and https URLs', () => {
    expect(parseTargetUrl('https://shop.test')?.href).toBe('https://shop.test/')
    expect(parseTargetUrl('  http://shop.test/path?q=1 ')?.href).toBe('http://shop.test/path?q=1')
  })

  it.each(['shop.test', 'ftp://shop.test', 'javascript:alert(1)', '', '   ', 'https://'])('rejects %j', (input) => {
    expect(parseTargetUrl(input)).toBeNull()
  })
})

describe('extractDomain', () => {
  it('returns the hostname or unknown', () => {
    expect(extractDomain('https://www.shop.test/a')).toBe('www.shop.test')
    expect(extractDomain('invalid-url')).toBe('unknown')
  })
})

describe('normalizeScriptUrl', () => {
  it('trims whitespace and keeps query strings', () => {
    expect(normalizeScriptUrl(' https://a.test/x.js?v=2 \n')).toBe('https://a.test/x.js?v=2')
  })
})

describe('inferScriptName', () => {
  it('uses the last path segment', () => {
    expect(inferScriptName('https://static.hotjar.com/c/hotjar-123.js?sv=6')).toBe('hotjar-123.js')
  })

  it('decodes encoded segments', () => {
    expect(inferScriptName('https://a.test/my%20script.js')).toBe('my script.js')
  })

  it('falls back to the hostname for bare paths', () => {
    expect(inferScriptName('https://cdn.shop.test/')).toBe('cdn.shop.test')
  })
})

describe('isScriptRequest', () => {
  it('trusts the script resource type', () => {
    expect(isScriptRequest('https://a.test/loader', 'script')).toBe(true)
  })

  it('recognizes script extensions on other resource types', () => {
    expect(isScriptRequest('https://a.test/app.MJS?v=1', 'fetch')).toBe(true)
    expect(isScriptRequest('https://a.test/style.css', 'stylesheet')).toBe(false)
  })
})

describe('isFilteredUrl', () => {
  it('matches tag-manager debug endpoints', () => {
    expect(isFilteredUrl('https://www.googletagmanager.com/gtm/preview?id=GTM-1')).toBe(true)
    expect(isFilteredUrl('https://www.googletagmanager.com/debug/bootstrap.js')).toBe(true)
    expect(isFilteredUrl('https://www.googletagmanager.com/gtm.js?id=GTM-1')).toBe(false)
  })
})

describe('isTagManagerLoader', () => {
  it.each([
    ['https://www.googletagmanager.com/gtm.js?id=GTM-ABC', true],
    ['https://www.googletagmanager.com/gtag/js?id=G-123', true],
    ['https://metrics.shop.test/gtm.js?id=GTM-ABC', true],
    ['https://metrics.shop.test/gtag/js?id=G-123', true],
    ['https://shop.test/gtm.js', false],
    ['https://shop.test/app.js', false],
  ])('%s -> %s', (url, expected) => {
    expect(isTagManagerLoader(url)).toBe(expected)
  })
})
