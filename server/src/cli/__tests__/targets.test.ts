import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { loadTargets, parseTargetList } from '../targets.js'

describe('parseTargetList', () => {
  it('skips blanks and comments and separates invalid lines', () => {
    const list = parseTargetList('# shops\r\nhttps://a.test\n\n  http://b.test/path  \nftp://c.test\nd.test\n')

    expect(list).toEqual({
      urls: ['https://a.test', 'http://b.test/path'],
      skipped: ['ftp://c.test', 'd.test'],
    })
  })
})

describe('loadTargets', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'script-audit-targets-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('accepts a single URL', async () => {
    await expect(loadTargets({ url: 'https://a.test' })).resolves.toEqual({ urls: ['https://a.test'], skipped: [] })
  })

  it('reads URLs from a file', async () => {
    const file = join(dir, 'urls.txt')
    await writeFile(file, 'https://a.test\nnot a url\nhttps://b.test\n', 'utf-8')

    await expect(loadTargets({ file })).resolves.toEqual({
      urls: ['https://a.test', 'https://b.test'],
      skipped: ['not a url'],
    })
  })

  it('requires exactly one source', async () => {
    await expect(loadTargets({ url: 'https://a.test', file: 'urls.txt' })).rejects.toThrow(
      'Provide either a URL or --file, not both.'
    )
    await expect(loadTargets({})).rejects.toThrow('Provide a URL or --file <path>.')
  })

  it('reports a missing file', async () => {
    const file = join(dir, 'missing.txt')
    await expect(loadTargets({ file })).rejects.toThrow(`File not found: ${file}`)
  })

  it('fails when nothing usable remains', async () => {
    await expect(loadTargets({ url: 'example.test' })).rejects.toThrow(
      'No valid URLs to audit (URLs must start with http:// or https://).'
    )
  })
})
