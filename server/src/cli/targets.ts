/**
 * @fileoverview Target list handling for the CLI.
 * Accepts a single URL or a text file with one URL per line.
 */

import { readFile } from 'fs/promises'
import { parseTargetUrl } from '../utils/index.js'

/** Targets split into usable URLs and rejected lines */
export interface TargetList {
  urls: string[]
  /** Lines that are not http(s) URLs, in file order */
  skipped: string[]
}

/**
 * Parse target lines: blank lines and `#` comments are ignored,
 * lines that are not http(s) URLs are skipped.
 *
 * @example
 * parseTargetList('# shops\nhttps://a.test\nftp://b.test\n')
 * // { urls: ['https://a.test'], skipped: ['ftp://b.test'] }
 */
export function parseTargetList(text: string): TargetList {
  const urls: string[] = []
  const skipped: string[] = []
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) continue
    if (parseTargetUrl(trimmed)) {
      urls.push(trimmed)
    } else {
      skipped.push(trimmed)
    }
  }
  return { urls, skipped }
}

/**
 * Resolve the CLI's URL argument or file option into a target list.
 *
 * @throws Error if both or neither are given, or the file has no usable URL
 */
export async function loadTargets(input: { url?: string; file?: string }): Promise<TargetList> {
  if (input.url && input.file) {
    throw new Error('Provide either a URL or --file, not both.')
  }
  if (!input.url && !input.file) {
    throw new Error('Provide a URL or --file <path>.')
  }

  let list: TargetList
  if (input.file) {
    let text: string
    try {
      text = await readFile(input.file, 'utf-8')
    } catch {
      throw new Error(`File not found: ${input.file}`)
    }
    list = parseTargetList(text)
  } else {
    list = parseTargetList(input.url ?? '')
  }

  if (list.urls.length === 0) {
    throw new Error('No valid URLs to audit (URLs must start with http:// or https://).')
  }
  return list
}
