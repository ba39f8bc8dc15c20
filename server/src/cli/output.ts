/**
 * @fileoverview JSON persistence of audit reports.
 */

import { mkdir, writeFile } from 'fs/promises'
import { dirname } from 'path'
import type { AuditEntry } from '../types.js'

/**
 * Default report path, stamped with local time.
 *
 * @example
 * defaultOutputPath(new Date(2026, 2, 1, 9, 5, 7)) // 'output/audit_20260301_090507.json'
 */
export function defaultOutputPath(now: Date = new Date()): string {
  const pad = (n: number) => n.toString().padStart(2, '0')
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  return `output/audit_${date}_${time}.json`
}

/**
 * Serialize entries: a single entry is written as an object, several as an array.
 */
export function serializeEntries(entries: readonly AuditEntry[]): string {
  const data = entries.length === 1 ? entries[0] : entries
  return JSON.stringify(data, null, 2) + '\n'
}

/**
 * Write entries to a JSON file, creating parent directories as needed.
 */
export async function saveEntries(entries: readonly AuditEntry[], outputPath: string): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true })
  await writeFile(outputPath, serializeEntries(entries), 'utf-8')
}
