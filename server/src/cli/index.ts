#!/usr/bin/env node
/**
 * @fileoverview Command-line entry point.
 * Audits one URL or a file of URLs, prints a summary per target and writes
 * the JSON report.
 *
 * @example
 * script-audit https://example.com --verbose
 * script-audit --file urls.txt --output reports/shops.json --timeout 45
 * script-audit https://example.com --no-headless
 */

import 'dotenv/config'
import { hideBin } from 'yargs/helpers'

import { runBatch } from '../services/batch.js'
import type { AuditEntry } from '../types.js'
import { createLogger, getErrorMessage, loadConfig } from '../utils/index.js'
import { parseCliArgs } from './args.js'
import { defaultOutputPath, saveEntries } from './output.js'
import { formatEntry } from './print.js'
import { loadTargets } from './targets.js'

const log = createLogger('CLI')

async function main(): Promise<number> {
  const config = loadConfig()

  const argv = await parseCliArgs(hideBin(process.argv), config)

  const targets = await loadTargets({ url: argv.url, file: argv.file })
  for (const line of targets.skipped) {
    log.warn('Skipping invalid URL (no http/https)', { url: line })
  }

  const controller = new AbortController()
  process.once('SIGINT', () => {
    log.warn('Interrupted - finishing running scans and saving partial results')
    controller.abort()
  })

  const outputPath = argv.output ?? defaultOutputPath()
  const entries: AuditEntry[] = await runBatch(targets.urls, {
    scan: { timeoutSeconds: argv.timeout, gracePeriodSeconds: argv.grace, headless: argv.headless },
    concurrency: argv.concurrency,
    retries: argv.retries,
    signal: controller.signal,
    onEntry: (entry, index, total) => {
      for (const line of formatEntry(entry, argv.verbose, { index: index + 1, total })) {
        console.log(line)
      }
    },
  })

  if (entries.length === 0) {
    log.warn('No results to save')
    return 1
  }

  await saveEntries(entries, outputPath)
  console.log(`\nResults saved to: ${outputPath}`)
  return entries.every((entry) => 'error' in entry) ? 1 : 0
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    log.error('Audit aborted', { error: getErrorMessage(error) })
    process.exitCode = 1
  })
