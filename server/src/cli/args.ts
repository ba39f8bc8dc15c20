/**
 * @fileoverview Command-line argument parsing.
 */

import yargs from 'yargs'
import type { AppConfig } from '../utils/index.js'

/** Parsed command line, with environment defaults applied */
export interface CliArgs {
  url?: string
  file?: string
  output?: string
  timeout: number
  grace: number
  concurrency: number
  retries: number
  headless: boolean
  verbose: boolean
}

/**
 * Parse command-line arguments. Defaults come from the environment configuration.
 *
 * @param args - Arguments without the node and script paths
 *
 * @example
 * await parseCliArgs(['https://example.com', '--timeout', '45'], loadConfig())
 */
export async function parseCliArgs(args: string[], config: AppConfig): Promise<CliArgs> {
  const argv = await yargs(args)
    .scriptName('script-audit')
    .command('$0 [url]', 'Detect every script a page runs, including tag-manager injected ones', (y) =>
      y.positional('url', { type: 'string', describe: 'Single URL to audit (e.g. https://example.com)' })
    )
    .option('file', { alias: 'f', type: 'string', describe: 'Text file with one URL per line' })
    .option('output', { alias: 'o', type: 'string', describe: 'Output JSON path (default: output/audit_TIMESTAMP.json)' })
    .option('timeout', { alias: 't', type: 'number', default: config.scan.timeoutSeconds, describe: 'Timeout per URL in seconds' })
    .option('grace', { type: 'number', default: config.scan.gracePeriodSeconds, describe: 'Seconds to wait for late tags after network idle' })
    .option('concurrency', { alias: 'c', type: 'number', default: config.concurrency, describe: 'Scans to run at once' })
    .option('retries', { type: 'number', default: config.retries, describe: 'Extra attempts for pages that fail to load' })
    .option('headless', { type: 'boolean', default: config.scan.headless, describe: 'Run without a browser window (--no-headless to show it)' })
    .option('verbose', { alias: 'v', type: 'boolean', default: false, describe: 'Print a table of all detected scripts per URL' })
    .strict()
    .help()
    .parseAsync()

  // The positional is declared in the command builder, which yargs does not carry into the parsed type
  const url: unknown = argv.url
  return {
    url: typeof url === 'string' ? url : undefined,
    file: argv.file,
    output: argv.output,
    timeout: argv.timeout,
    grace: argv.grace,
    concurrency: argv.concurrency,
    retries: argv.retries,
    headless: argv.headless,
    verbose: argv.verbose,
  }
}
