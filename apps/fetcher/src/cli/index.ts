#!/usr/bin/env -S npx tsx
import '../env.js'
import { createLogger } from '@addons-feed/logger'
import { runFetchCommand } from './commands/fetch.js'
import { parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.error('Fetch add-on metadata from the search API and print it as a sorted JSON array')
  console.error('')
  console.error('Usage:')
  console.error('  fetch-addons [--pages <n>] [--min-users <n>] [--parallel <n>] [--page-size <n>]')
  console.error('               [--timeout-ms <n>] [--endpoint <url>] [--output <path>] [--verbose]')
  console.error('')
  console.error('Options:')
  console.error('  --pages <n>        Fetch at most n pages (default: every page)')
  console.error('  --min-users <n>    Only add-ons with more than n users')
  console.error('  --parallel <n>     Concurrent page requests (default: 4)')
  console.error('  --page-size <n>    Results per page, at most 50 (default: 50)')
  console.error('  --timeout-ms <n>   Per-request timeout (default: 30000)')
  console.error('  --endpoint <url>   Search endpoint (env: ADDONS_API_URL)')
  console.error('  --output <path>    Write the JSON to a file instead of stdout')
  console.error('  --verbose          Debug diagnostics on stderr')
}

async function main(): Promise<number> {
  const argv = process.argv.slice(2)
  const flags = parseFlags(argv)
  if (flags.help === true || argv.includes('-h')) {
    printHelp()
    return 0
  }

  return runFetchCommand(flags, { logger: createLogger('fetcher') })
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode
  })
  .catch((error: unknown) => {
    createLogger('fetcher').fatal('Unhandled failure', {}, error)
    process.exitCode = 1
  })
