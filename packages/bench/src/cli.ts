#!/usr/bin/env tsx
import 'dotenv/config'
import { runBenchmark } from './benchmark.js'
import { ConfigError, USAGE, parseArgs, resolveOptions } from './config.js'

async function main() {
  const args = parseArgs(process.argv.slice(2))
  if (args.help) {
    console.log(USAGE)
    return
  }
  await runBenchmark(resolveOptions(args))
}

main().catch(err => {
  if (err instanceof ConfigError) {
    console.error(`[chat-bench] ${err.message}\n\n${USAGE}`)
    process.exit(2)
  }
  console.error(err)
  process.exit(1)
})
