import type { BenchOptions } from './config.js'
import type { ResultSample } from './driver.js'
import type { ConcurrentSummary } from './stats.js'

export type Print = (line: string) => void

const RULE = '='.repeat(60)

export const formatMs = (v: number) => `${v.toFixed(1)}ms`

export function printHeader(print: Print, opts: BenchOptions) {
  print(RULE)
  print('CHAT COMPLETIONS BENCHMARK')
  print(RULE)
  print(`Server: ${opts.url}`)
  print(`Model: ${opts.model}`)
  print(`Workers: ${opts.workers}, Requests: ${opts.requests}`)
  print('')
}

export function printSingleRequest(print: Print, n: number, sample: ResultSample) {
  print(`  Request ${n}: ${formatMs(sample.elapsedMs)}, ${sample.completionTokens} tokens`)
}

export function printSummary(print: Print, opts: BenchOptions, s: ConcurrentSummary) {
  print('')
  print(`--- Concurrent Load (${opts.workers} workers, ${opts.requests} requests) ---`)
  print(`  Total time: ${(s.totalTimeMs / 1000).toFixed(2)}s`)
  print(`  Avg latency: ${formatMs(s.avgLatencyMs)}`)
  print(`  P50 latency: ${formatMs(s.p50LatencyMs)}`)
  print(`  P99 latency: ${formatMs(s.p99LatencyMs)}`)
  print(`  Throughput: ${s.throughputReqPerSec.toFixed(2)} req/s, ${s.throughputTokPerSec.toFixed(1)} tok/s`)
  print(`  Total tokens: ${s.totalTokens}`)
  print('')
  print(RULE)
  print('KEY METRICS TO COMPARE:')
  print(`  Throughput: ${s.throughputReqPerSec.toFixed(2)} req/s`)
  print(`  P99 Latency: ${formatMs(s.p99LatencyMs)}`)
  print(RULE)
}
