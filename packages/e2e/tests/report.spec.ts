import { test, expect } from '@playwright/test'
import { printHeader, printSingleRequest, printSummary, resolveOptions, type ConcurrentSummary } from '@chat-bench/bench'

const RULE = '='.repeat(60)

function capture() {
  const lines: string[] = []
  return { lines, print: (l: string) => { lines.push(l) } }
}

const opts = resolveOptions({ url: 'http://10.0.0.5:30000', model: 'test-model', workers: '4', requests: '4' }, {})

test('header names the target and load shape', () => {
  const { lines, print } = capture()
  printHeader(print, opts)
  expect(lines).toEqual([
    RULE,
    'CHAT COMPLETIONS BENCHMARK',
    RULE,
    'Server: http://10.0.0.5:30000',
    'Model: test-model',
    'Workers: 4, Requests: 4',
    '',
  ])
})

test('single request line', () => {
  const { lines, print } = capture()
  printSingleRequest(print, 2, { elapsedMs: 123.44, completionTokens: 100 })
  expect(lines).toEqual(['  Request 2: 123.4ms, 100 tokens'])
})

test('concurrent summary and key metrics', () => {
  const summary: ConcurrentSummary = {
    totalRequests: 4,
    totalTimeMs: 2000,
    avgLatencyMs: 250,
    p50LatencyMs: 250,
    p99LatencyMs: 400,
    throughputReqPerSec: 2,
    throughputTokPerSec: 50,
    totalTokens: 100,
  }
  const { lines, print } = capture()
  printSummary(print, opts, summary)
  expect(lines).toEqual([
    '',
    '--- Concurrent Load (4 workers, 4 requests) ---',
    '  Total time: 2.00s',
    '  Avg latency: 250.0ms',
    '  P50 latency: 250.0ms',
    '  P99 latency: 400.0ms',
    '  Throughput: 2.00 req/s, 50.0 tok/s',
    '  Total tokens: 100',
    '',
    RULE,
    'KEY METRICS TO COMPARE:',
    '  Throughput: 2.00 req/s',
    '  P99 Latency: 400.0ms',
    RULE,
  ])
})
