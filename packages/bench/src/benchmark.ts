import { OpenAICompatClient, type ChatClient } from '@chat-bench/llm-client'
import type { BenchOptions } from './config.js'
import { sendRequest, type RequestSample, type ResultSample } from './driver.js'
import { waitHealthy } from './health.js'
import { runPool } from './pool.js'
import { printHeader, printSingleRequest, printSummary, formatMs, type Print } from './report.js'
import { mean, summarize, type ConcurrentSummary } from './stats.js'

export const WARMUP_CALLS = 5
export const SINGLE_CALLS = 5
const WARMUP_SAMPLE = { promptTokens: 10, maxTokens: 20 }

export interface BenchmarkResult {
  options: BenchOptions
  singleLatenciesMs: number[]
  singleAverageMs: number
  samples: ResultSample[]
  concurrent: ConcurrentSummary
}

export interface RunDeps {
  client?: ChatClient
  print?: Print
}

export function createClient(opts: BenchOptions): ChatClient {
  return new OpenAICompatClient({ baseURL: `${opts.url}/v1`, apiKey: opts.apiKey })
}

export async function runBenchmark(opts: BenchOptions, deps: RunDeps = {}): Promise<BenchmarkResult> {
  const client = deps.client ?? createClient(opts)
  const print = deps.print ?? ((line: string) => console.log(line))
  const sample: RequestSample = { model: opts.model, promptTokens: opts.promptTokens, maxTokens: opts.maxTokens }

  printHeader(print, opts)
  if (opts.healthTimeoutMs > 0) await waitHealthy(opts.url, opts.healthTimeoutMs)

  print('Warming up...')
  for (let i = 0; i < WARMUP_CALLS; i++) {
    await sendRequest(client, { ...sample, ...WARMUP_SAMPLE })
  }

  print('')
  print('--- Single Request Latency ---')
  const singleLatenciesMs: number[] = []
  for (let i = 0; i < SINGLE_CALLS; i++) {
    const r = await sendRequest(client, sample)
    singleLatenciesMs.push(r.elapsedMs)
    printSingleRequest(print, i + 1, r)
  }
  const singleAverageMs = mean(singleLatenciesMs)
  print(`  Average: ${formatMs(singleAverageMs)}`)

  const { results, wallMs } = await runPool(opts.requests, opts.workers, () => sendRequest(client, sample))
  const concurrent = summarize(results, wallMs)
  printSummary(print, opts, concurrent)

  return { options: opts, singleLatenciesMs, singleAverageMs, samples: results, concurrent }
}
