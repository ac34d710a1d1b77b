import type { ResultSample } from './driver.js'

export interface ConcurrentSummary {
  totalRequests: number
  totalTimeMs: number
  avgLatencyMs: number
  p50LatencyMs: number
  p99LatencyMs: number
  throughputReqPerSec: number
  throughputTokPerSec: number
  totalTokens: number
}

function sorted(vals: number[]) {
  if (!vals.length) throw new RangeError('no samples')
  return vals.slice().sort((a, b) => a - b)
}

export function mean(vals: number[]) {
  if (!vals.length) throw new RangeError('no samples')
  return vals.reduce((s, v) => s + v, 0) / vals.length
}

export function median(vals: number[]) {
  const a = sorted(vals)
  const mid = Math.floor(a.length / 2)
  return a.length % 2 ? a[mid] : (a[mid - 1] + a[mid]) / 2
}

// nearest-rank on floor(0.99 * N), no interpolation
export function p99(vals: number[]) {
  const a = sorted(vals)
  return a[Math.floor(0.99 * a.length)]
}

export function summarize(samples: ResultSample[], totalTimeMs: number): ConcurrentSummary {
  const latencies = samples.map(s => s.elapsedMs)
  const totalTokens = samples.reduce((s, r) => s + r.completionTokens, 0)
  const seconds = totalTimeMs / 1000
  return {
    totalRequests: samples.length,
    totalTimeMs,
    avgLatencyMs: mean(latencies),
    p50LatencyMs: median(latencies),
    p99LatencyMs: p99(latencies),
    throughputReqPerSec: samples.length / seconds,
    throughputTokPerSec: totalTokens / seconds,
    totalTokens,
  }
}
