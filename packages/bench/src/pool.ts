import { performance } from 'node:perf_hooks'

export interface PoolRun<T> {
  /** Results in completion order, not submission order. */
  results: T[]
  wallMs: number
}

/**
 * Runs `total` invocations of `task` with at most `concurrency` in flight.
 * After the first rejection no new tasks start; the pool rejects with that
 * error once the tasks already running have settled.
 */
export async function runPool<T>(total: number, concurrency: number, task: (index: number) => Promise<T>): Promise<PoolRun<T>> {
  if (!Number.isInteger(concurrency) || concurrency < 1) throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`)
  const results: T[] = []
  let next = 0
  let failed = false

  async function worker() {
    while (!failed) {
      const idx = next++
      if (idx >= total) break
      try {
        results.push(await task(idx))
      } catch (err) {
        failed = true
        throw err
      }
    }
  }

  const started = performance.now()
  const workers = Array.from({ length: Math.min(concurrency, total) }, () => worker())
  const settled = await Promise.allSettled(workers)
  const wallMs = performance.now() - started
  for (const s of settled) if (s.status === 'rejected') throw s.reason
  return { results, wallMs }
}
