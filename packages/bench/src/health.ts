import { performance } from 'node:perf_hooks'

const sleep = (ms: number) => new Promise(r => setTimeout(r, ms))

/** Polls `<url>/health` until it answers 2xx or `timeoutMs` elapses. */
export async function waitHealthy(url: string, timeoutMs: number, intervalMs = 500) {
  const t0 = performance.now()
  let lastError = 'no response'
  const remaining = () => timeoutMs - (performance.now() - t0)
  while (remaining() > 0) {
    try {
      const r = await fetch(`${url}/health`, { signal: AbortSignal.timeout(Math.max(1, Math.ceil(remaining()))) })
      if (r.ok) return
      lastError = `HTTP ${r.status}`
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err)
    }
    console.error(`[chat-bench] waiting for ${url}/health (${lastError})`)
    await sleep(Math.min(intervalMs, Math.max(0, remaining())))
  }
  throw new Error(`${url} did not become healthy in ${timeoutMs}ms (${lastError})`)
}
