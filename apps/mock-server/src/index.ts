import express, { type Request, type Response } from 'express'
import type { Server } from 'node:http'
import { performance } from 'node:perf_hooks'
import { Counter, Histogram, Registry } from 'prom-client'

export interface MockOptions {
  /** Artificial latency added to every completion. */
  delayMs?: number
  /** Fixed completion token count; defaults to the request's max_tokens, else 16. */
  completionTokens?: number
  /** Answer every completion with this HTTP status and an error body. */
  failStatus?: number
  /** Drop the usage field from completions. */
  omitUsage?: boolean
}

export interface ReceivedRequest {
  model: string
  messages: { role: string, content: string }[]
  max_tokens?: number
  temperature?: number
}

export interface MockApp {
  app: express.Express
  registry: Registry
  received: ReceivedRequest[]
}

const sleep = (ms: number) => new Promise(r => setTimeout(r, ms))

function errorBody(message: string, type = 'invalid_request_error') {
  return { error: { message, type } }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function parseBody(body: unknown): ReceivedRequest | string {
  if (!isRecord(body)) return 'body must be a JSON object'
  const { model, messages, max_tokens, temperature } = body
  if (typeof model !== 'string') return 'model must be a string'
  if (!Array.isArray(messages) || messages.length === 0) return 'messages must be a non-empty array'
  const list: unknown[] = messages
  const parsed: ReceivedRequest['messages'] = []
  for (const m of list) {
    if (!isRecord(m) || typeof m.role !== 'string' || typeof m.content !== 'string') return 'each message needs a role and string content'
    parsed.push({ role: m.role, content: m.content })
  }
  return {
    model,
    messages: parsed,
    max_tokens: typeof max_tokens === 'number' ? max_tokens : undefined,
    temperature: typeof temperature === 'number' ? temperature : undefined,
  }
}

export function createMockApp(opts: MockOptions = {}): MockApp {
  const registry = new Registry()
  const requests = new Counter({ name: 'mock_chat_requests_total', help: 'Chat completion requests', labelNames: ['model', 'status'], registers: [registry] })
  const tokens = new Counter({ name: 'mock_chat_completion_tokens_total', help: 'Completion tokens reported', labelNames: ['model'], registers: [registry] })
  const duration = new Histogram({ name: 'mock_chat_duration_ms', help: 'Chat completion handling time (ms)', buckets: [5, 10, 20, 50, 100, 200, 400, 800, 1500, 3000], labelNames: ['model'], registers: [registry] })
  const received: ReceivedRequest[] = []

  const app = express()
  app.disable('x-powered-by')
  app.use(express.json({ limit: '10mb' }))

  const ok = (_req: Request, res: Response) => { res.status(200).type('text/plain').send('ok\n') }
  app.get('/health', ok)
  app.get('/healthz', ok)

  app.get('/metrics', async (_req: Request, res: Response) => {
    res.setHeader('Content-Type', registry.contentType)
    res.end(await registry.metrics())
  })

  app.post('/v1/chat/completions', async (req: Request, res: Response) => {
    const parsed = parseBody(req.body)
    if (typeof parsed === 'string') {
      requests.labels('unknown', '400').inc()
      res.status(400).json(errorBody(parsed))
      return
    }
    received.push(parsed)
    const started = performance.now()
    const end = () => { duration.labels(parsed.model).observe(performance.now() - started) }
    if (opts.delayMs) await sleep(opts.delayMs)

    if (opts.failStatus) {
      requests.labels(parsed.model, String(opts.failStatus)).inc()
      end()
      res.status(opts.failStatus).json(errorBody('synthetic failure', 'server_error'))
      return
    }

    const completionTokens = opts.completionTokens ?? parsed.max_tokens ?? 16
    const promptTokens = parsed.messages.reduce((n, m) => n + m.content.split(/\s+/).filter(Boolean).length, 0)
    const completion = {
      id: `chatcmpl-mock-${received.length}`,
      object: 'chat.completion',
      created: Math.floor(Date.now() / 1000),
      model: parsed.model,
      choices: [{ index: 0, message: { role: 'assistant', content: 'x '.repeat(completionTokens).trim() }, finish_reason: 'length' }],
      ...(opts.omitUsage ? {} : { usage: { prompt_tokens: promptTokens, completion_tokens: completionTokens, total_tokens: promptTokens + completionTokens } }),
    }
    requests.labels(parsed.model, '200').inc()
    tokens.labels(parsed.model).inc(completionTokens)
    end()
    res.json(completion)
  })

  return { app, registry, received }
}

export interface RunningMock extends MockApp {
  url: string
  server: Server
  close(): Promise<void>
}

/** Listens on `port` (0 picks a free one) and resolves once bound. */
export function startMockServer(opts: MockOptions = {}, port = 0, host = '127.0.0.1'): Promise<RunningMock> {
  const mock = createMockApp(opts)
  return new Promise((resolve, reject) => {
    const server = mock.app.listen(port, host)
    server.once('error', reject)
    server.once('listening', () => {
      const addr = server.address()
      if (addr === null || typeof addr === 'string') {
        reject(new Error(`unexpected listen address: ${addr}`))
        return
      }
      const bound = addr.port
      resolve({
        ...mock,
        server,
        url: `http://${host}:${bound}`,
        close: () => new Promise<void>((res, rej) => {
          server.closeAllConnections()
          server.close(err => err ? rej(err) : res())
        }),
      })
    })
  })
}
