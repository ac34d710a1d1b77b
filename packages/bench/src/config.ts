export interface BenchOptions {
  url: string
  model: string
  workers: number
  requests: number
  promptTokens: number
  maxTokens: number
  apiKey?: string
  healthTimeoutMs: number
}

export type Env = Record<string, string | undefined>

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export const DEFAULTS = {
  url: 'http://127.0.0.1:30000',
  model: 'Qwen/Qwen2.5-1.5B-Instruct',
  workers: 8,
  requests: 50,
  promptTokens: 50,
  maxTokens: 100,
} as const

export const USAGE = `usage: chat-bench [options]

  --url <url>            server URL (default ${DEFAULTS.url})
  --model <name>         model name (default ${DEFAULTS.model})
  --workers <n>          concurrent workers (default ${DEFAULTS.workers})
  --requests <n>         number of requests (default ${DEFAULTS.requests})
  --prompt-tokens <n>    prompt token count (default ${DEFAULTS.promptTokens})
  --max-tokens <n>       max tokens to generate (default ${DEFAULTS.maxTokens})
  --help                 show this message`

const FLAGS = new Set(['url', 'model', 'workers', 'requests', 'prompt-tokens', 'max-tokens', 'help'])

/** Accepts `--key=value`, `--key value` and bare boolean `--key`. */
export function parseArgs(argv: string[]) {
  const args: Record<string, string | true> = {}
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]
    if (!a.startsWith('--')) throw new ConfigError(`unexpected argument: ${a}`)
    const eq = a.indexOf('=')
    const k = eq === -1 ? a.slice(2) : a.slice(2, eq)
    if (!FLAGS.has(k)) throw new ConfigError(`unknown option: --${k}`)
    if (eq !== -1) args[k] = a.slice(eq + 1)
    else if (k !== 'help' && i + 1 < argv.length && !argv[i + 1].startsWith('--')) args[k] = argv[++i]
    else args[k] = true
  }
  return args
}

function positiveInt(name: string, raw: string | true | undefined, fallback: number) {
  if (raw === undefined || raw === '') return fallback
  if (raw === true) throw new ConfigError(`--${name} needs a value`)
  if (!/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(Number(raw)) || Number(raw) < 1) throw new ConfigError(`--${name} must be a positive integer, got '${raw}'`)
  return Number(raw)
}

function text(name: string, raw: string | true | undefined, fallback: string) {
  if (raw === undefined || raw === '') return fallback
  if (raw === true) throw new ConfigError(`--${name} needs a value`)
  return raw
}

/** Flags override BENCH_* environment variables, which override the defaults. */
export function resolveOptions(args: Record<string, string | true>, env: Env = process.env): BenchOptions {
  const pick = (flag: string, envKey: string) => {
    if (args[flag] === '') throw new ConfigError(`--${flag} needs a value`)
    return args[flag] ?? env[envKey]
  }
  const healthTimeoutMs = Number(env.BENCH_HEALTH_TIMEOUT_MS || 0)
  if (!Number.isFinite(healthTimeoutMs) || healthTimeoutMs < 0) throw new ConfigError(`BENCH_HEALTH_TIMEOUT_MS must be a non-negative number, got '${env.BENCH_HEALTH_TIMEOUT_MS}'`)
  return {
    url: text('url', pick('url', 'BENCH_URL'), DEFAULTS.url).replace(/\/+$/, ''),
    model: text('model', pick('model', 'BENCH_MODEL'), DEFAULTS.model),
    workers: positiveInt('workers', pick('workers', 'BENCH_WORKERS'), DEFAULTS.workers),
    requests: positiveInt('requests', pick('requests', 'BENCH_REQUESTS'), DEFAULTS.requests),
    promptTokens: positiveInt('prompt-tokens', pick('prompt-tokens', 'BENCH_PROMPT_TOKENS'), DEFAULTS.promptTokens),
    maxTokens: positiveInt('max-tokens', pick('max-tokens', 'BENCH_MAX_TOKENS'), DEFAULTS.maxTokens),
    apiKey: env.LLM_API_KEY || undefined,
    healthTimeoutMs,
  }
}
