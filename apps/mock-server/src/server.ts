import 'dotenv/config'
import { collectDefaultMetrics } from 'prom-client'
import { startMockServer } from './index.js'

const PORT = Number(process.env.PORT || 30000)
const delayMs = Number(process.env.MOCK_DELAY_MS || 50)
const completionTokens = process.env.MOCK_COMPLETION_TOKENS ? Number(process.env.MOCK_COMPLETION_TOKENS) : undefined

async function main() {
  const mock = await startMockServer({ delayMs, completionTokens }, PORT, '0.0.0.0')
  collectDefaultMetrics({ register: mock.registry })
  console.log(`mock-server listening on :${PORT}`)
}

main().catch(err => { console.error(err); process.exit(1) })
