import { test, expect } from '@playwright/test'
import { ChatRequestError, MalformedResponseError, OpenAICompatClient, parseChatCompletion, type ChatRequest } from '@chat-bench/llm-client'
import { startMockServer } from '@chat-bench/mock-server'

const req: ChatRequest = {
  model: 'test-model',
  messages: [{ role: 'user', content: 'x x x x ' }],
  max_tokens: 12,
  temperature: 0,
}

test.describe('OpenAICompatClient', () => {
  test('returns usage from a completion', async () => {
    const mock = await startMockServer({ completionTokens: 7 })
    try {
      const client = new OpenAICompatClient({ baseURL: `${mock.url}/v1/` })
      const completion = await client.chat(req)
      expect(completion.usage).toEqual({ prompt_tokens: 4, completion_tokens: 7, total_tokens: 11 })
      expect(completion.model).toBe('test-model')
      expect(mock.received).toEqual([{ model: 'test-model', messages: [{ role: 'user', content: 'x x x x ' }], max_tokens: 12, temperature: 0 }])
    } finally {
      await mock.close()
    }
  })

  test('falls back to max_tokens when the server has no fixed count', async () => {
    const mock = await startMockServer()
    try {
      const completion = await new OpenAICompatClient({ baseURL: `${mock.url}/v1` }).chat(req)
      expect(completion.usage.completion_tokens).toBe(12)
    } finally {
      await mock.close()
    }
  })

  test('non-2xx status raises ChatRequestError', async () => {
    const mock = await startMockServer({ failStatus: 503 })
    try {
      const err = await new OpenAICompatClient({ baseURL: `${mock.url}/v1` }).chat(req).catch((e: unknown) => e)
      expect(err).toBeInstanceOf(ChatRequestError)
      if (err instanceof ChatRequestError) {
        expect(err.status).toBe(503)
        expect(JSON.parse(err.body)).toEqual({ error: { message: 'synthetic failure', type: 'server_error' } })
      }
    } finally {
      await mock.close()
    }
  })

  test('missing usage raises MalformedResponseError', async () => {
    const mock = await startMockServer({ omitUsage: true })
    try {
      await expect(new OpenAICompatClient({ baseURL: `${mock.url}/v1` }).chat(req)).rejects.toThrow(MalformedResponseError)
    } finally {
      await mock.close()
    }
  })
})

test('parseChatCompletion rejects non-JSON bodies', () => {
  expect(() => parseChatCompletion('<html>bad gateway</html>')).toThrow(/^response is not JSON/)
  expect(() => parseChatCompletion('[1,2]')).toThrow('response is not a JSON object')
  expect(parseChatCompletion('{"usage":{"completion_tokens":3}}').usage.completion_tokens).toBe(3)
})
