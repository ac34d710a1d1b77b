import { test, expect } from '@playwright/test'
import type { ChatClient, ChatRequest } from '@chat-bench/llm-client'
import { buildChatRequest, buildPrompt, sendRequest } from '@chat-bench/bench'

const separators = (s: string) => s.split(' ').length - 1

test('prompt is one filler word per requested token', () => {
  expect(buildPrompt(3)).toBe('x x x ')
  expect(buildPrompt(0)).toBe('')
})

test('doubling prompt tokens doubles the separator count', () => {
  expect(separators(buildPrompt(50))).toBe(50)
  expect(separators(buildPrompt(100))).toBe(2 * separators(buildPrompt(50)))
})

test('chat request payload uses zero temperature and a single user message', () => {
  expect(buildChatRequest({ model: 'm', promptTokens: 2, maxTokens: 7 })).toEqual({
    model: 'm',
    messages: [{ role: 'user', content: 'x x ' }],
    max_tokens: 7,
    temperature: 0,
  })
})

test('sendRequest times the call and returns completion tokens', async () => {
  const seen: ChatRequest[] = []
  const client: ChatClient = {
    async chat(req) {
      seen.push(req)
      await new Promise(r => setTimeout(r, 30))
      return { usage: { completion_tokens: 7 } }
    },
  }
  const r = await sendRequest(client, { model: 'm', promptTokens: 4, maxTokens: 9 })
  expect(r.completionTokens).toBe(7)
  expect(r.elapsedMs).toBeGreaterThanOrEqual(25)
  expect(seen).toHaveLength(1)
  expect(seen[0].max_tokens).toBe(9)
})

test('client failures propagate', async () => {
  const client: ChatClient = { chat: async () => { throw new Error('connection refused') } }
  await expect(sendRequest(client, { model: 'm', promptTokens: 1, maxTokens: 1 })).rejects.toThrow('connection refused')
})
