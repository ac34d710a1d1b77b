import { performance } from 'node:perf_hooks'
import type { ChatClient, ChatRequest } from '@chat-bench/llm-client'

export interface RequestSample {
  model: string
  promptTokens: number
  maxTokens: number
}

export interface ResultSample {
  elapsedMs: number
  completionTokens: number
}

// one filler word plus separator per requested prompt token
export function buildPrompt(promptTokens: number) {
  return 'x '.repeat(promptTokens)
}

export function buildChatRequest(sample: RequestSample): ChatRequest {
  return {
    model: sample.model,
    messages: [{ role: 'user', content: buildPrompt(sample.promptTokens) }],
    max_tokens: sample.maxTokens,
    temperature: 0,
  }
}

export async function sendRequest(client: ChatClient, sample: RequestSample): Promise<ResultSample> {
  const req = buildChatRequest(sample)
  const t0 = performance.now()
  const completion = await client.chat(req)
  const elapsedMs = performance.now() - t0
  return { elapsedMs, completionTokens: completion.usage.completion_tokens }
}
