import { createOpenAI } from '../llm/ai.js'
import type { ChatCompletionMessageParam } from '../llm/ai.js'
import { normalizeChatResponse } from '../../L0-pure/responses/responses.js'

export interface ChatOptions {
  apiKey: string
  model: string
  temperature?: number
  maxTokens?: number
}

/** One-shot chat completion. Returns the text of the first choice. */
export async function completeChat(messages: ChatCompletionMessageParam[], options: ChatOptions): Promise<string> {
  const openai = createOpenAI({ apiKey: options.apiKey })
  const response: unknown = await openai.chat.completions.create({
    model: options.model,
    messages,
    ...(options.temperature !== undefined && { temperature: options.temperature }),
    ...(options.maxTokens !== undefined && { max_tokens: options.maxTokens }),
  })

  const normalized = normalizeChatResponse(response)
  if (normalized.kind === 'unrecognized') {
    throw new Error(`Unrecognized chat response: ${normalized.preview}`)
  }
  return normalized.text
}
