export { default as OpenAI } from 'openai'
export type { ChatCompletionMessageParam } from 'openai/resources/chat/completions.js'
