import { OpenAI as _OpenAI } from '../../L1-infra/ai/openai.js'

export type { OpenAI } from '../../L1-infra/ai/openai.js'
export type { ChatCompletionMessageParam } from '../../L1-infra/ai/openai.js'

export function createOpenAI(...args: ConstructorParameters<typeof _OpenAI>): InstanceType<typeof _OpenAI> {
  return new _OpenAI(...args)
}
