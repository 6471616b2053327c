import { type LLMProvider, buildChatMessage, encodeImage, postJson, readChatCompletionText, settle, toDataUri } from './base'
import type { ProviderOutcome, ProviderRequest } from '../types'
import type { OpenAIConfig } from '../../config'

export const OPENAI_MAX_TOKENS = 1000

export class OpenAIProvider implements LLMProvider {
  name = 'OpenAI'

  constructor(private readonly config: OpenAIConfig) {}

  call(request: ProviderRequest): Promise<ProviderOutcome> {
    return settle(this.name, () => this.complete(request))
  }

  private async complete(request: ProviderRequest): Promise<string> {
    const imageUrl = request.image !== undefined ? toDataUri(await encodeImage(request.image)) : undefined

    const requestBody = {
      model: request.model,
      messages: [buildChatMessage(request.prompt, imageUrl)],
      max_tokens: OPENAI_MAX_TOKENS
    }

    const data = await postJson(`${this.config.baseUrl}/chat/completions`, requestBody, {
      headers: { Authorization: `Bearer ${this.config.apiKey}` },
      timeoutMs: this.config.timeoutMs,
      providerName: this.name
    })

    return readChatCompletionText(data, this.name)
  }
}
