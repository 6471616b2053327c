import { type LLMProvider, buildChatMessage, encodeImage, postJson, readChatCompletionText, settle, toDataUri } from './base'
import { ConfigError, type ProviderOutcome, type ProviderRequest } from '../types'
import type { CustomProviderConfig } from '../../config'

// Any OpenAI-compatible endpoint the user adds under its own llm.<id> section
export class CustomProvider implements LLMProvider {
  constructor(
    readonly name: string,
    private readonly config: CustomProviderConfig
  ) {}

  call(request: ProviderRequest): Promise<ProviderOutcome> {
    return settle(this.name, () => this.complete(request))
  }

  private async complete(request: ProviderRequest): Promise<string> {
    if (!this.config.apiUrl || !this.config.apiKey) {
      throw new ConfigError(`${this.name} configuration is incomplete (api_url and api_key are required)`)
    }

    const imageUrl = request.image !== undefined ? toDataUri(await encodeImage(request.image)) : undefined

    const data = await postJson(
      this.config.apiUrl,
      {
        model: request.model,
        messages: [buildChatMessage(request.prompt, imageUrl)]
      },
      {
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
        timeoutMs: this.config.timeoutMs,
        providerName: this.name
      }
    )

    return readChatCompletionText(data, this.name)
  }
}
