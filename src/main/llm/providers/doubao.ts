import {
  type LLMProvider,
  buildChatMessage,
  encodeImage,
  isImageUrl,
  postJson,
  readChatCompletionText,
  settle,
  toDataUri
} from './base'
import { ConfigError, type ImageInput, type ProviderOutcome, type ProviderRequest } from '../types'
import type { DoubaoConfig } from '../../config'

/**
 * Volcengine Ark (Doubao) chat completions.
 *
 * Remote images are passed by URL; local files and bytes are inlined as data
 * URIs. `extraHeaders` are sent verbatim with every request.
 */
export class DoubaoProvider implements LLMProvider {
  name = 'Doubao'

  constructor(private readonly config: DoubaoConfig) {}

  call(request: ProviderRequest): Promise<ProviderOutcome> {
    return settle(this.name, () => this.complete(request))
  }

  private async resolveImageUrl(image: ImageInput): Promise<string> {
    if (isImageUrl(image)) {
      return image
    }
    return toDataUri(await encodeImage(image))
  }

  private async complete(request: ProviderRequest): Promise<string> {
    if (!this.config.apiKey) {
      throw new ConfigError('Doubao API key not configured')
    }

    const imageUrl = request.image !== undefined ? await this.resolveImageUrl(request.image) : undefined

    const requestBody = {
      model: request.model,
      messages: [buildChatMessage(request.prompt, imageUrl)]
    }

    const data = await postJson(`${this.config.baseUrl}/chat/completions`, requestBody, {
      headers: {
        ...this.config.extraHeaders,
        Authorization: `Bearer ${this.config.apiKey}`
      },
      timeoutMs: this.config.timeoutMs,
      providerName: this.name
    })

    return readChatCompletionText(data, this.name)
  }
}
