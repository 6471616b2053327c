import Anthropic from '@anthropic-ai/sdk'
import { type LLMProvider, encodeImage, settle } from './base'
import { ConfigError, TransportError, type ProviderOutcome, type ProviderRequest } from '../types'
import type { ClaudeConfig } from '../../config'

export const CLAUDE_MAX_TOKENS = 1000

export class ClaudeProvider implements LLMProvider {
  name = 'Claude'

  private client: Anthropic | null = null

  constructor(private readonly config: ClaudeConfig) {}

  call(request: ProviderRequest): Promise<ProviderOutcome> {
    return settle(this.name, () => this.createMessage(request))
  }

  private getClient(): Anthropic {
    if (!this.config.apiKey) {
      throw new ConfigError('Claude API key not configured')
    }
    if (!this.client) {
      // Failed calls are reported once, never retried
      this.client = new Anthropic({
        apiKey: this.config.apiKey,
        timeout: this.config.timeoutMs,
        maxRetries: 0
      })
    }
    return this.client
  }

  private async buildContent(request: ProviderRequest): Promise<string | Anthropic.ContentBlockParam[]> {
    if (request.image === undefined) {
      return request.prompt
    }

    const encoded = await encodeImage(request.image)
    return [
      { type: 'text', text: request.prompt },
      {
        type: 'image',
        source: {
          type: 'base64',
          media_type: encoded.mediaType,
          data: encoded.base64
        }
      }
    ]
  }

  private async createMessage(request: ProviderRequest): Promise<string> {
    const client = this.getClient()
    const content = await this.buildContent(request)

    let response: Anthropic.Message
    try {
      response = await client.messages.create({
        model: request.model,
        max_tokens: CLAUDE_MAX_TOKENS,
        messages: [{ role: 'user', content }]
      })
    } catch (error) {
      const status =
        error && typeof error === 'object' && 'status' in error && typeof error.status === 'number'
          ? error.status
          : undefined
      throw new TransportError(
        `Claude API error: ${error instanceof Error ? error.message : String(error)}`,
        status
      )
    }

    for (const block of response.content) {
      if (block.type === 'text') {
        return block.text
      }
    }
    throw new TransportError('Invalid response from Claude API')
  }
}
