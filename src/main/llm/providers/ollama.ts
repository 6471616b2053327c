import { type LLMProvider, encodeImage, postJson, settle } from './base'
import { TransportError, type ProviderOutcome, type ProviderRequest } from '../types'
import type { OllamaConfig } from '../../config'

// Health probes never wait longer than this, whatever the call timeout is
export const OLLAMA_HEALTH_TIMEOUT_CAP_MS = 10_000

export class OllamaProvider implements LLMProvider {
  name = 'Ollama'

  constructor(private readonly config: OllamaConfig) {}

  call(request: ProviderRequest): Promise<ProviderOutcome> {
    return settle(this.name, () => this.generate(request))
  }

  async isReachable(): Promise<boolean> {
    const controller = new AbortController()
    const timeout = setTimeout(() => {
      controller.abort()
    }, Math.min(this.config.timeoutMs, OLLAMA_HEALTH_TIMEOUT_CAP_MS))

    try {
      const response = await fetch(`${this.config.baseUrl}/api/tags`, { signal: controller.signal })
      return response.ok
    } catch (error) {
      console.warn(
        `[Ollama] Health check against ${this.config.baseUrl} failed:`,
        error instanceof Error ? error.message : error
      )
      return false
    } finally {
      clearTimeout(timeout)
    }
  }

  private async generate(request: ProviderRequest): Promise<string> {
    const requestBody: { model: string; prompt: string; stream: false; images?: string[] } = {
      model: request.model,
      prompt: request.prompt,
      stream: false
    }

    if (request.image !== undefined) {
      const encoded = await encodeImage(request.image)
      requestBody.images = [encoded.base64]
    }

    const data = await postJson(`${this.config.baseUrl}/api/generate`, requestBody, {
      timeoutMs: this.config.timeoutMs,
      providerName: this.name
    })

    if (data && typeof data === 'object' && 'response' in data && typeof data.response === 'string') {
      return data.response
    }
    throw new TransportError('Invalid response from Ollama')
  }
}
