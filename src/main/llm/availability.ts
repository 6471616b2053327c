import type { LLMConfig } from '../config'
import { OllamaProvider } from './providers/ollama'
import { isBuiltinProvider } from './registry'

const PLACEHOLDER_KEY = /^your_[a-z0-9_]*api_key$/i

export function isUsableKey(apiKey: string): boolean {
  const trimmed = apiKey.trim()
  return trimmed.length > 0 && !PLACEHOLDER_KEY.test(trimmed)
}

/**
 * Cheap usability checks per provider. Only the local Ollama server is probed
 * over the network; hosted vendors are checked for credentials so that probing
 * never costs anything.
 */
export class AvailabilityProber {
  constructor(private readonly config: LLMConfig) {}

  async check(providerId: string): Promise<boolean> {
    if (isBuiltinProvider(providerId)) {
      switch (providerId) {
        case 'ollama':
          return new OllamaProvider(this.config.ollama).isReachable()
        case 'openai':
          return this.requireKey('OpenAI', this.config.openai.apiKey)
        case 'claude':
          return this.requireKey('Claude', this.config.claude.apiKey)
        case 'doubao':
          return this.requireKey('Doubao', this.config.doubao.apiKey)
      }
    }

    const custom = this.config.custom[providerId]
    if (!custom || !custom.apiUrl || !custom.apiKey) {
      console.warn(`[AvailabilityProber] ${providerId} configuration is incomplete (api_url and api_key are required)`)
      return false
    }
    return true
  }

  /** True only when every listed provider passes; one failure disables analysis. */
  async checkAll(providerIds: Iterable<string>): Promise<boolean> {
    const distinct = [...new Set(providerIds)]
    if (distinct.length === 0) {
      return false
    }

    const results = await Promise.all(distinct.map((providerId) => this.check(providerId)))
    distinct.forEach((providerId, index) => {
      console.log(`[AvailabilityProber] ${providerId}: ${results[index] ? 'available' : 'unavailable'}`)
    })
    return results.every(Boolean)
  }

  private requireKey(label: string, apiKey: string): boolean {
    if (!isUsableKey(apiKey)) {
      console.warn(`[AvailabilityProber] ${label} API key not configured`)
      return false
    }
    return true
  }
}
