import type { LLMConfig, RoleConfig } from '../config'
import type { LLMProvider } from './providers/base'
import { ClaudeProvider } from './providers/claude'
import { CustomProvider } from './providers/custom'
import { DoubaoProvider } from './providers/doubao'
import { OllamaProvider } from './providers/ollama'
import { OpenAIProvider } from './providers/openai'
import { ConfigError, type AnalysisRole, type BuiltinProviderId } from './types'

export interface ResolvedRole {
  providerId: string
  provider: LLMProvider
  model: string
  prompt?: string
}

const BUILTIN_PROVIDERS: Record<BuiltinProviderId, (config: LLMConfig) => LLMProvider> = {
  ollama: (config) => new OllamaProvider(config.ollama),
  openai: (config) => new OpenAIProvider(config.openai),
  claude: (config) => new ClaudeProvider(config.claude),
  doubao: (config) => new DoubaoProvider(config.doubao)
}

export function isBuiltinProvider(providerId: string): providerId is BuiltinProviderId {
  return Object.prototype.hasOwnProperty.call(BUILTIN_PROVIDERS, providerId)
}

export function roleConfig(config: LLMConfig, role: AnalysisRole): RoleConfig {
  return role === 'text' ? config.textModel : config.visionModel
}

/**
 * Binds every provider id referenced by a role to one adapter instance.
 * Built once at startup; the mapping never changes afterwards.
 */
export class ProviderRegistry {
  private readonly providers = new Map<string, LLMProvider>()

  constructor(private readonly config: LLMConfig) {
    for (const role of ['text', 'vision'] as const) {
      const providerId = roleConfig(config, role).provider
      if (providerId && !this.providers.has(providerId)) {
        this.providers.set(providerId, this.createProvider(providerId))
      }
    }
  }

  private createProvider(providerId: string): LLMProvider {
    if (isBuiltinProvider(providerId)) {
      return BUILTIN_PROVIDERS[providerId](this.config)
    }

    const custom = this.config.custom[providerId]
    if (!custom) {
      console.warn(`[ProviderRegistry] No llm.${providerId} section; ${providerId} will be unusable until configured`)
    }
    return new CustomProvider(providerId, custom ?? { apiUrl: '', apiKey: '', timeoutMs: 60_000 })
  }

  resolve(role: AnalysisRole): ResolvedRole {
    const { provider: providerId, model, prompt } = roleConfig(this.config, role)
    if (!providerId || !model) {
      throw new ConfigError(`The ${role} model is not configured (provider and model are required)`)
    }

    const provider = this.providers.get(providerId)
    if (!provider) {
      throw new ConfigError(`No adapter registered for provider ${providerId}`)
    }

    return { providerId, provider, model, prompt }
  }

  /** Distinct provider ids referenced by the configured roles. */
  referencedProviders(): string[] {
    return [...this.providers.keys()]
  }
}
