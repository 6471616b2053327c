import type { LLMConfig } from '../config'
import { AvailabilityProber } from './availability'
import { DEFAULT_TEXT_PROMPT, DEFAULT_VISION_PROMPT } from './providers/base'
import { ProviderRegistry, roleConfig } from './registry'
import {
  failureReason,
  LLMError,
  type AnalysisResult,
  type AnalysisRole,
  type ImageInput
} from './types'

export * from './types'
export type { LLMProvider } from './providers/base'
export { ProviderRegistry } from './registry'
export { AvailabilityProber } from './availability'

/** What the capture pipeline needs from the analysis layer. */
export interface AnalysisGateway {
  analyzeText(content: string): Promise<string | null>
  analyzeImage(image: ImageInput): Promise<string | null>
}

export function renderTextPrompt(template: string | undefined, content: string): string {
  return (template || DEFAULT_TEXT_PROMPT).split('{content}').join(content)
}

export class LLMService implements AnalysisGateway {
  private readonly registry: ProviderRegistry
  private readonly prober: AvailabilityProber
  private available = true

  constructor(
    private readonly config: LLMConfig,
    options: { registry?: ProviderRegistry; prober?: AvailabilityProber } = {}
  ) {
    this.registry = options.registry ?? new ProviderRegistry(config)
    this.prober = options.prober ?? new AvailabilityProber(config)
  }

  /** Both roles need a provider and a model before analysis is turned on. */
  validateConfig(): boolean {
    if (!this.config.enabled) {
      console.log('[LLMService] Analysis is disabled in config')
      return true
    }

    for (const role of ['text', 'vision'] as const) {
      const { provider, model } = roleConfig(this.config, role)
      if (!provider || !model) {
        console.warn(`[LLMService] ${role} model configuration is incomplete`)
        return false
      }
    }
    return true
  }

  /**
   * Validates the role configuration and probes every referenced provider.
   * Any failure disables analysis for the rest of the process run.
   */
  async initialize(): Promise<boolean> {
    if (!this.config.enabled) {
      this.available = false
      return false
    }

    if (!this.validateConfig()) {
      this.available = false
      return false
    }

    try {
      this.available = await this.prober.checkAll(this.registry.referencedProviders())
    } catch (error) {
      console.error('[LLMService] Availability check failed:', error)
      this.available = false
    }

    const active = this.getActiveProviders()
    console.log(
      `[LLMService] Analysis ${this.available ? 'enabled' : 'disabled'}. ` +
        `Text: ${active.text ?? 'none'}, Vision: ${active.vision ?? 'none'}`
    )
    return this.available
  }

  isEnabled(): boolean {
    if (!this.config.enabled || !this.available) {
      return false
    }
    const text = this.config.textModel
    const vision = this.config.visionModel
    return Boolean((text.provider && text.model) || (vision.provider && vision.model))
  }

  async analyze(role: AnalysisRole, content: ImageInput, hasImage: boolean): Promise<AnalysisResult> {
    if (!this.isEnabled()) {
      return { ok: false, reason: 'disabled', message: 'analysis unavailable' }
    }

    try {
      const resolved = this.registry.resolve(role)

      let prompt: string
      let image: ImageInput | undefined
      if (hasImage) {
        prompt = resolved.prompt || DEFAULT_VISION_PROMPT
        image = content
      } else {
        const text = typeof content === 'string' ? content : content.toString('utf-8')
        prompt = role === 'text' ? renderTextPrompt(resolved.prompt, text) : resolved.prompt || DEFAULT_VISION_PROMPT
      }

      const outcome = await resolved.provider.call({ model: resolved.model, prompt, image })
      if (!outcome.ok) {
        return this.fail(role, outcome.error)
      }

      return { ok: true, text: outcome.text, provider: resolved.providerId, model: resolved.model }
    } catch (error) {
      if (error instanceof LLMError) {
        return this.fail(role, error)
      }
      const message = error instanceof Error ? error.message : String(error)
      console.error(`[LLMService] ${role} analysis failed unexpectedly: ${message}`)
      return { ok: false, reason: 'transport', message }
    }
  }

  async analyzeText(content: string): Promise<string | null> {
    const result = await this.analyze('text', content, false)
    return result.ok ? result.text : null
  }

  async analyzeImage(image: ImageInput): Promise<string | null> {
    const result = await this.analyze('vision', image, true)
    return result.ok ? result.text : null
  }

  getActiveProviders(): { text: string | null; vision: string | null } {
    return {
      text: this.config.textModel.provider || null,
      vision: this.config.visionModel.provider || null
    }
  }

  private fail(role: AnalysisRole, error: LLMError): AnalysisResult {
    console.warn(`[LLMService] ${role} analysis failed: ${error.message}`)
    return { ok: false, reason: failureReason(error), message: error.message }
  }
}
