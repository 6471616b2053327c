import type { LLMConfig } from '../../config'

export function llmConfig(overrides: Partial<LLMConfig> = {}): LLMConfig {
  return {
    enabled: true,
    textModel: { provider: 'openai', model: 'gpt-4o-mini' },
    visionModel: { provider: 'claude', model: 'claude-3-5-sonnet-latest' },
    ollama: { baseUrl: 'http://ollama.test:11434', timeoutMs: 60_000 },
    openai: { apiKey: 'test-secret', baseUrl: 'https://openai.test/v1', timeoutMs: 60_000 },
    claude: { apiKey: 'test-secret', timeoutMs: 60_000 },
    doubao: { apiKey: '', baseUrl: 'https://ark.test/api/v3', timeoutMs: 60_000, extraHeaders: {} },
    custom: {},
    ...overrides
  }
}
