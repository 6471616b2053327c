export type AnalysisRole = 'text' | 'vision'

export type BuiltinProviderId = 'ollama' | 'openai' | 'claude' | 'doubao'

export type ImageMediaType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp'

// A file path, an http(s) URL, or raw image bytes
export type ImageInput = string | Buffer

export interface ProviderRequest {
  model: string
  prompt: string
  image?: ImageInput
}

export type ProviderOutcome = { ok: true; text: string } | { ok: false; error: LLMError }

export type AnalysisFailureReason = 'disabled' | 'config' | 'transport' | 'encoding'

export type AnalysisResult =
  | { ok: true; text: string; provider: string; model: string }
  | { ok: false; reason: AnalysisFailureReason; message: string }

export class LLMError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly statusCode?: number
  ) {
    super(message)
    this.name = 'LLMError'
  }
}

export class ConfigError extends LLMError {
  constructor(message: string) {
    super(message, 'CONFIG')
    this.name = 'ConfigError'
  }
}

export class TransportError extends LLMError {
  constructor(message: string, statusCode?: number) {
    super(message, 'TRANSPORT', statusCode)
    this.name = 'TransportError'
  }
}

export class EncodingError extends LLMError {
  constructor(message: string) {
    super(message, 'ENCODING')
    this.name = 'EncodingError'
  }
}

export function failureReason(error: LLMError): AnalysisFailureReason {
  if (error instanceof ConfigError) return 'config'
  if (error instanceof EncodingError) return 'encoding'
  return 'transport'
}
