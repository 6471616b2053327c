import fs from 'fs/promises'
import {
  EncodingError,
  LLMError,
  TransportError,
  type ImageInput,
  type ImageMediaType,
  type ProviderOutcome,
  type ProviderRequest
} from '../types'

export interface LLMProvider {
  name: string

  /** Never rejects: transport, encoding and config failures come back as `{ ok: false }`. */
  call(request: ProviderRequest): Promise<ProviderOutcome>
}

export interface EncodedImage {
  base64: string
  mediaType: ImageMediaType
}

export const DEFAULT_VISION_PROMPT =
  'Please analyze the content of this image. If it shows a question or exercise, provide a detailed solution.'

export const DEFAULT_TEXT_PROMPT = 'Please analyze the following content:\n{content}'

export function isImageUrl(image: ImageInput): image is string {
  return typeof image === 'string' && /^https?:\/\//i.test(image)
}

export function detectMediaType(bytes: Buffer): ImageMediaType {
  if (bytes.length >= 8 && bytes.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))) {
    return 'image/png'
  }
  if (bytes.length >= 6 && bytes.subarray(0, 4).toString('ascii') === 'GIF8') {
    return 'image/gif'
  }
  if (
    bytes.length >= 12 &&
    bytes.subarray(0, 4).toString('ascii') === 'RIFF' &&
    bytes.subarray(8, 12).toString('ascii') === 'WEBP'
  ) {
    return 'image/webp'
  }
  return 'image/jpeg'
}

export async function encodeImage(image: ImageInput): Promise<EncodedImage> {
  if (isImageUrl(image)) {
    throw new EncodingError(`Cannot inline a remote image: ${image}`)
  }

  let bytes: Buffer
  try {
    bytes = typeof image === 'string' ? await fs.readFile(image) : image
  } catch (error) {
    throw new EncodingError(
      `Failed to read image ${String(image)}: ${error instanceof Error ? error.message : String(error)}`
    )
  }

  if (bytes.length === 0) {
    throw new EncodingError('Image is empty')
  }

  return { base64: bytes.toString('base64'), mediaType: detectMediaType(bytes) }
}

export function toDataUri(encoded: EncodedImage): string {
  return `data:${encoded.mediaType};base64,${encoded.base64}`
}

export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } }

export interface ChatCompletionMessage {
  role: 'user'
  content: string | ChatContentPart[]
}

// Shared by every chat-completions style backend
export function buildChatMessage(prompt: string, imageUrl?: string): ChatCompletionMessage {
  if (!imageUrl) {
    return { role: 'user', content: prompt }
  }
  return {
    role: 'user',
    content: [
      { type: 'text', text: prompt },
      { type: 'image_url', image_url: { url: imageUrl } }
    ]
  }
}

export function readChatCompletionText(data: unknown, providerName: string): string {
  if (data && typeof data === 'object' && 'choices' in data && Array.isArray(data.choices)) {
    const first: unknown = data.choices[0]
    if (first && typeof first === 'object' && 'message' in first) {
      const message: unknown = first.message
      if (message && typeof message === 'object' && 'content' in message && typeof message.content === 'string') {
        return message.content
      }
    }
  }
  throw new TransportError(`Invalid response from ${providerName}`)
}

export async function postJson(
  url: string,
  body: unknown,
  options: { headers?: Record<string, string>; timeoutMs: number; providerName: string }
): Promise<unknown> {
  const controller = new AbortController()
  const timeout = setTimeout(() => {
    controller.abort()
  }, options.timeoutMs)

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...options.headers
      },
      body: JSON.stringify(body),
      signal: controller.signal
    })

    if (!response.ok) {
      const errorBody = await response.text().catch(() => '')
      throw new TransportError(
        `${options.providerName} API error (${response.status}): ${errorBody.slice(0, 500)}`,
        response.status
      )
    }

    const data: unknown = await response.json()
    return data
  } catch (error) {
    if (error instanceof LLMError) throw error
    if (controller.signal.aborted) {
      throw new TransportError(`${options.providerName} request timed out after ${options.timeoutMs}ms`)
    }
    throw new TransportError(
      `${options.providerName} request failed: ${error instanceof Error ? error.message : String(error)}`
    )
  } finally {
    clearTimeout(timeout)
  }
}

/** Runs a throwing provider body and folds any failure into an outcome. */
export async function settle(providerName: string, send: () => Promise<string>): Promise<ProviderOutcome> {
  try {
    const text = await send()
    return { ok: true, text }
  } catch (error) {
    if (error instanceof LLMError) {
      return { ok: false, error }
    }
    return {
      ok: false,
      error: new TransportError(
        `${providerName} call failed: ${error instanceof Error ? error.message : String(error)}`
      )
    }
  }
}
