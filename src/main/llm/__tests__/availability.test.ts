import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { AvailabilityProber, isUsableKey } from '../availability'
import { llmConfig } from './fixtures'

describe('isUsableKey', () => {
  it('rejects empty and placeholder keys', () => {
    expect(isUsableKey('')).toBe(false)
    expect(isUsableKey('   ')).toBe(false)
    expect(isUsableKey('your_openai_api_key')).toBe(false)
    expect(isUsableKey('YOUR_API_KEY')).toBe(false)
    expect(isUsableKey('test-secret')).toBe(true)
  })
})

describe('AvailabilityProber', () => {
  const fetchMock = vi.fn<typeof fetch>()

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock)
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
    fetchMock.mockReset()
  })

  it('checks hosted vendors by their keys without any request', async () => {
    const prober = new AvailabilityProber(
      llmConfig({ openai: { apiKey: 'your_openai_api_key', baseUrl: 'https://openai.test/v1', timeoutMs: 1000 } })
    )

    await expect(prober.check('claude')).resolves.toBe(true)
    await expect(prober.check('openai')).resolves.toBe(false)
    await expect(prober.check('doubao')).resolves.toBe(false)
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('probes the local ollama server', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"models":[]}', { status: 200 }))
    fetchMock.mockRejectedValueOnce(new TypeError('connect ECONNREFUSED'))
    const prober = new AvailabilityProber(llmConfig())

    await expect(prober.check('ollama')).resolves.toBe(true)
    await expect(prober.check('ollama')).resolves.toBe(false)
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe('http://ollama.test:11434/api/tags')
  })

  it('requires url and key for custom providers', async () => {
    const prober = new AvailabilityProber(
      llmConfig({
        custom: {
          full: { apiUrl: 'https://llm.test/v1/chat/completions', apiKey: 'test-secret', timeoutMs: 1000 },
          keyless: { apiUrl: 'https://llm.test/v1/chat/completions', apiKey: '', timeoutMs: 1000 }
        }
      })
    )

    await expect(prober.check('full')).resolves.toBe(true)
    await expect(prober.check('keyless')).resolves.toBe(false)
    await expect(prober.check('absent')).resolves.toBe(false)
  })

  it('passes only when every provider passes', async () => {
    const prober = new AvailabilityProber(llmConfig())

    await expect(prober.checkAll(['openai', 'claude', 'openai'])).resolves.toBe(true)
    await expect(prober.checkAll(['openai', 'doubao'])).resolves.toBe(false)
    await expect(prober.checkAll([])).resolves.toBe(false)
  })

  it('checks each distinct provider once', async () => {
    const prober = new AvailabilityProber(llmConfig())
    const check = vi.spyOn(prober, 'check')

    await prober.checkAll(['claude', 'claude'])

    expect(check).toHaveBeenCalledTimes(1)
  })
})
