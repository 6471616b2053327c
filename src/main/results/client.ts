import fs from 'fs/promises'
import type { WebServiceConfig } from '../config'
import { errorMessage } from '../utils'

export interface ResultSink {
  submitScreenshot(input: { imagePath: string; analysis: string | null; capturedAt: Date }): Promise<boolean>
  submitClipboard(input: { text: string; analysis: string | null; capturedAt: Date }): Promise<boolean>
}

const SUBMIT_TIMEOUT_MS = 5_000

export function serviceBaseUrl(config: Pick<WebServiceConfig, 'host' | 'port'>): string {
  // A wildcard bind address is not something to connect to
  const host = config.host === '0.0.0.0' || config.host === '::' ? 'localhost' : config.host
  return `http://${host}:${config.port}`
}

/** Posts captures to the results service over HTTP. */
export class ResultsClient implements ResultSink {
  private readonly baseUrl: string

  constructor(config: Pick<WebServiceConfig, 'host' | 'port'>) {
    this.baseUrl = serviceBaseUrl(config)
  }

  async submitScreenshot(input: { imagePath: string; analysis: string | null; capturedAt: Date }): Promise<boolean> {
    let imageBase64: string
    try {
      imageBase64 = (await fs.readFile(input.imagePath)).toString('base64')
    } catch (error) {
      console.error(`[ResultsClient] Could not read ${input.imagePath}: ${errorMessage(error)}`)
      return false
    }

    return this.post('/api/screenshot', {
      image_base64: imageBase64,
      analysis: input.analysis,
      timestamp: input.capturedAt.toISOString()
    })
  }

  submitClipboard(input: { text: string; analysis: string | null; capturedAt: Date }): Promise<boolean> {
    return this.post('/api/clipboard', {
      text: input.text,
      analysis: input.analysis,
      timestamp: input.capturedAt.toISOString()
    })
  }

  private async post(route: string, body: unknown): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}${route}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(SUBMIT_TIMEOUT_MS)
      })
      if (!response.ok) {
        console.warn(`[ResultsClient] ${route} returned ${response.status}`)
        return false
      }
      return true
    } catch (error) {
      console.error(`[ResultsClient] ${route} failed: ${errorMessage(error)}`)
      return false
    }
  }
}
