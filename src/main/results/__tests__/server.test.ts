import os from 'os'
import path from 'path'
import fs from 'fs/promises'
import type { Server } from 'http'
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ResultsClient } from '../client'
import { createServer, startServer } from '../server'
import { ResultsStore } from '../store'

function portOf(server: Server): number {
  const address = server.address()
  if (!address || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port')
  }
  return address.port
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()))
}

describe('results service', () => {
  let dir: string
  let store: ResultsStore
  let server: Server
  let baseUrl: string

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'results-service-'))
    store = new ResultsStore(dir)
    await store.initialize()
    const started = await startServer(createServer(store), '127.0.0.1', 0)
    if (!started) {
      throw new Error('results service did not start')
    }
    server = started
    baseUrl = `http://127.0.0.1:${portOf(server)}`
  })

  afterEach(async () => {
    await closeServer(server)
    await fs.rm(dir, { recursive: true, force: true })
  })

  function post(route: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body)
    })
  }

  it('reports health with CORS headers', async () => {
    const response = await fetch(`${baseUrl}/api/health`)

    expect(response.status).toBe(200)
    expect(response.headers.get('access-control-allow-origin')).toBe('*')
    await expect(response.json()).resolves.toEqual({ status: 'healthy', service: 'capture-relay results' })
  })

  it('stores clipboard results and lists them', async () => {
    const created = await post('/api/clipboard', { text: 'hello', timestamp: '2024-05-17T09:05:03.000Z' })
    const body: unknown = await created.json()

    expect(created.status).toBe(200)
    expect(body).toEqual({ status: 'success', id: expect.any(String) })

    const listed = await fetch(`${baseUrl}/api/results`)
    await expect(listed.json()).resolves.toEqual({
      results: [
        {
          id: expect.any(String),
          type: 'clipboard',
          content: 'hello',
          image_path: null,
          analysis: null,
          timestamp: '2024-05-17T09:05:03.000Z'
        }
      ]
    })
  })

  it('serves stored screenshot images', async () => {
    const bytes = Buffer.from('fake-png-bytes')
    await post('/api/screenshot', { image_base64: bytes.toString('base64'), analysis: 'A chart' })

    const latest = await store.latest()
    expect(latest?.analysis).toBe('A chart')

    const image = await fetch(`${baseUrl}/web_data/${latest?.imagePath ?? ''}`)
    expect(image.status).toBe(200)
    expect(Buffer.from(await image.arrayBuffer())).toEqual(bytes)
  })

  it('rejects malformed submissions', async () => {
    const response = await post('/api/clipboard', { analysis: 'no text' })

    expect(response.status).toBe(400)
    const body: unknown = await response.json()
    expect(body).toEqual({ error: expect.stringContaining('text') })
    await expect(store.list()).resolves.toEqual([])
  })

  it('returns null as the latest result when empty', async () => {
    const response = await fetch(`${baseUrl}/api/results/latest`)

    await expect(response.json()).resolves.toEqual({ result: null })
  })

  it('deletes by id and answers 404 for unknown ids', async () => {
    const stored = await store.addClipboard({ text: 'bye', analysis: null })

    const deleted = await fetch(`${baseUrl}/api/results/${stored.id}`, { method: 'DELETE' })
    expect(deleted.status).toBe(200)
    await expect(deleted.json()).resolves.toEqual({ status: 'success', message: 'Result deleted' })

    const missing = await fetch(`${baseUrl}/api/results/${stored.id}`, { method: 'DELETE' })
    expect(missing.status).toBe(404)
    await expect(missing.json()).resolves.toEqual({ error: 'Result not found' })
  })

  it('accepts submissions from the results client', async () => {
    const client = new ResultsClient({ host: '127.0.0.1', port: portOf(server) })
    const imagePath = path.join(dir, 'capture.png')
    await fs.writeFile(imagePath, 'image-bytes')
    const capturedAt = new Date('2024-05-17T09:05:03.000Z')

    await expect(client.submitClipboard({ text: 'note', analysis: null, capturedAt })).resolves.toBe(true)
    await expect(client.submitScreenshot({ imagePath, analysis: 'Notes', capturedAt })).resolves.toBe(true)

    const results = await store.list()
    expect(results.map((result) => [result.type, result.analysis, result.timestamp])).toEqual([
      ['clipboard', null, '2024-05-17T09:05:03.000Z'],
      ['screenshot', 'Notes', '2024-05-17T09:05:03.000Z']
    ])
  })

  it('resolves null when the port is taken', async () => {
    const second = await startServer(createServer(store), '127.0.0.1', portOf(server))

    expect(second).toBeNull()
  })
})
