import { vi, type Mock } from 'vitest'

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d])
export const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46])

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  })
}

export function stubFetch(): Mock<typeof fetch> {
  const fetchMock = vi.fn<typeof fetch>()
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

export interface RecordedRequest {
  url: string
  method: string | undefined
  headers: Headers
  body: unknown
}

export function recordedRequest(fetchMock: Mock<typeof fetch>, index = 0): RecordedRequest {
  const call = fetchMock.mock.calls[index]
  if (!call) {
    throw new Error(`fetch was called ${fetchMock.mock.calls.length} times, expected call #${index}`)
  }
  const [input, init] = call
  return {
    url: String(input),
    method: init?.method,
    headers: new Headers(init?.headers),
    body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined
  }
}

// Never answers; rejects once the caller aborts the request
export const hangingFetch: typeof fetch = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')))
  })
