import {vi} from 'vitest'

export type FetchInput = string | URL | Request

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: {'Content-Type': 'application/json'}
  })
}

export function requestUrl(input: FetchInput): string {
  return typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error('expected a JSON object')
  }
  return Object.fromEntries(Object.entries(value))
}

export function requestBody(init?: RequestInit): Record<string, unknown> {
  return asRecord(JSON.parse(String(init?.body)))
}

/** Stubs global fetch with a handler and returns the mock for call inspection. */
export function stubFetch(handler: (input: FetchInput, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(handler)
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

export function bodyOfCall(fetchMock: ReturnType<typeof stubFetch>, index: number): Record<string, unknown> {
  const call = fetchMock.mock.calls[index]
  if (!call) throw new Error(`fetch was not called ${index + 1} times`)
  return requestBody(call[1])
}
