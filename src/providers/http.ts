import type {z} from 'zod'
import {BackendHTTPError, DecodeError, RequestMarshalError, TransportError, describeError} from '../core/errors.js'
import type {JsonObject} from '../core/json.js'

export type JsonRequest = {
  backend: string
  url: string
  body: JsonObject
  headers?: Record<string, string>
  timeoutMs: number
  signal?: AbortSignal
}

export type JsonResponse = {
  status: number
  data: unknown
}

export function encodeBody(body: JsonObject): string {
  try {
    return JSON.stringify(body)
  } catch (error) {
    throw new RequestMarshalError(`failed to marshal request body: ${describeError(error)}`, {cause: error})
  }
}

export function decodeWith<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  payload: unknown,
  what: string
): z.output<TSchema> {
  const parsed = schema.safeParse(payload)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new DecodeError(`unexpected ${what} shape: ${issues}`, {cause: parsed.error})
  }

  return parsed.data
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}${path}`
}

/**
 * POSTs a JSON body and parses the JSON reply. The caller's signal and the
 * per-request timeout both abort the underlying fetch.
 */
export async function postJson(request: JsonRequest): Promise<JsonResponse> {
  const payload = encodeBody(request.body)
  const controller = new AbortController()
  const timer = setTimeout(() => {
    controller.abort(new Error(`request timed out after ${request.timeoutMs}ms`))
  }, request.timeoutMs)
  timer.unref?.()

  const callerSignal = request.signal
  const forwardAbort = () => controller.abort(callerSignal?.reason)
  if (callerSignal?.aborted) {
    forwardAbort()
  } else {
    callerSignal?.addEventListener('abort', forwardAbort, {once: true})
  }

  let status: number
  let text: string
  try {
    const response = await fetch(request.url, {
      method: 'POST',
      headers: {'Content-Type': 'application/json', ...request.headers},
      body: payload,
      signal: controller.signal
    })
    status = response.status
    text = await response.text()
  } catch (error) {
    const reason = controller.signal.aborted ? describeError(controller.signal.reason) : describeError(error)
    throw new TransportError(`HTTP request to ${request.url} failed: ${reason}`, {cause: error})
  } finally {
    clearTimeout(timer)
    callerSignal?.removeEventListener('abort', forwardAbort)
  }

  if (status < 200 || status >= 300) {
    throw new BackendHTTPError(request.backend, status, text)
  }

  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (error) {
    throw new DecodeError(`failed to decode ${request.backend} response: ${describeError(error)}`, {cause: error})
  }

  return {status, data}
}
