/**
 * Error taxonomy shared by every backend. Callers can branch on the class
 * (or on `name`) to tell a failed turn apart from a failed tool.
 */

export class BackendError extends Error {
  constructor(message: string, options?: {cause?: unknown}) {
    super(message, options)
    this.name = 'BackendError'
  }
}

export class BackendHTTPError extends BackendError {
  readonly status: number
  readonly body: string

  constructor(backend: string, status: number, body: string) {
    super(`${backend} request failed: status code ${status}, response: ${body}`)
    this.name = 'BackendHTTPError'
    this.status = status
    this.body = body
  }
}

export class DecodeError extends BackendError {
  constructor(message: string, options?: {cause?: unknown}) {
    super(message, options)
    this.name = 'DecodeError'
  }
}

export class ToolNotFoundError extends BackendError {
  readonly toolName: string

  constructor(toolName: string) {
    super(`tool not found: ${toolName}`)
    this.name = 'ToolNotFoundError'
    this.toolName = toolName
  }
}

export class ToolExecutionError extends BackendError {
  readonly toolName: string

  constructor(toolName: string, cause: unknown) {
    super(`failed to execute tool ${toolName}: ${describeError(cause)}`, {cause})
    this.name = 'ToolExecutionError'
    this.toolName = toolName
  }
}

export class RequestMarshalError extends BackendError {
  constructor(message: string, options?: {cause?: unknown}) {
    super(message, options)
    this.name = 'RequestMarshalError'
  }
}

export class TransportError extends BackendError {
  constructor(message: string, options?: {cause?: unknown}) {
    super(message, options)
    this.name = 'TransportError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
