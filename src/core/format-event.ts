import type {BackendEvent} from './event-bus.js'

export function shorten(text: string, max = 500): string {
  if (text.length <= max) return text
  return `${text.slice(0, max)}\n...[truncated]`
}

export function formatEvent(event: BackendEvent): string {
  switch (event.type) {
    case 'request':
      return `REQUEST backend=${event.backend} endpoint=${event.endpoint} attempt=${event.attempt} tools=${event.toolsEnabled}`
    case 'response':
      return `RESPONSE backend=${event.backend} endpoint=${event.endpoint} status=${event.status} duration=${event.durationMs}ms`
    case 'reply':
      return `REPLY backend=${event.backend}\n${shorten(event.content)}`
    case 'tool_call':
      return `TOOL_CALL backend=${event.backend} tool=${event.tool} input=${JSON.stringify(event.arguments)}`
    case 'tool_result':
      return `TOOL_RESULT backend=${event.backend} tool=${event.tool} ok=${event.ok}\n${shorten(event.output)}`
    case 'tool_retry':
      return `TOOL_RETRY backend=${event.backend} unknown_tool=${event.tool} resending without tools`
    case 'error':
      return `ERROR backend=${event.backend} endpoint=${event.endpoint} ${event.errorName}: ${event.error}`
  }
}
