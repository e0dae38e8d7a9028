import type {JsonObject} from './json.js'

export type EventHandler<TEvent> = (event: TEvent) => void

export interface EventBus<TEvent> {
  publish(event: TEvent): void
  subscribe(handler: EventHandler<TEvent>): () => void
}

export type BackendEvent =
  | {type: 'request'; backend: string; endpoint: string; attempt: number; toolsEnabled: boolean}
  | {type: 'response'; backend: string; endpoint: string; status: number; durationMs: number}
  | {type: 'reply'; backend: string; content: string}
  | {type: 'tool_call'; backend: string; tool: string; arguments: JsonObject}
  | {type: 'tool_result'; backend: string; tool: string; ok: boolean; output: string}
  | {type: 'tool_retry'; backend: string; tool: string}
  | {type: 'error'; backend: string; endpoint: string; error: string; errorName: string}

export class InMemoryEventBus<TEvent> implements EventBus<TEvent> {
  private readonly handlers = new Set<EventHandler<TEvent>>()

  get subscriberCount(): number {
    return this.handlers.size
  }

  publish(event: TEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event)
      } catch {
        // A subscriber must never break a backend call.
      }
    }
  }

  subscribe(handler: EventHandler<TEvent>): () => void {
    this.handlers.add(handler)
    return () => {
      this.handlers.delete(handler)
    }
  }
}
