import type {BackendEvent} from '../event-bus.js'

export type BackendMetrics = {
  requests: number
  failures: number
  replies: number
  toolCalls: number
  toolErrors: number
  retries: number
  totalLatencyMs: number
}

function emptyMetrics(): BackendMetrics {
  return {requests: 0, failures: 0, replies: 0, toolCalls: 0, toolErrors: 0, retries: 0, totalLatencyMs: 0}
}

export class MetricsSubscriber {
  private readonly byBackend = new Map<string, BackendMetrics>()

  handle(event: BackendEvent): void {
    const metrics = this.byBackend.get(event.backend) ?? emptyMetrics()
    this.byBackend.set(event.backend, metrics)

    switch (event.type) {
      case 'request':
        metrics.requests += 1
        break
      case 'response':
        metrics.totalLatencyMs += event.durationMs
        break
      case 'error':
        metrics.failures += 1
        break
      case 'reply':
        metrics.replies += 1
        break
      case 'tool_call':
        metrics.toolCalls += 1
        break
      case 'tool_result':
        if (!event.ok) metrics.toolErrors += 1
        break
      case 'tool_retry':
        metrics.retries += 1
        break
    }
  }

  snapshot(): Record<string, BackendMetrics> {
    return Object.fromEntries([...this.byBackend.entries()].map(([backend, metrics]) => [backend, {...metrics}]))
  }
}
