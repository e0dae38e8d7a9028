import type {AppConfig} from '../config/schema.js'
import {InMemoryEventBus, type BackendEvent, type EventHandler} from './event-bus.js'
import {LogFileSubscriber} from './subscribers/log-file-subscriber.js'
import {MetricsSubscriber} from './subscribers/metrics-subscriber.js'

export type Runtime = {
  bus: InMemoryEventBus<BackendEvent>
  metrics: MetricsSubscriber
  close(): Promise<void>
}

/**
 * Wires the event bus the backends log to: the JSONL log file (when enabled),
 * metrics, and an optional extra listener such as console output.
 */
export function startRuntime(config: AppConfig, onEvent?: EventHandler<BackendEvent>): Runtime {
  const bus = new InMemoryEventBus<BackendEvent>()
  const metrics = new MetricsSubscriber()
  const unsubscribers = [bus.subscribe((event) => metrics.handle(event))]

  const logFile = config.logging.enabled ? new LogFileSubscriber(config.logging.file) : undefined
  if (logFile) {
    unsubscribers.push(
      bus.subscribe((event) => {
        void logFile.handle(event)
      })
    )
  }
  if (onEvent) unsubscribers.push(bus.subscribe(onEvent))

  return {
    bus,
    metrics,
    async close() {
      for (const unsubscribe of unsubscribers) unsubscribe()
      await logFile?.flush()
    }
  }
}
