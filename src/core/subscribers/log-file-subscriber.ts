import {appendFile, mkdir} from 'node:fs/promises'
import {dirname} from 'node:path'
import type {BackendEvent} from '../event-bus.js'

type LogRecord = {
  ts: string
  type: string
  [key: string]: unknown
}

/** Appends every backend event to a JSONL file, one write at a time. */
export class LogFileSubscriber {
  private readonly logPath: string
  private pending: Promise<void> = Promise.resolve()

  constructor(logPath: string) {
    this.logPath = logPath
  }

  async handle(event: BackendEvent): Promise<void> {
    await this.append({ts: new Date().toISOString(), ...event})
  }

  async flush(): Promise<void> {
    await this.pending
  }

  private async append(record: LogRecord): Promise<void> {
    const next = this.pending.then(async () => {
      try {
        await mkdir(dirname(this.logPath), {recursive: true})
        await appendFile(this.logPath, `${JSON.stringify(record)}\n`, 'utf8')
      } catch {
        // Best effort: logging must not break a request.
      }
    })
    this.pending = next
    await next
  }
}
