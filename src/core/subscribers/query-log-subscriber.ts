import {appendFile, mkdir} from 'node:fs/promises'
import {dirname} from 'node:path'
import type {QueryEvent} from '../../providers/types.js'

export type QueryLogRecord = QueryEvent & {
  ts: string
  level: 'info' | 'error'
}

export function eventLevel(event: QueryEvent): QueryLogRecord['level'] {
  return event.type === 'tool_arguments_invalid' ? 'error' : 'info'
}

/** Appends every query event to a JSONL file, one write at a time. */
export class QueryLogSubscriber {
  private pending: Promise<void> = Promise.resolve()

  constructor(
    private readonly logPath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async handle(event: QueryEvent): Promise<void> {
    const record: QueryLogRecord = {ts: this.now().toISOString(), level: eventLevel(event), ...event}
    await this.append(record)
  }

  private async append(record: QueryLogRecord): Promise<void> {
    const next = this.pending
      .catch(() => undefined)
      .then(async () => {
        await mkdir(dirname(this.logPath), {recursive: true})
        await appendFile(this.logPath, `${JSON.stringify(record)}\n`, 'utf8')
      })
    this.pending = next
    await next
  }

  async flush(): Promise<void> {
    await this.pending.catch(() => undefined)
  }
}
