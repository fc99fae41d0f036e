import { createReadStream } from 'node:fs'
import { createInterface } from 'node:readline'
import type { Readable } from 'node:stream'
import {
  parseSensorEvent,
  silentLogger,
  type Logger,
  type SensorEvent,
} from '@gas-monitor/pipeline-common'
import type { EventReceiver } from './event-receiver'

export const STDIN_SOURCE = '-'

/**
 * Reads one JSON reading per line from a file, stdin (`-`) or a stream.
 * Blank lines are ignored; lines that are not valid readings are logged and skipped.
 */
export class NdjsonReceiver implements EventReceiver {
  private malformed = 0

  public constructor(
    private readonly source: string | Readable,
    private readonly logger: Logger = silentLogger
  ) {}

  public get malformedRecords(): number {
    return this.malformed
  }

  public async *events(): AsyncGenerator<SensorEvent> {
    const input = this.openInput()
    const reader = createInterface({ input, crlfDelay: Infinity })
    let lineNumber = 0

    try {
      for await (const line of reader) {
        lineNumber += 1
        const trimmed = line.trim()
        if (trimmed.length === 0) {
          continue
        }
        const event = this.decode(trimmed, lineNumber)
        if (event != null) {
          yield event
        }
      }
    } finally {
      reader.close()
      if (input !== process.stdin) {
        input.destroy()
      }
    }
  }

  private openInput(): Readable {
    if (typeof this.source !== 'string') {
      return this.source
    }
    if (this.source === STDIN_SOURCE) {
      return process.stdin
    }
    return createReadStream(this.source, { encoding: 'utf8' })
  }

  private decode(line: string, lineNumber: number): SensorEvent | null {
    let raw: unknown
    try {
      raw = JSON.parse(line)
    } catch {
      this.reject(`Line ${lineNumber} is not valid JSON, skipping`)
      return null
    }

    const event = parseSensorEvent(raw)
    if (event == null) {
      this.reject(`Line ${lineNumber} is not a valid reading, skipping`)
    }
    return event
  }

  private reject(message: string): void {
    this.malformed += 1
    this.logger.warn(message)
  }
}
