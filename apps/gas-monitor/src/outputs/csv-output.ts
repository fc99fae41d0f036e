import { once } from 'node:events'
import { createWriteStream } from 'node:fs'
import type { Writable } from 'node:stream'
import type { Average, Centroid } from '@gas-monitor/pipeline-common'
import type { AverageWriter, CentroidWriter } from '@gas-monitor/pipeline'

export type CsvCell = string | number

export const AVERAGE_COLUMNS = ['Bin Start', 'Bin End', 'Average Value'] as const
export const CENTROID_COLUMNS = ['X', 'Y'] as const

export const formatCsvCell = (value: CsvCell): string => {
  const text = String(value)
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

/**
 * Append-only CSV file. Rows are written in call order; a write waits for the
 * stream to drain when its buffer is full.
 */
export class CsvOutput {
  private failure: Error | null = null
  private rows = 0

  public constructor(
    public readonly filePath: string,
    private readonly stream: Writable
  ) {
    stream.on('error', (error) => {
      this.failure = error
    })
  }

  /**
   * Creates (or truncates) the file and writes the header row.
   */
  public static async open(filePath: string, header: readonly CsvCell[]): Promise<CsvOutput> {
    const stream = createWriteStream(filePath, { encoding: 'utf8' })
    await once(stream, 'open')
    const output = new CsvOutput(filePath, stream)
    await output.writeLine(header)
    return output
  }

  /** Data rows written so far, excluding the header. */
  public get rowCount(): number {
    return this.rows
  }

  public async writeRow(values: readonly CsvCell[]): Promise<void> {
    await this.writeLine(values)
    this.rows += 1
  }

  /**
   * Flushes and closes the file. A failed stream is destroyed instead and its
   * error rethrown.
   */
  public async close(): Promise<void> {
    const failure = this.failure
    if (failure != null) {
      this.stream.destroy()
      throw failure
    }
    await new Promise<void>((resolve, reject) => {
      this.stream.once('error', reject)
      this.stream.end(() => resolve())
    })
  }

  private async writeLine(values: readonly CsvCell[]): Promise<void> {
    if (this.failure != null) {
      throw this.failure
    }
    if (!this.stream.write(`${values.map(formatCsvCell).join(',')}\n`)) {
      await once(this.stream, 'drain')
    }
  }
}

const formatTime = (ms: number): string => new Date(ms).toISOString()

export const toAverageWriter = (output: CsvOutput): AverageWriter => ({
  write: (average: Average) =>
    output.writeRow([formatTime(average.start), formatTime(average.end), average.value]),
})

export const toCentroidWriter = (output: CsvOutput): CentroidWriter => ({
  write: (centroid: Centroid) => output.writeRow([centroid.x, centroid.y]),
})
