import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Writable } from 'node:stream'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import {
  AVERAGE_COLUMNS,
  CENTROID_COLUMNS,
  CsvOutput,
  formatCsvCell,
  toAverageWriter,
  toCentroidWriter,
} from './csv-output'

describe('CsvOutput', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'gas-monitor-csv-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('writes averages with ISO bin bounds', async () => {
    const filePath = join(tempDir, 'averages.csv')
    const output = await CsvOutput.open(filePath, AVERAGE_COLUMNS)
    const writer = toAverageWriter(output)

    await writer.write({ start: 70_000, end: 80_000, value: 5 })
    await writer.write({ start: 80_000, end: 90_000, value: 0.25 })
    await output.close()

    expect(output.rowCount).toBe(2)
    await expect(readFile(filePath, 'utf8')).resolves.toBe(
      'Bin Start,Bin End,Average Value\n' +
        '1970-01-01T00:01:10.000Z,1970-01-01T00:01:20.000Z,5\n' +
        '1970-01-01T00:01:20.000Z,1970-01-01T00:01:30.000Z,0.25\n'
    )
  })

  it('writes the centroid coordinates', async () => {
    const filePath = join(tempDir, 'centroid.csv')
    const output = await CsvOutput.open(filePath, CENTROID_COLUMNS)

    await toCentroidWriter(output).write({ x: 10, y: -0.5, totalValue: 12, eventCount: 4 })
    await output.close()

    await expect(readFile(filePath, 'utf8')).resolves.toBe('X,Y\n10,-0.5\n')
  })

  it('fails to open a file in a missing directory', async () => {
    await expect(CsvOutput.open(join(tempDir, 'missing', 'out.csv'), CENTROID_COLUMNS)).rejects.toThrow(
      'ENOENT'
    )
  })
})

describe('CsvOutput.close', () => {
  it('releases a failed stream and reports its error', async () => {
    const stream = new Writable({
      write: (_chunk, _encoding, callback) => callback(),
    })
    const output = new CsvOutput('averages.csv', stream)

    stream.emit('error', new Error('disk full'))

    await expect(output.close()).rejects.toThrow('disk full')
    expect(stream.destroyed).toBe(true)
  })

  it('refuses rows after the stream has failed', async () => {
    const stream = new Writable({
      write: (_chunk, _encoding, callback) => callback(),
    })
    const output = new CsvOutput('averages.csv', stream)

    stream.emit('error', new Error('disk full'))

    await expect(output.writeRow([1, 2])).rejects.toThrow('disk full')
    expect(output.rowCount).toBe(0)
  })
})

describe('formatCsvCell', () => {
  it('quotes cells containing separators or quotes', () => {
    expect(formatCsvCell('plain')).toBe('plain')
    expect(formatCsvCell('a,b')).toBe('"a,b"')
    expect(formatCsvCell('say "hi"')).toBe('"say ""hi"""')
    expect(formatCsvCell(1.5)).toBe('1.5')
  })
})
