import { createWriteStream } from 'node:fs'
import { once } from 'node:events'
import type { Writable } from 'node:stream'
import { setTimeout as delay } from 'node:timers/promises'
import type { Location, SensorEvent } from '@gas-monitor/pipeline-common'

export const STDOUT_TARGET = '-'

/**
 * Configuration for generating synthetic sensor readings.
 */
export interface GeneratorConfig {
  eventCount: number
  locations: Location[]
  seed?: number
  /** Share of readings that redeliver the previous reading unchanged. */
  duplicateRatio?: number
  /** Share of readings reported from a location id that is not in `locations`. */
  invalidRatio?: number
  /** Timestamp the sequence starts after; defaults to the current time. */
  startTime?: number
}

export interface GenerateEventsOptions {
  /** NDJSON file to write, or "-" for stdout. */
  outputFile: string
  /** Wait between readings for the gap between their timestamps. */
  realtime?: boolean
  sleep?: (ms: number) => Promise<void>
}

export const createRng = (seed?: number): (() => number) => {
  if (seed == null) {
    return () => Math.random()
  }
  let value = seed >>> 0
  return () => {
    value |= 0
    value = (value + 0x6d2b79f5) | 0
    let t = Math.imul(value ^ (value >>> 15), 1 | value)
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

const isRatio = (value: number): boolean => Number.isFinite(value) && value >= 0 && value <= 1

export const validateGeneratorConfig = (config: GeneratorConfig): void => {
  if (!Number.isInteger(config.eventCount) || config.eventCount <= 0) {
    throw new Error('eventCount must be a positive integer')
  }
  if (config.locations.length === 0) {
    throw new Error('locations must not be empty')
  }
  if (!isRatio(config.duplicateRatio ?? 0)) {
    throw new Error('duplicateRatio must be between 0 and 1')
  }
  if (!isRatio(config.invalidRatio ?? 0)) {
    throw new Error('invalidRatio must be between 0 and 1')
  }
}

const nextTimestamp = (currentMs: number, rng: () => number): number => {
  const delta = 250 + Math.floor(rng() * 1000)
  return currentMs + delta
}

const pickLocation = (locations: Location[], rng: () => number): string => {
  const index = Math.floor(rng() * locations.length)
  return (locations[index] ?? locations[0]).id
}

const toEventId = (sequence: number): string => `evt-${sequence.toString().padStart(8, '0')}`

/**
 * Lazily produces `eventCount` readings with increasing timestamps. Duplicates
 * repeat the previous reading; invalid readings use an `unknown-` location id.
 */
export function* createReadings(config: GeneratorConfig): Generator<SensorEvent> {
  validateGeneratorConfig(config)

  const rng = createRng(config.seed)
  const duplicateRatio = config.duplicateRatio ?? 0
  const invalidRatio = config.invalidRatio ?? 0
  let currentTime = config.startTime ?? Date.now()
  let previous: SensorEvent | null = null

  for (let i = 0; i < config.eventCount; i += 1) {
    if (previous != null && rng() < duplicateRatio) {
      yield previous
      continue
    }

    currentTime = nextTimestamp(currentTime, rng)
    const locationId =
      rng() < invalidRatio
        ? `unknown-${Math.floor(rng() * 1000)}`
        : pickLocation(config.locations, rng)
    const reading: SensorEvent = {
      locationId,
      eventId: toEventId(i),
      timestamp: currentTime,
      value: Math.round(rng() * 100_000) / 1000,
    }
    previous = reading
    yield reading
  }
}

const writeLine = async (stream: Writable, line: string): Promise<void> => {
  if (!stream.write(line)) {
    await once(stream, 'drain')
  }
}

const openOutput = (outputFile: string): Writable => {
  return outputFile === STDOUT_TARGET
    ? process.stdout
    : createWriteStream(outputFile, { encoding: 'utf8' })
}

/**
 * Writes synthetic readings as NDJSON.
 * @returns A promise that resolves once every reading has been written.
 */
export const generateEvents = async (
  config: GeneratorConfig,
  options: GenerateEventsOptions
): Promise<void> => {
  validateGeneratorConfig(config)

  const sleep = options.sleep ?? ((ms: number) => delay(ms))
  const stream = openOutput(options.outputFile)
  let lastTimestamp: number | null = null

  for (const reading of createReadings(config)) {
    if (options.realtime === true && lastTimestamp != null) {
      await sleep(reading.timestamp - lastTimestamp)
    }
    lastTimestamp = reading.timestamp
    await writeLine(stream, `${JSON.stringify(reading)}\n`)
  }

  if (stream === process.stdout) {
    return
  }
  await new Promise<void>((resolve, reject) => {
    stream.end(() => resolve())
    stream.on('error', (error: NodeJS.ErrnoException) => reject(error))
  })
}
