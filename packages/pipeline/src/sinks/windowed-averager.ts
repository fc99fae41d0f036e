import {
  silentLogger,
  type Average,
  type Logger,
  type SensorEvent,
} from '@gas-monitor/pipeline-common'
import { requirePositiveInteger } from '../errors'
import { FifoQueue } from '../fifo-queue'
import type { EventSource } from '../pipeline'
import { Sink } from './sink'

/**
 * A half-open time interval `[start, end)` collecting event values.
 */
export interface Bin {
  readonly start: number
  readonly end: number
  readonly values: number[]
}

/**
 * Receives every finalized average. May be async; a rejection propagates out of
 * `WindowedAverager#handle`.
 */
export interface AverageWriter {
  write: (average: Average) => void | Promise<void>
}

export interface WindowedAveragerOptions {
  /** Bin width. */
  averagingPeriodSeconds: number
  /** How far a bin's end must lag the clock before the bin is retired. */
  expirySeconds: number
  output?: AverageWriter
  now?: () => number
  logger?: Logger
}

/**
 * Mean of the bin's values; 0 when the bin never received one.
 */
export const averageOf = (bin: Bin): Average => {
  const total = bin.values.reduce((sum, value) => sum + value, 0)
  return {
    start: bin.start,
    end: bin.end,
    value: bin.values.length === 0 ? 0 : total / bin.values.length,
  }
}

const formatTime = (ms: number): string => new Date(ms).toISOString()

/**
 * Moving average over fixed-width, contiguous time bins.
 *
 * Bins are created on demand as event timestamps move past the newest bin and
 * retired, one per processed event, once their end is more than the expiry period
 * behind the clock. Events older than the oldest live bin are dropped.
 */
export class WindowedAverager extends Sink {
  private readonly periodMs: number
  private readonly expiryMs: number
  private readonly bins = new FifoQueue<Bin>()
  private readonly output: AverageWriter | undefined
  private readonly now: () => number
  private readonly logger: Logger
  private emitted = 0

  public constructor(options: WindowedAveragerOptions) {
    super()
    this.periodMs =
      requirePositiveInteger(options.averagingPeriodSeconds, 'averagingPeriodSeconds') * 1000
    this.expiryMs = requirePositiveInteger(options.expirySeconds, 'expirySeconds') * 1000
    this.output = options.output
    this.now = options.now ?? (() => Date.now())
    this.logger = options.logger ?? silentLogger

    // Zero-width seed: the first event at or after it opens the first real bin.
    const seed = this.now() - this.expiryMs
    this.bins.push({ start: seed, end: seed, values: [] })
  }

  public get averagesEmitted(): number {
    return this.emitted
  }

  public async handle(events: EventSource): Promise<void> {
    for await (const event of events) {
      this.addToBin(event)
      const expired = this.maybeExpireFirstBin()
      if (expired != null) {
        await this.emit(expired)
      }
    }
  }

  public addToBin(event: SensorEvent): void {
    if (event.timestamp < this.bins.first().start) {
      this.logger.debug(`Not averaging old event at timestamp ${event.timestamp}`)
      return
    }

    while (event.timestamp >= this.bins.last().end) {
      const last = this.bins.last()
      this.logger.debug(
        `Adding new bin for event at ${event.timestamp} (current last bin ${last.start} to ${last.end})`
      )
      this.bins.push({ start: last.end, end: last.end + this.periodMs, values: [] })
    }

    // Counted back from the newest bin, so the zero-width seed is never chosen.
    const index = this.bins.length - Math.ceil((this.bins.last().end - event.timestamp) / this.periodMs)
    this.bins.at(index).values.push(event.value)
  }

  /**
   * Retires the oldest bin once it has aged past the expiry period. Retiring the
   * only live bin opens the next one, so the window stays contiguous.
   * @returns The bin's average, or null when nothing was retired.
   */
  public maybeExpireFirstBin(): Average | null {
    if (this.now() - this.expiryMs <= this.bins.first().end) {
      return null
    }

    const retired = this.bins.shift()
    if (this.bins.length === 0) {
      this.bins.push({ start: retired.end, end: retired.end + this.periodMs, values: [] })
    }
    return averageOf(retired)
  }

  /**
   * Copies of the live bins, oldest first.
   */
  public snapshot(): Bin[] {
    return Array.from(this.bins, (bin) => ({ ...bin, values: [...bin.values] }))
  }

  private async emit(average: Average): Promise<void> {
    this.emitted += 1
    this.logger.info(
      `Average value for ${formatTime(average.start)} to ${formatTime(average.end)} is ${average.value}`
    )
    await this.output?.write(average)
  }
}
