import {
  silentLogger,
  type Centroid,
  type Location,
  type Logger,
} from '@gas-monitor/pipeline-common'
import { EmptyAggregateError } from '../errors'
import type { EventSource } from '../pipeline'
import { Sink } from './sink'

export interface CentroidWriter {
  write: (centroid: Centroid) => void | Promise<void>
}

export interface SpatialAveragerOptions {
  output?: CentroidWriter
  logger?: Logger
}

/**
 * Value-weighted centroid of event locations over one full pass:
 * x = Σ(x·value) / Σvalue, and likewise for y.
 *
 * Unlike bin averages, a zero total is an error rather than 0.
 */
export class SpatialAverager extends Sink {
  private readonly coordinates: ReadonlyMap<string, Location>
  private readonly output: CentroidWriter | undefined
  private readonly logger: Logger
  private latest: Centroid | null = null

  public constructor(locations: Iterable<Location>, options: SpatialAveragerOptions = {}) {
    super()
    this.coordinates = new Map(Array.from(locations, (location) => [location.id, location]))
    this.output = options.output
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Result of the last completed pass.
   */
  public get centroid(): Centroid | null {
    return this.latest
  }

  /**
   * @throws {EmptyAggregateError} When the values seen sum to zero.
   */
  public async handle(events: EventSource): Promise<void> {
    let weightedX = 0
    let weightedY = 0
    let totalValue = 0
    let eventCount = 0

    for await (const event of events) {
      const location = this.coordinates.get(event.locationId)
      if (location == null) {
        this.logger.warn(`No coordinates for location ${event.locationId}, skipping event`)
        continue
      }
      weightedX += location.x * event.value
      weightedY += location.y * event.value
      totalValue += event.value
      eventCount += 1
    }

    if (totalValue === 0) {
      throw new EmptyAggregateError(eventCount)
    }

    const centroid: Centroid = {
      x: weightedX / totalValue,
      y: weightedY / totalValue,
      totalValue,
      eventCount,
    }
    this.latest = centroid
    this.logger.info(`Weighted centroid over ${eventCount} events is (${centroid.x}, ${centroid.y})`)
    await this.output?.write(centroid)
  }
}
