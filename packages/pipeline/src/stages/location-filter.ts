import { silentLogger, type Logger, type SensorEvent } from '@gas-monitor/pipeline-common'
import { Pipeline, type EventSource } from '../pipeline'

/**
 * Drops events whose location is not in the known set.
 */
export class LocationFilterStage extends Pipeline {
  private readonly validLocationIds: ReadonlySet<string>
  private readonly logger: Logger
  private invalid = 0

  public constructor(validLocations: Iterable<{ readonly id: string }>, logger: Logger = silentLogger) {
    super()
    this.validLocationIds = new Set(Array.from(validLocations, (location) => location.id))
    this.logger = logger
  }

  public get invalidEventsFiltered(): number {
    return this.invalid
  }

  public async *handle(events: EventSource): AsyncGenerator<SensorEvent> {
    for await (const event of events) {
      if (this.validLocationIds.has(event.locationId)) {
        yield event
        continue
      }
      this.logger.debug(`Ignoring event with unknown location ID: ${event.locationId}`)
      this.invalid += 1
    }
  }
}
