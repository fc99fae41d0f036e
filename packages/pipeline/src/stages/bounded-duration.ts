import { silentLogger, type Logger, type SensorEvent } from '@gas-monitor/pipeline-common'
import { requirePositiveInteger } from '../errors'
import { Pipeline, type EventSource } from '../pipeline'

export interface BoundedDurationOptions {
  runTimeSeconds: number
  /** Custom time provider for deterministic tests. */
  now?: () => number
  logger?: Logger
}

/**
 * Passes events through until a wall-clock deadline, then stops pulling.
 * The deadline is fixed on the first pull, not at construction.
 */
export class BoundedDurationStage extends Pipeline {
  public readonly runTimeSeconds: number
  private readonly now: () => number
  private readonly logger: Logger
  private processed = 0

  public constructor(options: BoundedDurationOptions) {
    super()
    this.runTimeSeconds = requirePositiveInteger(options.runTimeSeconds, 'runTimeSeconds')
    this.now = options.now ?? (() => Date.now())
    this.logger = options.logger ?? silentLogger
  }

  public get eventsProcessed(): number {
    return this.processed
  }

  public async *handle(events: EventSource): AsyncGenerator<SensorEvent> {
    const deadline = this.now() + this.runTimeSeconds * 1000
    this.logger.info(`Processing events for ${this.runTimeSeconds} seconds`)

    for await (const event of events) {
      if (this.now() >= deadline) {
        this.logger.info('Finished processing events')
        return
      }
      this.logger.debug(`Processing event ${event.eventId} at ${event.locationId}`)
      this.processed += 1
      yield event
    }

    this.logger.info('Event source ended before the deadline')
  }
}
