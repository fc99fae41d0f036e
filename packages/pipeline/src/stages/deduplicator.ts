import { silentLogger, type Logger, type SensorEvent } from '@gas-monitor/pipeline-common'
import { requireNonNegativeInteger } from '../errors'
import { FifoQueue } from '../fifo-queue'
import { Pipeline, type EventSource } from '../pipeline'

/**
 * Tracks when an admitted event id may be seen again without counting as a duplicate.
 */
export interface DeduplicationRecord {
  readonly expiry: number
  readonly id: string
}

export interface DeduplicationOptions {
  ttlSeconds: number
  now?: () => number
  logger?: Logger
}

/**
 * Drops events whose id was admitted within the trailing time-to-live.
 *
 * The TTL is constant, so records enter the expiry queue in expiry order and
 * eviction only ever looks at the front. Not safe to share between two
 * concurrently pulled streams.
 */
export class DeduplicationStage extends Pipeline {
  public readonly ttlSeconds: number
  private readonly ttlMs: number
  private readonly expiryQueue = new FifoQueue<DeduplicationRecord>()
  private readonly liveIds = new Set<string>()
  private readonly now: () => number
  private readonly logger: Logger
  private duplicates = 0

  public constructor(options: DeduplicationOptions) {
    super()
    this.ttlSeconds = requireNonNegativeInteger(options.ttlSeconds, 'ttlSeconds')
    this.ttlMs = this.ttlSeconds * 1000
    this.now = options.now ?? (() => Date.now())
    this.logger = options.logger ?? silentLogger
  }

  public get duplicateEventsIgnored(): number {
    return this.duplicates
  }

  public get cacheSize(): number {
    return this.liveIds.size
  }

  public async *handle(events: EventSource): AsyncGenerator<SensorEvent> {
    for await (const event of events) {
      const processedAt = this.now()
      this.evictExpired(processedAt)

      if (this.liveIds.has(event.eventId)) {
        this.logger.debug(`Found duplicated event: ${event.eventId}`)
        this.duplicates += 1
        continue
      }

      this.liveIds.add(event.eventId)
      this.expiryQueue.push({ expiry: processedAt + this.ttlMs, id: event.eventId })
      yield event
    }
  }

  private evictExpired(now: number): void {
    while (this.expiryQueue.length > 0 && now > this.expiryQueue.first().expiry) {
      const record = this.expiryQueue.shift()
      this.liveIds.delete(record.id)
      this.logger.debug(`Expired deduplication record ${record.id} (cache size: ${this.liveIds.size})`)
    }
  }
}
