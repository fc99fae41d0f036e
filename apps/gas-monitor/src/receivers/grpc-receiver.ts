import * as grpc from '@grpc/grpc-js'
import {
  ReadingServiceService,
  silentLogger,
  type Logger,
  type SensorEvent,
  type StreamReadingsRequest,
} from '@gas-monitor/pipeline-common'
import type { EventReceiver } from './event-receiver'

export interface GrpcReceiverOptions {
  /** Reading service address, `host:port`. */
  address: string
  /** Readings to request; 0 streams until the receiver stops pulling. */
  maxEvents?: number
  logger?: Logger
}

/**
 * Subscribes to a reading service's server stream. Stopping iteration cancels the
 * call and closes the channel.
 */
export class GrpcReceiver implements EventReceiver {
  private readonly address: string
  private readonly maxEvents: number
  private readonly logger: Logger
  private malformed = 0

  public constructor(options: GrpcReceiverOptions) {
    this.address = options.address
    this.maxEvents = options.maxEvents ?? 0
    this.logger = options.logger ?? silentLogger
  }

  public get malformedRecords(): number {
    return this.malformed
  }

  public async *events(): AsyncGenerator<SensorEvent> {
    const client = new grpc.Client(this.address, grpc.credentials.createInsecure())
    const method = ReadingServiceService.streamReadings
    const request: StreamReadingsRequest = { maxEvents: this.maxEvents }
    const call = client.makeServerStreamRequest(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      request
    )
    call.on('error', (error: Error) => {
      const code = 'code' in error ? error.code : undefined
      if (code === grpc.status.CANCELLED) {
        this.logger.debug('Reading stream cancelled')
        return
      }
      this.logger.debug(`Reading stream closed with error: ${error.message}`)
    })

    this.logger.info(`Subscribed to readings at ${this.address}`)
    const messages: AsyncIterable<SensorEvent | null> = call
    let completed = false

    try {
      for await (const reading of messages) {
        if (reading == null) {
          this.malformed += 1
          this.logger.warn('Skipping malformed reading from stream')
          continue
        }
        yield reading
      }
      completed = true
    } finally {
      if (!completed) {
        call.cancel()
      }
      client.close()
    }
  }
}
