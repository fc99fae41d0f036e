import { EventEmitter, once } from 'node:events'
import { setTimeout as delay } from 'node:timers/promises'
import * as grpc from '@grpc/grpc-js'
import {
  ReadingServiceService,
  silentLogger,
  type Logger,
  type ReadingServiceServer,
  type SensorEvent,
  type StreamReadingsRequest,
} from '@gas-monitor/pipeline-common'
import { createReadings, type GeneratorConfig } from './generator'

export interface ReadingServiceOptions {
  /** Pace each stream by the gaps between reading timestamps. */
  realtime?: boolean
  now?: () => number
  sleep?: (ms: number) => Promise<void>
  logger?: Logger
}

type ReadingCall = grpc.ServerWritableStream<StreamReadingsRequest, SensorEvent>

interface ReadingTarget extends EventEmitter {
  write: (reading: SensorEvent) => boolean
}

/**
 * Writes one reading and waits for `drain` when the buffer is full. Aborting
 * `signal` ends the wait without an error.
 */
export const writeReading = async (
  target: ReadingTarget,
  reading: SensorEvent,
  signal: AbortSignal
): Promise<void> => {
  if (target.write(reading)) {
    return
  }
  try {
    await once(target, 'drain', { signal })
  } catch (error) {
    if (!signal.aborted) {
      throw error
    }
  }
}

/**
 * Serves every subscriber its own generated sequence, starting at the time it
 * subscribed. `maxEvents` caps the sequence below the configured count.
 */
export const createReadingService = (
  config: Omit<GeneratorConfig, 'startTime'>,
  options: ReadingServiceOptions = {}
): ReadingServiceServer => {
  const now = options.now ?? (() => Date.now())
  const sleep = options.sleep ?? ((ms: number) => delay(ms))
  const logger = options.logger ?? silentLogger

  const stream = async (call: ReadingCall): Promise<void> => {
    const requested = call.request.maxEvents
    const eventCount = requested > 0 ? Math.min(requested, config.eventCount) : config.eventCount
    const cancellation = new AbortController()
    call.on('cancelled', () => {
      cancellation.abort()
    })

    logger.info(`Streaming ${eventCount} readings to ${call.getPeer()}`)
    let lastTimestamp: number | null = null
    let sent = 0
    for (const reading of createReadings({ ...config, eventCount, startTime: now() })) {
      if (options.realtime === true && lastTimestamp != null) {
        await sleep(reading.timestamp - lastTimestamp)
      }
      if (cancellation.signal.aborted) {
        break
      }
      lastTimestamp = reading.timestamp
      await writeReading(call, reading, cancellation.signal)
      sent += 1
    }

    if (cancellation.signal.aborted) {
      logger.info(`Subscriber cancelled after ${sent} readings`)
      return
    }
    call.end()
  }

  return {
    streamReadings: (call) => {
      stream(call).catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error)
        logger.error(`Reading stream failed: ${message}`)
        call.destroy(error instanceof Error ? error : new Error(message))
      })
    },
  }
}

/**
 * Binds a server for the reading service.
 * @returns The server and the port it bound, which differs from the requested one for port 0.
 */
export const startReadingServer = async (
  address: string,
  service: ReadingServiceServer
): Promise<{ server: grpc.Server; port: number }> => {
  const server = new grpc.Server()
  server.addService(ReadingServiceService, service)
  const port = await new Promise<number>((resolve, reject) => {
    server.bindAsync(address, grpc.ServerCredentials.createInsecure(), (error, boundPort) => {
      if (error != null) {
        reject(error)
        return
      }
      resolve(boundPort)
    })
  })
  return { server, port }
}
