import type * as grpc from '@grpc/grpc-js'
import { z } from 'zod'
import { parseSensorEvent } from './schemas'
import type { SensorEvent } from './types'

export const READING_SERVICE_INTERFACE = 'gasmonitor.v1.ReadingService'

/**
 * Request for a server stream of readings.
 */
export interface StreamReadingsRequest {
  /** Number of readings to stream; 0 streams until the caller cancels. */
  maxEvents: number
}

const StreamReadingsRequestSchema = z.object({
  maxEvents: z.number().int().nonnegative().default(0),
})

export const encodeJson = (value: unknown): Buffer => Buffer.from(JSON.stringify(value), 'utf8')

export const decodeJson = (buffer: Buffer): unknown => JSON.parse(buffer.toString('utf8'))

const decodeStreamReadingsRequest = (buffer: Buffer): StreamReadingsRequest => {
  return StreamReadingsRequestSchema.parse(decodeJson(buffer))
}

/**
 * Decodes a streamed reading. Undecodable payloads become null so a single bad
 * message does not fail the whole call.
 */
export const decodeReading = (buffer: Buffer): SensorEvent | null => {
  try {
    return parseSensorEvent(decodeJson(buffer))
  } catch {
    return null
  }
}

/**
 * Server-side handlers for the reading service.
 */
export interface ReadingServiceServer extends grpc.UntypedServiceImplementation {
  streamReadings: grpc.handleServerStreamingCall<StreamReadingsRequest, SensorEvent>
}

/**
 * Service definition with a JSON codec; usable with `grpc.Server#addService` and
 * `grpc.Client#makeServerStreamRequest` without generated stubs.
 */
export const ReadingServiceService = {
  streamReadings: {
    path: `/${READING_SERVICE_INTERFACE}/StreamReadings`,
    requestStream: false,
    responseStream: true,
    requestSerialize: (request: StreamReadingsRequest): Buffer => encodeJson(request),
    requestDeserialize: decodeStreamReadingsRequest,
    responseSerialize: (reading: SensorEvent): Buffer => encodeJson(reading),
    responseDeserialize: decodeReading,
    originalName: 'streamReadings',
  },
} satisfies grpc.ServiceDefinition
