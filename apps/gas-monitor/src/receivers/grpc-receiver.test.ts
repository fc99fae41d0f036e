import * as grpc from '@grpc/grpc-js'
import { afterEach, describe, expect, it } from 'vitest'
import {
  ReadingServiceService,
  type ReadingServiceServer,
  type SensorEvent,
} from '@gas-monitor/pipeline-common'

import { GrpcReceiver } from './grpc-receiver'

const buildEvent = (overrides: Partial<SensorEvent> = {}): SensorEvent => ({
  locationId: 'L1',
  eventId: 'e1',
  timestamp: 1_000,
  value: 1,
  ...overrides,
})

const startServer = async (implementation: ReadingServiceServer): Promise<{ server: grpc.Server; address: string }> => {
  const server = new grpc.Server()
  server.addService(ReadingServiceService, implementation)
  const port = await new Promise<number>((resolve, reject) => {
    server.bindAsync('127.0.0.1:0', grpc.ServerCredentials.createInsecure(), (error, boundPort) => {
      if (error != null) {
        reject(error)
        return
      }
      resolve(boundPort)
    })
  })
  return { server, address: `127.0.0.1:${port}` }
}

describe('GrpcReceiver', () => {
  let server: grpc.Server | null = null

  afterEach(() => {
    server?.forceShutdown()
    server = null
  })

  it('yields streamed readings and counts the ones that fail validation', async () => {
    const started = await startServer({
      streamReadings: (call) => {
        call.write(buildEvent({ eventId: 'e1' }))
        call.write(buildEvent({ eventId: 'e2', timestamp: -1 }))
        call.write(buildEvent({ eventId: 'e3', value: 4 }))
        call.end()
      },
    })
    server = started.server
    const receiver = new GrpcReceiver({ address: started.address })

    const received: SensorEvent[] = []
    for await (const event of receiver.events()) {
      received.push(event)
    }

    expect(received).toEqual([buildEvent({ eventId: 'e1' }), buildEvent({ eventId: 'e3', value: 4 })])
    expect(receiver.malformedRecords).toBe(1)
  })

  it('cancels the call when the consumer stops', async () => {
    let markCancelled = (): void => {}
    const cancelled = new Promise<void>((resolve) => {
      markCancelled = resolve
    })
    const started = await startServer({
      streamReadings: (call) => {
        call.on('cancelled', () => markCancelled())
        call.write(buildEvent({ eventId: 'e1' }))
        call.write(buildEvent({ eventId: 'e2' }))
      },
    })
    server = started.server
    const receiver = new GrpcReceiver({ address: started.address })

    for await (const event of receiver.events()) {
      expect(event.eventId).toBe('e1')
      break
    }

    await expect(cancelled).resolves.toBeUndefined()
  })
})
