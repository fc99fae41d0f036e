import { describe, expect, it } from 'vitest'
import { ReadingServiceService, decodeReading, encodeJson } from './reading-service'

describe('ReadingServiceService', () => {
  const method = ReadingServiceService.streamReadings

  it('streams from the reading service path', () => {
    expect(method.path).toBe('/gasmonitor.v1.ReadingService/StreamReadings')
    expect(method.responseStream).toBe(true)
  })

  it('decodes a serialized reading', () => {
    const reading = { locationId: 'loc-1', eventId: 'e1', timestamp: 5, value: 1.25 }
    expect(method.responseDeserialize(method.responseSerialize(reading))).toEqual(reading)
  })

  it('turns undecodable payloads into null', () => {
    expect(decodeReading(Buffer.from('{not json', 'utf8'))).toBeNull()
    expect(decodeReading(encodeJson({ eventId: 'e1' }))).toBeNull()
  })

  it('defaults the request limit to unbounded', () => {
    expect(method.requestDeserialize(encodeJson({}))).toEqual({ maxEvents: 0 })
  })
})
