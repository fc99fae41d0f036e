import { describe, expect, it } from 'vitest'
import { parseLocationList, parseSensorEvent } from './schemas'

describe('parseSensorEvent', () => {
  it('accepts a well-formed reading', () => {
    const reading = { locationId: 'loc-1', eventId: 'e1', timestamp: 1000, value: 2.5 }
    expect(parseSensorEvent(reading)).toEqual(reading)
  })

  it('rejects readings with missing or mistyped fields', () => {
    expect(parseSensorEvent({ locationId: 'loc-1', eventId: 'e1', value: 2.5 })).toBeNull()
    expect(
      parseSensorEvent({ locationId: 'loc-1', eventId: 'e1', timestamp: '1000', value: 2.5 })
    ).toBeNull()
    expect(parseSensorEvent('not a record')).toBeNull()
  })
})

describe('parseLocationList', () => {
  it('returns the validated locations', () => {
    expect(parseLocationList([{ id: 'north', x: 1, y: 2 }])).toEqual([{ id: 'north', x: 1, y: 2 }])
  })

  it('names the offending entry', () => {
    expect(() => parseLocationList([{ id: 'north', x: 1 }])).toThrow(
      'Invalid location list: 0.y: Required'
    )
  })
})
