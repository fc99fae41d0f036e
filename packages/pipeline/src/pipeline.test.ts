import { describe, expect, it } from 'vitest'
import type { SensorEvent } from '@gas-monitor/pipeline-common'
import { Pipeline, type EventSource } from './pipeline'
import { Sink } from './sinks/sink'

const buildEvent = (overrides: Partial<SensorEvent> = {}): SensorEvent => ({
  locationId: 'loc-1',
  eventId: 'e1',
  timestamp: 0,
  value: 1,
  ...overrides,
})

const collect = async (events: AsyncIterable<SensorEvent>): Promise<SensorEvent[]> => {
  const output: SensorEvent[] = []
  for await (const event of events) {
    output.push(event)
  }
  return output
}

class SuffixStage extends Pipeline {
  public constructor(private readonly suffix: string) {
    super()
  }

  public async *handle(events: EventSource): AsyncGenerator<SensorEvent> {
    for await (const event of events) {
      yield { ...event, eventId: `${event.eventId}${this.suffix}` }
    }
  }
}

class CollectingSink extends Sink {
  public readonly received: SensorEvent[] = []

  public async handle(events: EventSource): Promise<void> {
    for await (const event of events) {
      this.received.push(event)
    }
  }
}

describe('Pipeline', () => {
  it('applies the second step to the output of the first', async () => {
    const pipeline = new SuffixStage('-a').combine(new SuffixStage('-b'))
    const output = await collect(pipeline.handle([buildEvent({ eventId: 'e1' })]))
    expect(output.map((event) => event.eventId)).toEqual(['e1-a-b'])
  })

  it('composes associatively and preserves order', async () => {
    const input = ['e1', 'e2', 'e3'].map((eventId) => buildEvent({ eventId }))
    const [a, b, c] = [new SuffixStage('a'), new SuffixStage('b'), new SuffixStage('c')]

    const left = await collect(a.combine(b).combine(c).handle(input))
    const right = await collect(a.combine(b.combine(c)).handle(input))

    expect(left.map((event) => event.eventId)).toEqual(['e1abc', 'e2abc', 'e3abc'])
    expect(right).toEqual(left)
  })

  it('pulls upstream only as far as the consumer asks', async () => {
    let pulled = 0
    async function* source(): AsyncGenerator<SensorEvent> {
      for (let i = 0; i < 100; i += 1) {
        pulled += 1
        yield buildEvent({ eventId: `e${i}` })
      }
    }

    const iterator = new SuffixStage('x')
      .combine(new SuffixStage('y'))
      .handle(source())
      [Symbol.asyncIterator]()
    const first = await iterator.next()

    expect(first.value?.eventId).toBe('e0xy')
    expect(pulled).toBe(1)
    await iterator.return?.()
  })

  it('pushes every surviving event into the attached sink', async () => {
    const sink = new CollectingSink()
    const input = [buildEvent({ eventId: 'e1' }), buildEvent({ eventId: 'e2' })]

    await new SuffixStage('!').sink(sink).handle(input)

    expect(sink.received.map((event) => event.eventId)).toEqual(['e1!', 'e2!'])
  })
})
