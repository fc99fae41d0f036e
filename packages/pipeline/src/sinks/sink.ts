import { fromSource, type EventSource } from '../pipeline'
import { broadcast } from './broadcast'

/**
 * Terminal consumer of a pipeline's output. Each sink owns its aggregation state.
 */
export abstract class Sink {
  /**
   * Consumes the sequence to its end.
   */
  public abstract handle(events: EventSource): Promise<void>

  /**
   * Combines sinks so that each receives every event of one shared pass.
   */
  public static parallel(...sinks: Sink[]): Sink {
    return new ParallelSink(sinks)
  }
}

const distinct = (errors: unknown[]): unknown[] => Array.from(new Set(errors))

/**
 * Runs several sinks concurrently over one upstream pass (see {@link broadcast}).
 *
 * A failing sink stops only itself. Once every sink has settled, a single distinct
 * failure is re-thrown as-is and several are wrapped in an `AggregateError`.
 */
export class ParallelSink extends Sink {
  public readonly sinks: readonly Sink[]

  public constructor(sinks: readonly Sink[]) {
    super()
    if (sinks.length === 0) {
      throw new Error('ParallelSink needs at least one sink')
    }
    this.sinks = sinks
  }

  public async handle(events: EventSource): Promise<void> {
    const branches = broadcast(fromSource(events), this.sinks.length)
    const outcomes = await Promise.allSettled(
      this.sinks.map(async (sink, index) => {
        const branch = branches[index]
        try {
          await sink.handle(branch)
        } finally {
          // A sink that settles without closing its branch would keep buffering.
          await branch[Symbol.asyncIterator]().return?.()
        }
      })
    )

    const failures = distinct(
      outcomes.flatMap((outcome) => (outcome.status === 'rejected' ? [outcome.reason] : []))
    )
    if (failures.length === 1) {
      throw failures[0]
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `${failures.length} sinks failed`)
    }
  }
}
