import type { SensorEvent } from '@gas-monitor/pipeline-common'
import type { Sink } from './sinks/sink'

/**
 * Anything a stage or sink can pull events from.
 */
export type EventSource = AsyncIterable<SensorEvent> | Iterable<SensorEvent>

/**
 * Adapts any event source to a lazy async sequence. Closing the returned
 * sequence closes the source.
 */
export async function* fromSource<T>(source: AsyncIterable<T> | Iterable<T>): AsyncGenerator<T> {
  for await (const item of source) {
    yield item
  }
}

/**
 * A lazy, order-preserving transform from one event sequence to another.
 * Nothing is pulled from the input until the output is pulled.
 */
export abstract class Pipeline {
  public abstract handle(events: EventSource): AsyncIterable<SensorEvent>

  /**
   * Chains `next` after this step. Composition is associative.
   */
  public combine(next: Pipeline): Pipeline {
    return new CombinedPipeline(this, next)
  }

  /**
   * Terminates this pipeline in `sink`.
   */
  public sink(sink: Sink): PipelineWithSink {
    return new PipelineWithSink(this, sink)
  }
}

/**
 * Two steps run back to back: `second` consumes what `first` yields.
 */
export class CombinedPipeline extends Pipeline {
  public constructor(
    private readonly first: Pipeline,
    private readonly second: Pipeline
  ) {
    super()
  }

  public handle(events: EventSource): AsyncIterable<SensorEvent> {
    return this.second.handle(this.first.handle(events))
  }
}

/**
 * A pipeline with its terminal consumer attached.
 */
export class PipelineWithSink {
  public constructor(
    private readonly pipeline: Pipeline,
    private readonly target: Sink
  ) {}

  /**
   * Pulls the whole chain and pushes every surviving event into the sink.
   * Resolves when the stream ends and the sink has finished.
   */
  public async handle(events: EventSource): Promise<void> {
    await this.target.handle(this.pipeline.handle(events))
  }
}
