/**
 * A single sensor reading as it flows through the pipeline.
 * Stages observe and may drop events, never mutate them.
 */
export interface SensorEvent {
  readonly locationId: string
  readonly eventId: string
  /** Milliseconds since epoch. */
  readonly timestamp: number
  readonly value: number
}

/**
 * A known sensor location with its plane coordinates.
 */
export interface Location {
  readonly id: string
  readonly x: number
  readonly y: number
}

/**
 * Final average of a retired time bin, covering `[start, end)`.
 */
export interface Average {
  readonly start: number
  readonly end: number
  readonly value: number
}

/**
 * Value-weighted average position over one pass of the stream.
 */
export interface Centroid {
  readonly x: number
  readonly y: number
  readonly totalValue: number
  readonly eventCount: number
}
