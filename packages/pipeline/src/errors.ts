/**
 * Raised when a weighted aggregate has nothing to divide by.
 */
export class EmptyAggregateError extends Error {
  public readonly eventCount: number

  public constructor(eventCount: number) {
    super(`Cannot compute a weighted centroid: total value over ${eventCount} events is zero`)
    this.name = 'EmptyAggregateError'
    this.eventCount = eventCount
  }
}

export const requirePositiveInteger = (value: number, name: string): number => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer`)
  }
  return value
}

export const requireNonNegativeInteger = (value: number, name: string): number => {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer`)
  }
  return value
}
