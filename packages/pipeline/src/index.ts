export * from './errors'
export * from './fifo-queue'
export * from './pipeline'
export * from './stages/bounded-duration'
export * from './stages/location-filter'
export * from './stages/deduplicator'
export * from './sinks/sink'
export * from './sinks/broadcast'
export * from './sinks/windowed-averager'
export * from './sinks/spatial-averager'
