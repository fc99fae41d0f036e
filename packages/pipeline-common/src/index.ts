export * from './types'
export * from './logger'
export * from './metrics'
export * from './schemas'
export * from './reading-service'
