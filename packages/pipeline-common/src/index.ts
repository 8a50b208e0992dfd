export * from './types'
export * from './errors'
export * from './logger'
export * from './metrics'
