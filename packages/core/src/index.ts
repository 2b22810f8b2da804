export * from './edge-validator'
export * from './errors'
export * from './graph'
export * from './logger'
export * from './observers'
export * from './planner'
export * from './runtime/engine'
export * from './runtime/types'
export * from './types'
