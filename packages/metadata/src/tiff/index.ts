export * from './field'
export * from './parser'
export * from './serializer'
export * from './types'
