export * from './codec'
export * from './dumper'
export * from './markers'
export * from './primitives'
export * from './scanner'
export * from './segments'
export * from './stuffing'
export * from './types'
