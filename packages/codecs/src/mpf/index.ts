export * from './header'
export * from './index-model'
export * from './processors'
export * from './rewrite'
export * from './types'
