/**
 * @jpegseg/core
 *
 * Seekable stream contract, in-memory stream and error taxonomy
 */

export * from './buffer'
export * from './errors'
export * from './stream'
export * from './types'
