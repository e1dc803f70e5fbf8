/**
 * @jpegseg/codecs
 *
 * JPEG segment structure and Multi-Picture Format indexes
 */

export * from './jpeg'
export * from './mpf'
