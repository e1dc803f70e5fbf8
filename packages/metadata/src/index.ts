/**
 * @jpegseg/metadata
 *
 * Tag directory codec for the TIFF structures embedded in JPEG segments
 *
 * Features:
 * - TIFF header and IFD chain parsing into an owned tree
 * - Size-stable serialization for rewriting values in place
 * - 32-bit and 16-bit field accessors
 * - Multi-Picture Format tag tables
 */

export * from './mpf'
export * from './tiff'
