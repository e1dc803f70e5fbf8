import { MemoryStream } from '@jpegseg/core'
import { readImage, writeSegments } from './segments'
import type { Segment } from './types'

/**
 * Whole-buffer access to the segment structure of a single JPEG image
 */
export const JpegSegmentCodec = {
	format: 'jpeg',

	/**
	 * Split an image into its segments, scan data included. Bytes after EOI
	 * are ignored.
	 */
	decode(data: Uint8Array): Segment[] {
		return readImage(new MemoryStream(data))
	},

	encode(segments: readonly Segment[]): Uint8Array {
		const stream = new MemoryStream()
		writeSegments(stream, segments)
		return stream.toUint8Array()
	},
} as const
