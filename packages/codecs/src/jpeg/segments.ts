import type { SeekableReader, SeekableWriter } from '@jpegseg/core'
import { Dumper } from './dumper'
import { Scanner } from './scanner'
import { Marker, type Segment } from './types'

/**
 * Owned copy of a segment, safe to keep across `Scanner.scan()` calls
 */
export function copySegment(segment: Segment): Segment {
	return { marker: segment.marker, data: segment.data ? segment.data.slice() : null }
}

/**
 * Read a JPEG stream up to and including the SOS segment
 */
export function readSegments(reader: SeekableReader): Segment[] {
	const scanner = new Scanner(reader)
	const segments: Segment[] = []
	for (;;) {
		const segment = copySegment(scanner.scan())
		segments.push(segment)
		if (segment.marker === Marker.SOS) return segments
	}
}

/**
 * Read one whole image, scan data included, up to and including EOI
 */
export function readImage(reader: SeekableReader): Segment[] {
	const scanner = new Scanner(reader)
	const segments: Segment[] = []
	for (;;) {
		const segment = copySegment(scanner.scan())
		segments.push(segment)
		if (segment.marker === Marker.EOI) return segments
	}
}

/**
 * Write a header followed by the given segments
 */
export function writeSegments(writer: SeekableWriter, segments: readonly Segment[]): void {
	const dumper = new Dumper(writer)
	for (const segment of segments) {
		dumper.dump(segment.marker, segment.data)
	}
}
