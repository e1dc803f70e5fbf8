import type { SeekableWriter } from '@jpegseg/core'
import { writeData, writeHeader, writeMarker } from './primitives'
import { writeImageData } from './stuffing'
import { RAW_DATA, type MarkerCode } from './types'

/**
 * Writer for JPEG markers, segments and scan data; the mirror of `Scanner`
 */
export class Dumper {
	private readonly writer: SeekableWriter

	/**
	 * Write the JPEG header at the writer's current position
	 */
	constructor(writer: SeekableWriter) {
		this.writer = writer
		writeHeader(writer)
	}

	/**
	 * Write a marker and its payload, or stuffed scan data for `RAW_DATA`
	 */
	dump(marker: MarkerCode, data: Uint8Array | null): void {
		if (marker === RAW_DATA) {
			if (data) writeImageData(this.writer, data)
			return
		}
		writeMarker(this.writer, marker)
		if (data) {
			writeData(this.writer, data)
		}
	}
}
