import { ByteBuffer, FormatError, type SeekableReader } from '@jpegseg/core'
import { hasPayload, startsScanData } from './markers'
import { readData, readHeader, readMarker } from './primitives'
import { readImageData } from './stuffing'
import { MAX_SEGMENT_DATA, Marker, RAW_DATA, type MarkerCode, type Segment } from './types'

export type ScannerState = 'awaiting-marker' | 'awaiting-scan-data' | 'ended'

/**
 * Pull reader for JPEG markers, segments and scan data
 *
 * Each `scan()` returns one segment. Payloads and scan data are read into a
 * single buffer owned by the scanner and reused on the next call: a returned
 * segment's `data` is only valid until `scan()` is called again, and reading
 * it afterwards throws `FormatError('StaleSegment')`. Use `copySegment` to
 * keep one.
 */
export class Scanner {
	private readonly reader: SeekableReader
	private readonly buffer = new ByteBuffer(MAX_SEGMENT_DATA)
	private generation = 0
	private current: ScannerState = 'awaiting-marker'

	/**
	 * Check the JPEG header and position the scanner on the first marker
	 */
	constructor(reader: SeekableReader) {
		this.reader = reader
		readHeader(reader)
	}

	get state(): ScannerState {
		return this.current
	}

	/**
	 * Position of the next byte to be read
	 */
	get offset(): number {
		return this.reader.tell()
	}

	/**
	 * Read the next segment
	 *
	 * Returns `RAW_DATA` with de-stuffed bytes for the scan data after SOS or
	 * RSTn, and null data for markers without a payload.
	 */
	scan(): Segment {
		switch (this.current) {
			case 'ended':
				throw new FormatError('PastEndOfImage', 'scan called after EOI')

			case 'awaiting-scan-data': {
				const data = readImageData(this.reader, this.buffer)
				this.current = 'awaiting-marker'
				return this.borrow(RAW_DATA, data)
			}

			case 'awaiting-marker': {
				const marker = readMarker(this.reader)
				if (marker === Marker.EOI) {
					this.current = 'ended'
				} else if (startsScanData(marker)) {
					this.current = 'awaiting-scan-data'
				}
				if (!hasPayload(marker)) {
					return this.borrow(marker, null)
				}
				return this.borrow(marker, readData(this.reader, this.buffer))
			}
		}
	}

	private borrow(marker: MarkerCode, data: Uint8Array | null): Segment {
		const generation = ++this.generation
		const scanner = this
		return {
			marker,
			get data(): Uint8Array | null {
				if (scanner.generation !== generation) {
					throw new FormatError(
						'StaleSegment',
						'segment data is only valid until the next scan; copy it to keep it'
					)
				}
				return data
			},
		}
	}
}
