import { ByteBuffer, FormatError, type SeekableReader, type SeekableWriter } from '@jpegseg/core'
import { MARKER_PREFIX, MAX_SEGMENT_DATA, Marker, type MarkerCode } from './types'

/** Size of the JPEG header (SOI marker) */
export const HEADER_SIZE = 2

/**
 * Fill `target` completely or fail with Truncated
 */
export function readFull(reader: SeekableReader, target: Uint8Array, what: string): void {
	let filled = 0
	while (filled < target.length) {
		const count = reader.read(target.subarray(filled))
		if (count === 0) {
			throw new FormatError('Truncated', `expected ${target.length} bytes of ${what}, got ${filled}`)
		}
		filled += count
	}
}

function readByte(reader: SeekableReader, scratch: Uint8Array, what: string): number {
	readFull(reader, scratch.subarray(0, 1), what)
	return scratch[0]!
}

/**
 * Check whether a buffer starts with a JPEG header
 */
export function isJpegHeader(data: Uint8Array): boolean {
	return data.length >= HEADER_SIZE && data[0] === MARKER_PREFIX && data[1] === Marker.SOI
}

/**
 * Read the JPEG header (SOI marker). Fill bytes are not allowed before it.
 */
export function readHeader(reader: SeekableReader): void {
	const header = new Uint8Array(HEADER_SIZE)
	readFull(reader, header, 'header')
	if (!isJpegHeader(header)) {
		throw new FormatError('MissingStartMarker', 'SOI marker not found')
	}
}

export function writeHeader(writer: SeekableWriter): void {
	writeMarker(writer, Marker.SOI)
}

/**
 * Read a marker: 0xFF, any number of 0xFF fill bytes, then the marker byte
 */
export function readMarker(reader: SeekableReader): MarkerCode {
	const scratch = new Uint8Array(1)
	const prefix = readByte(reader, scratch, 'marker')
	if (prefix !== MARKER_PREFIX) {
		throw new FormatError(
			'ExpectedMarkerPrefix',
			`0xFF expected at ${reader.tell() - 1}, found 0x${prefix.toString(16)}`
		)
	}

	let marker = readByte(reader, scratch, 'marker')
	// Fill bytes carry nothing and are dropped
	while (marker === MARKER_PREFIX) {
		marker = readByte(reader, scratch, 'marker')
	}

	if (marker === 0) {
		throw new FormatError('InvalidMarkerZero', `marker 0 at ${reader.tell() - 1}`)
	}
	return marker
}

export function writeMarker(writer: SeekableWriter, marker: MarkerCode): void {
	if (!Number.isInteger(marker) || marker < 0x01 || marker > 0xfe) {
		throw new FormatError('InvalidMarkerValue', `cannot write marker ${marker}`)
	}
	writer.write(new Uint8Array([MARKER_PREFIX, marker]))
}

/**
 * Read a length-prefixed segment payload
 *
 * The 16-bit length counts itself, so the payload is two bytes shorter. When
 * `buffer` is given its storage is reused and the result aliases it.
 */
export function readData(reader: SeekableReader, buffer?: ByteBuffer): Uint8Array {
	const lengthBytes = new Uint8Array(2)
	readFull(reader, lengthBytes, 'segment length')
	const length = (lengthBytes[0]! << 8) | lengthBytes[1]!
	if (length < 2) {
		throw new FormatError('InvalidLength', `segment length ${length} is less than 2`)
	}

	const out = buffer ?? new ByteBuffer(length - 2)
	out.reset()
	const payload = out.claim(length - 2)
	readFull(reader, payload, 'segment data')
	out.commit(payload.length)
	return out.view()
}

/**
 * Write a length-prefixed segment payload
 */
export function writeData(writer: SeekableWriter, data: Uint8Array): void {
	if (data.length > MAX_SEGMENT_DATA) {
		throw new FormatError(
			'SegmentTooLarge',
			`data is too long (${data.length}), max 2^16 - 3 (${MAX_SEGMENT_DATA})`
		)
	}
	const length = data.length + 2
	writer.write(new Uint8Array([length >> 8, length & 0xff]))
	writer.write(data)
}
