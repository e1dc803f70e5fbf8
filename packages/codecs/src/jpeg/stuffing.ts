import { ByteBuffer, FormatError, type SeekableReader, type SeekableWriter } from '@jpegseg/core'
import { MARKER_PREFIX } from './types'

/** Bytes read from the stream per block while looking for a marker */
export const SCAN_BLOCK_SIZE = 10000

/**
 * Read entropy-coded scan data up to the next marker
 *
 * Drops the 0x00 stuffed after every literal 0xFF. Stops at a 0xFF followed
 * by any other byte, leaving the reader positioned on that 0xFF so the
 * marker can be read next. Scan data can be very large, so the stream is
 * read in blocks and the position is restored with a seek.
 *
 * When `buffer` is given its storage is reused and the result aliases it.
 */
export function readImageData(reader: SeekableReader, buffer?: ByteBuffer): Uint8Array {
	const out = buffer ?? new ByteBuffer(SCAN_BLOCK_SIZE)
	out.reset()

	const block = new Uint8Array(SCAN_BLOCK_SIZE)
	const start = reader.tell()
	let consumed = 0 // input bytes before the current block
	let sawPrefix = false // last byte copied was 0xFF

	for (;;) {
		const count = reader.read(block)
		if (count === 0) {
			throw new FormatError('Truncated', `scan data starting at ${start} has no terminating marker`)
		}

		let pos = 0
		if (sawPrefix) {
			// 0xFF was the last byte of the previous block
			sawPrefix = false
			if (block[0] === 0x00) {
				pos = 1
			} else {
				out.truncate(out.length - 1)
				reader.seek(start + consumed - 1)
				return out.view()
			}
		}

		while (pos < count) {
			const ff = block.indexOf(MARKER_PREFIX, pos)
			if (ff === -1 || ff >= count) {
				out.append(block.subarray(pos, count))
				break
			}

			out.append(block.subarray(pos, ff + 1))
			if (ff === count - 1) {
				sawPrefix = true
				break
			}
			if (block[ff + 1] === 0x00) {
				// Escaped 0xFF, skip the stuffed 0
				pos = ff + 2
				continue
			}

			// Found a marker
			out.truncate(out.length - 1)
			reader.seek(start + consumed + ff)
			return out.view()
		}

		consumed += count
	}
}

/**
 * Write scan data, stuffing a 0x00 after every 0xFF
 */
export function writeImageData(writer: SeekableWriter, data: Uint8Array): void {
	writer.write(stuffBytes(data))
}

/**
 * Byte-stuff a buffer in memory
 */
export function stuffBytes(data: Uint8Array): Uint8Array {
	let prefixes = 0
	for (let i = 0; i < data.length; i++) {
		if (data[i] === MARKER_PREFIX) prefixes++
	}
	if (prefixes === 0) return data

	const out = new Uint8Array(data.length + prefixes)
	let pos = 0
	for (let i = 0; i < data.length; i++) {
		const byte = data[i]!
		out[pos++] = byte
		if (byte === MARKER_PREFIX) out[pos++] = 0x00
	}
	return out
}

/**
 * Remove byte stuffing from a buffer in memory
 *
 * Reads up to the first marker (0xFF not followed by 0x00) or the end of
 * `data`. Returns the de-stuffed bytes and the number of input bytes
 * consumed, which is the marker's position when one was found.
 */
export function unstuffBytes(data: Uint8Array): { data: Uint8Array; consumed: number } {
	const out = new ByteBuffer(data.length)
	let i = 0
	while (i < data.length) {
		const byte = data[i]!
		if (byte === MARKER_PREFIX && i + 1 < data.length && data[i + 1] !== 0x00) break
		out.push(byte)
		i += byte === MARKER_PREFIX && i + 1 < data.length ? 2 : 1
	}
	return { data: out.toUint8Array(), consumed: i }
}
