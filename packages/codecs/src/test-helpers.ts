/**
 * Builders for small JPEG byte streams used by the tests
 */

import {
	type IfdNode,
	MpfTag,
	TagSpace,
	TagType,
	createField,
	setLong,
} from '@jpegseg/metadata'
import { makeMpfSegment } from './mpf/header'

export function bytes(...parts: ArrayLike<number>[]): Uint8Array {
	const total = parts.reduce((sum, part) => sum + part.length, 0)
	const out = new Uint8Array(total)
	let pos = 0
	for (const part of parts) {
		out.set(Array.from(part), pos)
		pos += part.length
	}
	return out
}

export function marker(code: number): number[] {
	return [0xff, code]
}

/**
 * Marker followed by a length-prefixed payload
 */
export function segment(code: number, payload: ArrayLike<number> = []): Uint8Array {
	const length = payload.length + 2
	return bytes([0xff, code, length >> 8, length & 0xff], payload)
}

/**
 * SOI, empty COM, SOS with an empty header, one scan byte, EOI
 */
export function minimalImage(scan: ArrayLike<number> = [0x01]): Uint8Array {
	return bytes(marker(0xd8), segment(0xfe), segment(0xda), scan, marker(0xd9))
}

export interface TestEntry {
	length: number
	/** Offset relative to the MPF base, 0 for the primary image */
	offset: number
}

/**
 * MP Index directory with Version, NumberOfImages and Entry fields
 */
export function mpfIndexTree(entries: TestEntry[], littleEndian = true, count = entries.length): IfdNode {
	const version = createField(MpfTag.Version, TagType.Undefined, 4)
	version.data.set([0x30, 0x31, 0x30, 0x30])
	const number = createField(MpfTag.NumberOfImages, TagType.Long, 1)
	setLong(number, 0, count, littleEndian)
	const table = createField(MpfTag.Entry, TagType.Undefined, 16 * entries.length)
	entries.forEach((entry, i) => {
		setLong(table, i * 4, i === 0 ? 0x20030000 : 0, littleEndian)
		setLong(table, i * 4 + 1, entry.length, littleEndian)
		setLong(table, i * 4 + 2, entry.offset, littleEndian)
	})
	return { littleEndian, space: TagSpace.MpfIndex, fields: [version, number, table], next: null }
}

/**
 * APP2 payload carrying an MP Index
 */
export function mpfIndexPayload(entries: TestEntry[], littleEndian = true): Uint8Array {
	return makeMpfSegment(mpfIndexTree(entries, littleEndian))
}

/**
 * APP2 payload carrying an MP Attribute directory for image `n`
 */
export function mpfAttributePayload(n: number): Uint8Array {
	const number = createField(MpfTag.IndividualImageNumber, TagType.Long, 1)
	setLong(number, 0, n, true)
	return makeMpfSegment({ littleEndian: true, space: TagSpace.MpfAttribute, fields: [number], next: null })
}

/**
 * Secondary image with an MP Attribute segment and stuffed scan data
 */
export function secondaryImage(n: number): Uint8Array {
	return bytes(
		marker(0xd8),
		segment(0xe2, mpfAttributePayload(n)),
		segment(0xda, [n]),
		[n, 0xff, 0x00, n],
		marker(0xd9)
	)
}

function primaryImage(entries: TestEntry[]): Uint8Array {
	return bytes(
		marker(0xd8),
		segment(0xe1, [0x45, 0x78]),
		segment(0xe2, mpfIndexPayload(entries)),
		segment(0xdb, [0x00]),
		segment(0xda, [0x01]),
		[0x11, 0xff, 0x00, 0x22],
		marker(0xd9)
	)
}

/** Position of the primary image's APP2 marker: SOI and a 2-byte APP1 */
export const PRIMARY_APP2_POS = 2 + 6

/**
 * Three-image MPF file with `gap` junk bytes between the images
 */
export function mpfFile(gap: number): { file: Uint8Array; starts: number[]; sizes: number[] } {
	const placeholder = primaryImage([
		{ length: 0, offset: 0 },
		{ length: 0, offset: 1 },
		{ length: 0, offset: 1 },
	])
	const second = secondaryImage(2)
	const third = secondaryImage(3)
	const junk = new Array<number>(gap).fill(0x5a)

	const sizes = [placeholder.length, second.length, third.length]
	const starts = [0, sizes[0]! + gap, sizes[0]! + gap + sizes[1]! + gap]
	const base = PRIMARY_APP2_POS + 8
	const primary = primaryImage([
		{ length: sizes[0]!, offset: 0 },
		{ length: sizes[1]!, offset: starts[1]! - base },
		{ length: sizes[2]!, offset: starts[2]! - base },
	])
	return { file: bytes(primary, junk, second, junk, third), starts, sizes }
}
