import { MpfError, type SeekableReader } from '@jpegseg/core'
import {
	type IfdNode,
	MPF_ENTRY_SIZE,
	MpfTag,
	TagSpace,
	findField,
	getLong,
	setLong,
} from '@jpegseg/metadata'
import { MPF_HEADER_SIZE } from './header'
import type { MpfIndex } from './types'

const MAX_U32 = 0xffffffff

// 32-bit word positions within an image's 16-byte entry
const ENTRY_LENGTH_WORD = 1
const ENTRY_OFFSET_WORD = 2

const WORDS_PER_ENTRY = MPF_ENTRY_SIZE / 4

/**
 * Whether a directory carries an image count, which marks it as an MP Index
 * rather than the MP Attribute directory of a standalone image
 */
export function hasImageCount(tree: IfdNode): boolean {
	return findField(tree, MpfTag.NumberOfImages) !== undefined
}

/**
 * Build an MpfIndex from an MP Index directory
 *
 * `offset` is the file position of the byte following the MPF header, which
 * relative offsets in the entry table are measured from.
 */
export function decodeIndex(tree: IfdNode, offset: number): MpfIndex {
	if (tree.space !== TagSpace.MpfIndex) {
		throw new MpfError('SpaceMismatch', `expected an MP Index directory, got ${tree.space}`)
	}

	const countField = findField(tree, MpfTag.NumberOfImages)
	const count = countField ? getLong(countField, 0, tree.littleEndian) : 0
	if (count === 0) {
		throw new MpfError('ZeroImageCount', 'MPF image count is 0')
	}

	const entry = findField(tree, MpfTag.Entry)
	const entryBytes = entry?.data.length ?? 0
	if (!entry || entryBytes < MPF_ENTRY_SIZE * count) {
		throw new MpfError(
			'EntryTableTooShort',
			`MPF Entry has ${entryBytes} bytes, need ${MPF_ENTRY_SIZE} for each of ${count} images`
		)
	}

	const imageOffsets: number[] = []
	const imageLengths: number[] = []
	for (let i = 0; i < count; i++) {
		const relative = getLong(entry, i * WORDS_PER_ENTRY + ENTRY_OFFSET_WORD, tree.littleEndian)
		let absolute = 0
		if (relative !== 0) {
			absolute = relative + offset
			if (absolute > MAX_U32) {
				throw new MpfError('OffsetOverflow', `image ${i + 1} offset ${relative} + ${offset}`)
			}
		}
		if (i === 0 && absolute !== 0) {
			throw new MpfError('InvalidMPFOffsetPattern', 'first image should have an MPF offset of zero')
		}
		if (i > 0 && absolute === 0) {
			throw new MpfError(
				'InvalidMPFOffsetPattern',
				`only the first image should have an MPF offset of zero, image ${i + 1} has one`
			)
		}
		imageOffsets.push(absolute)
		imageLengths.push(getLong(entry, i * WORDS_PER_ENTRY + ENTRY_LENGTH_WORD, tree.littleEndian))
	}

	return { offset, imageOffsets, imageLengths }
}

/**
 * Write offsets and lengths from an MpfIndex back into an MP Index directory
 *
 * The entry table is updated in place; its size never changes, so the
 * directory serializes to the same number of bytes as before. The primary
 * image must be at offset 0 and every other image past `index.offset`;
 * relative offsets and lengths must fit in 32 bits.
 */
export function encodeIndex(index: MpfIndex, tree: IfdNode): void {
	const count = index.imageOffsets.length
	if (index.imageLengths.length !== count) {
		throw new MpfError(
			'SizeMismatch',
			`${count} offsets but ${index.imageLengths.length} lengths`
		)
	}

	const entry = findField(tree, MpfTag.Entry)
	const entryBytes = entry?.data.length ?? 0
	if (!entry || entryBytes < MPF_ENTRY_SIZE * count) {
		throw new MpfError(
			'EntryTableTooShort',
			`MPF Entry has ${entryBytes} bytes, need ${MPF_ENTRY_SIZE} for each of ${count} images`
		)
	}

	for (let i = 0; i < count; i++) {
		const absolute = index.imageOffsets[i]!
		const length = index.imageLengths[i]!
		let relative = 0
		if (i === 0) {
			if (absolute !== 0) {
				throw new MpfError('InvalidMPFOffsetPattern', `first image offset is ${absolute}, must be zero`)
			}
		} else {
			if (absolute === 0 || absolute <= index.offset) {
				throw new MpfError(
					'InvalidMPFOffsetPattern',
					`image ${i + 1} at ${absolute} is not past the MPF offset base ${index.offset}`
				)
			}
			relative = absolute - index.offset
			if (relative > MAX_U32) {
				throw new MpfError('OffsetOverflow', `image ${i + 1} relative offset ${relative} exceeds 32 bits`)
			}
		}
		if (length < 0 || length > MAX_U32) {
			throw new MpfError('OffsetOverflow', `image ${i + 1} length ${length} does not fit in 32 bits`)
		}
		setLong(entry, i * WORDS_PER_ENTRY + ENTRY_OFFSET_WORD, relative, tree.littleEndian)
		setLong(entry, i * WORDS_PER_ENTRY + ENTRY_LENGTH_WORD, length, tree.littleEndian)
	}
}

/**
 * Image lengths for images stored back to back
 *
 * Each length is the distance to the next image's start; the last one runs
 * to `end`.
 */
export function deriveLengths(starts: readonly number[], end: number): number[] {
	return starts.map((start, i) => (i + 1 < starts.length ? starts[i + 1]! : end) - start)
}

/**
 * MPF offset base for an APP2 payload the reader has just consumed
 */
export function mpfBaseFromReader(reader: SeekableReader, segment: Uint8Array): number {
	return reader.tell() - (segment.length - MPF_HEADER_SIZE)
}

/**
 * Seek the reader to each image in turn and hand it to `apply` with the
 * image number (from 0) and its length
 */
export function iterateImages(
	reader: SeekableReader,
	index: MpfIndex,
	apply: (reader: SeekableReader, image: number, length: number) => void
): void {
	for (let i = 0; i < index.imageOffsets.length; i++) {
		reader.seek(index.imageOffsets[i]!)
		apply(reader, i, index.imageLengths[i]!)
	}
}
