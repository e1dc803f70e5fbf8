import type { SeekableReader, SeekableWriter } from '@jpegseg/core'
import { type IfdNode, TagSpace } from '@jpegseg/metadata'
import { getMpfHeader, getMpfTree, makeMpfSegment } from './header'
import { decodeIndex, hasImageCount, mpfBaseFromReader } from './index-model'
import type { App2Result, MpfIndex } from './types'

/**
 * Leaves APP2 segments alone and reports none as MPF
 */
export class MpfPassThrough {
	readonly kind = 'pass-through'

	processApp2(_reader: SeekableReader, segment: Uint8Array): App2Result {
		return { isMpf: false, segment }
	}
}

/**
 * Detects MPF segments without decoding them
 */
export class MpfCheck {
	readonly kind = 'check'

	processApp2(_reader: SeekableReader, segment: Uint8Array): App2Result {
		return { isMpf: getMpfHeader(segment).isMpf, segment }
	}
}

/**
 * Reads image positions from the MPF index of the first image in a file
 *
 * An MPF segment without an image count is reported as MPF but leaves
 * `index` null.
 */
export class MpfIndexReader {
	readonly kind = 'index-reader'
	tree: IfdNode | null = null
	index: MpfIndex | null = null

	/**
	 * `reader` must be positioned just past `segment`, as it is after
	 * `Scanner.scan()` returned it
	 */
	processApp2(reader: SeekableReader, segment: Uint8Array): App2Result {
		const { isMpf, next } = getMpfHeader(segment)
		if (isMpf) {
			const tree = getMpfTree(segment.subarray(next), TagSpace.MpfIndex)
			if (hasImageCount(tree)) {
				this.index = decodeIndex(tree, mpfBaseFromReader(reader, segment))
				this.tree = tree
			}
		}
		return { isMpf, segment }
	}
}

/**
 * Reserves space for the MPF index of the first image in a file
 *
 * Decodes the index, then re-encodes it unchanged and records where its
 * APP2 marker will be written. The final image positions are filled in
 * later by `rewriteMpf`, which produces a segment of exactly
 * `reservedSize` bytes.
 */
export class MpfIndexRewriter {
	readonly kind = 'index-rewriter'
	tree: IfdNode | null = null
	index: MpfIndex | null = null
	/** Output position of the MPF APP2 marker */
	app2WritePos = 0
	/** Payload size of the placeholder segment */
	reservedSize = 0

	private readonly writer: SeekableWriter

	constructor(writer: SeekableWriter) {
		this.writer = writer
	}

	processApp2(reader: SeekableReader, segment: Uint8Array): App2Result {
		const { isMpf, next } = getMpfHeader(segment)
		if (!isMpf) return { isMpf, segment }

		const tree = getMpfTree(segment.subarray(next), TagSpace.MpfIndex)
		// A standalone image's attribute directory is copied as it is
		if (!hasImageCount(tree)) return { isMpf, segment }
		this.index = decodeIndex(tree, mpfBaseFromReader(reader, segment))
		this.tree = tree

		const placeholder = makeMpfSegment(tree)
		this.reservedSize = placeholder.length
		this.app2WritePos = this.writer.tell()
		return { isMpf, segment: placeholder }
	}
}

/**
 * Re-encodes the MP Attribute directories of the images after the first
 */
export class MpfAttributeRewriter {
	readonly kind = 'attribute-rewriter'
	tree: IfdNode | null = null

	processApp2(_reader: SeekableReader, segment: Uint8Array): App2Result {
		const { isMpf, next } = getMpfHeader(segment)
		if (!isMpf) return { isMpf, segment }

		this.tree = getMpfTree(segment.subarray(next), TagSpace.MpfAttribute)
		return { isMpf, segment: makeMpfSegment(this.tree) }
	}
}

/**
 * The ways an APP2 segment can be handled while scanning or copying
 */
export type MpfProcessor =
	| MpfPassThrough
	| MpfCheck
	| MpfIndexReader
	| MpfIndexRewriter
	| MpfAttributeRewriter
