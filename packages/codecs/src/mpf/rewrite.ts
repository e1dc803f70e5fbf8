import { MpfError, type SeekableReader, type SeekableWriter } from '@jpegseg/core'
import type { IfdNode } from '@jpegseg/metadata'
import { Dumper } from '../jpeg/dumper'
import { writeData, writeMarker } from '../jpeg/primitives'
import { Scanner } from '../jpeg/scanner'
import { Marker } from '../jpeg/types'
import { MPF_BASE_DISTANCE, makeMpfSegment } from './header'
import { deriveLengths, encodeIndex } from './index-model'
import { MpfAttributeRewriter, MpfIndexReader, MpfIndexRewriter, type MpfProcessor } from './processors'
import type { MpfIndex } from './types'

/**
 * Copy one image from `reader` to `writer`, SOI through EOI, passing every
 * APP2 segment through `processor`
 */
export function copyImage(writer: SeekableWriter, reader: SeekableReader, processor: MpfProcessor): void {
	const scanner = new Scanner(reader)
	const dumper = new Dumper(writer)
	for (;;) {
		const { marker, data } = scanner.scan()
		let out = data
		if (marker === Marker.APP2 && data) {
			out = processor.processApp2(reader, data).segment
		}
		dumper.dump(marker, out)
		if (marker === Marker.EOI) return
	}
}

/**
 * Read the MPF index from the first image of a file
 *
 * Scans the headers of the image at the reader's position, up to SOS.
 * Returns null when the image has no MPF segment.
 */
export function readMpfIndex(reader: SeekableReader): { index: MpfIndex; tree: IfdNode } | null {
	const scanner = new Scanner(reader)
	const processor = new MpfIndexReader()
	for (;;) {
		const { marker, data } = scanner.scan()
		if (marker === Marker.APP2 && data) {
			processor.processApp2(reader, data)
			if (processor.index && processor.tree) {
				return { index: processor.index, tree: processor.tree }
			}
		}
		if (marker === Marker.SOS || marker === Marker.EOI) return null
	}
}

/**
 * Backpatch the MPF index reserved by `rewriter` with final image positions
 *
 * `offsets` are absolute output positions (0 for the primary image). The
 * writer is left just past the rewritten segment.
 */
export function rewriteMpf(
	writer: SeekableWriter,
	rewriter: MpfIndexRewriter,
	offsets: number[],
	lengths: number[]
): MpfIndex {
	const { tree } = rewriter
	if (!tree) {
		throw new MpfError('MissingIndex', 'no MPF index segment was reserved')
	}

	const index: MpfIndex = {
		offset: rewriter.app2WritePos + MPF_BASE_DISTANCE,
		imageOffsets: offsets,
		imageLengths: lengths,
	}
	encodeIndex(index, tree)

	const segment = makeMpfSegment(tree)
	if (segment.length !== rewriter.reservedSize) {
		throw new MpfError(
			'SizeMismatch',
			`rewritten MPF segment is ${segment.length} bytes, ${rewriter.reservedSize} were reserved`
		)
	}

	writer.seek(rewriter.app2WritePos)
	writeMarker(writer, Marker.APP2)
	writeData(writer, segment)
	return index
}

export interface CopyResult {
	/** Index as written to the output, or null for a single-image file */
	index: MpfIndex | null
	/** Output position after the last image */
	end: number
}

/**
 * Copy a JPEG file, including the extra images listed in its MPF index
 *
 * Images are written back to back. The primary image's MPF segment is first
 * written with placeholder values; once every image is out and its position
 * known, the segment is overwritten in place. The writer is left at the end
 * of the output.
 */
export function copyMpfFile(writer: SeekableWriter, reader: SeekableReader): CopyResult {
	const primaryStart = writer.tell()
	const rewriter = new MpfIndexRewriter(writer)
	copyImage(writer, reader, rewriter)

	const source = rewriter.index
	if (!source) {
		return { index: null, end: writer.tell() }
	}

	const starts = [primaryStart]
	for (let i = 1; i < source.imageOffsets.length; i++) {
		reader.seek(source.imageOffsets[i]!)
		starts.push(writer.tell())
		copyImage(writer, reader, new MpfAttributeRewriter())
	}

	const end = writer.tell()
	const offsets = starts.map((start, i) => (i === 0 ? 0 : start))
	const index = rewriteMpf(writer, rewriter, offsets, deriveLengths(starts, end))
	writer.seek(end)
	return { index, end }
}
