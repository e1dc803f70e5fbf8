/**
 * jpegseg commands
 *
 * Each command takes the input file's bytes and returns its output, so the
 * file system stays in index.ts.
 */

import {
	Dumper,
	Marker,
	MpfCheck,
	MpfIndexReader,
	type MpfIndex,
	type MpfProcessor,
	RAW_DATA,
	Scanner,
	copyMpfFile,
	isAppMarker,
	isJpgExtensionMarker,
	isRestartMarker,
	markerName,
} from '@jpegseg/codecs'
import { MemoryStream, type SeekableReader } from '@jpegseg/core'
import { type IfdNode, TagType, tagName } from '@jpegseg/metadata'

export interface PrintOptions {
	/** List the fields of each MPF directory */
	verbose?: boolean
}

// ─────────────────────────────────────────────────────────────────────────────
// print
// ─────────────────────────────────────────────────────────────────────────────

function describeTree(tree: IfdNode): string[] {
	const lines: string[] = []
	for (let node: IfdNode | null = tree; node; node = node.next) {
		for (const field of node.fields) {
			lines.push(`  ${tagName(node.space, field.tag)} (${TagType[field.type]}, count ${field.count})`)
		}
	}
	return lines
}

/**
 * List the segments of the image at the reader's position, SOI through EOI
 */
function printImage(reader: SeekableReader, processor: MpfProcessor, options: PrintOptions): string[] {
	const lines = ['SOI']
	const scanner = new Scanner(reader)
	let dataCount = 0
	let resetCount = 0

	for (;;) {
		const { marker, data } = scanner.scan()
		if (marker === RAW_DATA) {
			dataCount += data?.length ?? 0
			continue
		}
		if (!data && isRestartMarker(marker)) {
			resetCount++
			continue
		}
		if (dataCount > 0 || resetCount > 0) {
			let line = `${dataCount} bytes of image data`
			if (resetCount > 0) line += ` and ${resetCount} reset markers`
			lines.push(line)
			dataCount = 0
			resetCount = 0
		}

		if (!data) {
			lines.push(markerName(marker))
			if (marker === Marker.EOI) return lines
			continue
		}

		if (marker === Marker.APP2 && processor.processApp2(reader, data).isMpf) {
			lines.push(`${markerName(marker)}, ${data.length} bytes (MPF segment)`)
			if (options.verbose && processor.kind === 'index-reader' && processor.tree) {
				lines.push(...describeTree(processor.tree))
			}
			continue
		}
		lines.push(`${markerName(marker)}, ${data.length} bytes`)
	}
}

/**
 * Describe every segment of a file, then each extra image its MPF index
 * lists
 */
export function printFile(data: Uint8Array, options: PrintOptions = {}): string[] {
	const reader = new MemoryStream(data)
	const primary = new MpfIndexReader()
	const lines = printImage(reader, primary, options)

	const { index } = primary
	if (!index) return lines

	for (let i = 0; i < index.imageOffsets.length; i++) {
		const offset = index.imageOffsets[i]!
		if (offset === 0) continue
		lines.push(`MPF image ${i + 1} at offset ${offset}, size ${index.imageLengths[i]}`)
		reader.seek(offset)
		lines.push(...printImage(reader, new MpfCheck(), options))
	}
	return lines
}

// ─────────────────────────────────────────────────────────────────────────────
// copy
// ─────────────────────────────────────────────────────────────────────────────

export interface CopyOutput {
	data: Uint8Array
	/** Rewritten MPF index, or null when the file holds one image */
	index: MpfIndex | null
}

/**
 * Copy a file segment by segment, packing any MPF images after the first
 * and rewriting the index to match
 */
export function copyFile(data: Uint8Array): CopyOutput {
	const writer = new MemoryStream()
	const { index } = copyMpfFile(writer, new MemoryStream(data))
	return { data: writer.toUint8Array(), index }
}

// ─────────────────────────────────────────────────────────────────────────────
// strip
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Segments that carry metadata rather than image structure
 */
export function isStrippable(marker: number): boolean {
	return marker === Marker.COM || isAppMarker(marker) || isJpgExtensionMarker(marker)
}

/**
 * Copy the first image without its COM, APPn and JPGn segments
 *
 * Anything after the first EOI, MPF images included, is dropped.
 */
export function stripFile(data: Uint8Array): Uint8Array {
	const scanner = new Scanner(new MemoryStream(data))
	const writer = new MemoryStream()
	const dumper = new Dumper(writer)

	for (;;) {
		const { marker, data: payload } = scanner.scan()
		if (!isStrippable(marker)) {
			dumper.dump(marker, payload)
		}
		if (marker === Marker.EOI) return writer.toUint8Array()
	}
}
