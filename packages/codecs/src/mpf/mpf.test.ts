import { MemoryStream, MpfError } from '@jpegseg/core'
import { MpfTag, TagSpace, TagType, createField, getLong, findField } from '@jpegseg/metadata'
import { describe, expect, test } from 'vitest'
import {
	PRIMARY_APP2_POS,
	bytes,
	minimalImage,
	mpfAttributePayload,
	mpfFile,
	mpfIndexPayload,
	mpfIndexTree,
	secondaryImage,
} from '../test-helpers'
import { JpegSegmentCodec } from '../jpeg/codec'
import { MPF_BASE_DISTANCE, getMpfHeader, getMpfTree, makeMpfSegment } from './header'
import { decodeIndex, deriveLengths, encodeIndex, iterateImages, mpfBaseFromReader } from './index-model'
import {
	MpfAttributeRewriter,
	MpfCheck,
	MpfIndexReader,
	MpfIndexRewriter,
	MpfPassThrough,
} from './processors'
import { copyImage, copyMpfFile, readMpfIndex, rewriteMpf } from './rewrite'

function mpfCode(fn: () => unknown): string | undefined {
	try {
		fn()
	} catch (error) {
		if (error instanceof MpfError) return error.code
		throw error
	}
	return undefined
}

describe('MPF header', () => {
	test('recognizes the MPF signature', () => {
		expect(getMpfHeader(new Uint8Array([0x4d, 0x50, 0x46, 0x00, 0x49]))).toEqual({ isMpf: true, next: 4 })
		expect(getMpfHeader(new Uint8Array([0x4d, 0x50, 0x46, 0x01]))).toEqual({ isMpf: false, next: 0 })
		expect(getMpfHeader(new Uint8Array([0x4d, 0x50]))).toEqual({ isMpf: false, next: 0 })
	})

	test('segment survives parse and serialize unchanged', () => {
		const payload = mpfIndexPayload([
			{ length: 100, offset: 0 },
			{ length: 50, offset: 84 },
		])
		const { next } = getMpfHeader(payload)
		const tree = getMpfTree(payload.subarray(next), TagSpace.MpfIndex)
		expect(tree.fields.map((f) => f.tag)).toEqual([MpfTag.Version, MpfTag.NumberOfImages, MpfTag.Entry])
		expect(makeMpfSegment(tree)).toEqual(payload)
	})

	test('base sits 8 bytes past the APP2 marker', () => {
		expect(MPF_BASE_DISTANCE).toBe(8)
	})
})

describe('decodeIndex', () => {
	test('resolves relative offsets against the base', () => {
		const tree = mpfIndexTree([
			{ length: 1000, offset: 0 },
			{ length: 1500, offset: 900 },
			{ length: 700, offset: 2400 },
		])
		expect(decodeIndex(tree, 100)).toEqual({
			offset: 100,
			imageOffsets: [0, 1000, 2500],
			imageLengths: [1000, 1500, 700],
		})
	})

	test('reads big-endian directories', () => {
		const tree = mpfIndexTree(
			[
				{ length: 10, offset: 0 },
				{ length: 20, offset: 0x01020304 },
			],
			false
		)
		expect(decodeIndex(tree, 16).imageOffsets).toEqual([0, 0x01020304 + 16])
	})

	test('rejects an attribute directory', () => {
		const tree = { ...mpfIndexTree([{ length: 1, offset: 0 }]), space: TagSpace.MpfAttribute }
		expect(mpfCode(() => decodeIndex(tree, 0))).toBe('SpaceMismatch')
	})

	test('rejects a zero image count', () => {
		expect(mpfCode(() => decodeIndex(mpfIndexTree([], true, 0), 0))).toBe('ZeroImageCount')
	})

	test('rejects a missing count', () => {
		const tree = mpfIndexTree([{ length: 1, offset: 0 }])
		tree.fields = tree.fields.filter((f) => f.tag !== MpfTag.NumberOfImages)
		expect(mpfCode(() => decodeIndex(tree, 0))).toBe('ZeroImageCount')
	})

	test('rejects an entry table shorter than the count', () => {
		const tree = mpfIndexTree(
			[
				{ length: 1, offset: 0 },
				{ length: 1, offset: 10 },
			],
			true,
			3
		)
		expect(mpfCode(() => decodeIndex(tree, 0))).toBe('EntryTableTooShort')
	})

	test('rejects a missing entry table', () => {
		const tree = mpfIndexTree([{ length: 1, offset: 0 }])
		tree.fields = tree.fields.filter((f) => f.tag !== MpfTag.Entry)
		expect(mpfCode(() => decodeIndex(tree, 0))).toBe('EntryTableTooShort')
	})

	test('rejects a non-zero first offset', () => {
		const tree = mpfIndexTree([
			{ length: 1, offset: 5 },
			{ length: 1, offset: 10 },
		])
		expect(mpfCode(() => decodeIndex(tree, 0))).toBe('InvalidMPFOffsetPattern')
	})

	test('rejects a zero offset after the first image', () => {
		const tree = mpfIndexTree([
			{ length: 1, offset: 0 },
			{ length: 1, offset: 0 },
		])
		expect(mpfCode(() => decodeIndex(tree, 0))).toBe('InvalidMPFOffsetPattern')
	})

	test('rejects offsets past 32 bits', () => {
		const tree = mpfIndexTree([
			{ length: 1, offset: 0 },
			{ length: 1, offset: 0xfffffff0 },
		])
		expect(mpfCode(() => decodeIndex(tree, 0x100))).toBe('OffsetOverflow')
	})
})

describe('encodeIndex', () => {
	test('writes relative offsets and lengths in place', () => {
		const tree = mpfIndexTree([
			{ length: 0, offset: 0 },
			{ length: 0, offset: 1 },
		])
		const before = makeMpfSegment(tree).length
		encodeIndex({ offset: 16, imageOffsets: [0, 300], imageLengths: [300, 40] }, tree)

		const entry = findField(tree, MpfTag.Entry)
		expect(entry && [getLong(entry, 1, true), getLong(entry, 2, true)]).toEqual([300, 0])
		expect(entry && [getLong(entry, 5, true), getLong(entry, 6, true)]).toEqual([40, 284])
		expect(makeMpfSegment(tree).length).toBe(before)
		expect(decodeIndex(tree, 16)).toEqual({ offset: 16, imageOffsets: [0, 300], imageLengths: [300, 40] })
	})

	test('rejects mismatched arrays', () => {
		const tree = mpfIndexTree([{ length: 0, offset: 0 }])
		expect(mpfCode(() => encodeIndex({ offset: 0, imageOffsets: [0], imageLengths: [] }, tree))).toBe(
			'SizeMismatch'
		)
	})

	test('rejects more images than the table holds', () => {
		const tree = mpfIndexTree([{ length: 0, offset: 0 }])
		const index = { offset: 0, imageOffsets: [0, 10], imageLengths: [10, 10] }
		expect(mpfCode(() => encodeIndex(index, tree))).toBe('EntryTableTooShort')
	})

	test('rejects a primary image away from offset zero', () => {
		const tree = mpfIndexTree([
			{ length: 0, offset: 0 },
			{ length: 0, offset: 1 },
		])
		const index = { offset: 16, imageOffsets: [100, 300], imageLengths: [100, 40] }
		expect(mpfCode(() => encodeIndex(index, tree))).toBe('InvalidMPFOffsetPattern')
	})

	test('rejects a secondary image at offset zero', () => {
		const tree = mpfIndexTree([
			{ length: 0, offset: 0 },
			{ length: 0, offset: 1 },
		])
		const index = { offset: 16, imageOffsets: [0, 0], imageLengths: [100, 40] }
		expect(mpfCode(() => encodeIndex(index, tree))).toBe('InvalidMPFOffsetPattern')
	})

	test('rejects offsets and lengths past 32 bits', () => {
		const tree = mpfIndexTree([
			{ length: 0, offset: 0 },
			{ length: 0, offset: 1 },
		])
		const farImage = { offset: 16, imageOffsets: [0, 0x100000010 + 1], imageLengths: [100, 40] }
		expect(mpfCode(() => encodeIndex(farImage, tree))).toBe('OffsetOverflow')
		const longImage = { offset: 16, imageOffsets: [0, 300], imageLengths: [0x100000000, 40] }
		expect(mpfCode(() => encodeIndex(longImage, tree))).toBe('OffsetOverflow')
	})

	test('leaves an encodable index readable', () => {
		const tree = mpfIndexTree([
			{ length: 0, offset: 0 },
			{ length: 0, offset: 1 },
		])
		const index = { offset: 16, imageOffsets: [0, 0xffffffff], imageLengths: [0xffffffff, 1] }
		encodeIndex(index, tree)
		expect(decodeIndex(tree, 16)).toEqual(index)
	})

	test('rejects an image at or before the base', () => {
		const tree = mpfIndexTree([
			{ length: 0, offset: 0 },
			{ length: 0, offset: 1 },
		])
		const index = { offset: 16, imageOffsets: [0, 16], imageLengths: [16, 10] }
		expect(mpfCode(() => encodeIndex(index, tree))).toBe('InvalidMPFOffsetPattern')
	})
})

describe('index helpers', () => {
	test('deriveLengths measures the gaps between starts', () => {
		expect(deriveLengths([0, 1000, 2500], 3200)).toEqual([1000, 1500, 700])
		expect(deriveLengths([0], 42)).toEqual([42])
	})

	test('mpfBaseFromReader points past the MPF header', () => {
		const reader = new MemoryStream(new Uint8Array(200))
		reader.seek(120)
		expect(mpfBaseFromReader(reader, new Uint8Array(102))).toBe(22)
	})

	test('iterateImages visits each image position', () => {
		const reader = new MemoryStream(new Uint8Array(50))
		const seen: number[][] = []
		iterateImages(reader, { offset: 0, imageOffsets: [0, 20, 35], imageLengths: [20, 15, 15] }, (r, i, length) => {
			seen.push([i, r.tell(), length])
		})
		expect(seen).toEqual([
			[0, 0, 20],
			[1, 20, 15],
			[2, 35, 15],
		])
	})
})

describe('processors', () => {
	const payload = mpfIndexPayload([
		{ length: 100, offset: 0 },
		{ length: 60, offset: 200 },
	])
	const icc = new Uint8Array([0x49, 0x43, 0x43, 0x5f])

	function positionedReader(): MemoryStream {
		const reader = new MemoryStream(new Uint8Array(300))
		reader.seek(120)
		return reader
	}

	test('pass-through reports nothing', () => {
		const result = new MpfPassThrough().processApp2(positionedReader(), payload)
		expect(result.isMpf).toBe(false)
		expect(result.segment).toBe(payload)
	})

	test('check detects MPF segments', () => {
		const check = new MpfCheck()
		expect(check.processApp2(positionedReader(), payload).isMpf).toBe(true)
		expect(check.processApp2(positionedReader(), icc).isMpf).toBe(false)
	})

	test('index reader decodes against the reader position', () => {
		const processor = new MpfIndexReader()
		expect(processor.processApp2(positionedReader(), payload).isMpf).toBe(true)
		const base = 120 - (payload.length - 4)
		expect(processor.index).toEqual({
			offset: base,
			imageOffsets: [0, 200 + base],
			imageLengths: [100, 60],
		})
		expect(processor.tree?.space).toBe(TagSpace.MpfIndex)
	})

	test('index reader ignores other APP2 segments', () => {
		const processor = new MpfIndexReader()
		expect(processor.processApp2(positionedReader(), icc).isMpf).toBe(false)
		expect(processor.index).toBeNull()
	})

	test('index reader leaves a standalone attribute directory alone', () => {
		const processor = new MpfIndexReader()
		expect(processor.processApp2(positionedReader(), mpfAttributePayload(2)).isMpf).toBe(true)
		expect(processor.index).toBeNull()
		expect(processor.tree).toBeNull()
	})

	test('index rewriter passes a standalone attribute directory through', () => {
		const attribute = mpfAttributePayload(2)
		const rewriter = new MpfIndexRewriter(new MemoryStream())
		const result = rewriter.processApp2(positionedReader(), attribute)
		expect(result).toEqual({ isMpf: true, segment: attribute })
		expect(rewriter.index).toBeNull()
		expect(rewriter.reservedSize).toBe(0)
	})

	test('index rewriter reserves a placeholder at the writer position', () => {
		const writer = new MemoryStream()
		writer.write(new Uint8Array(10))
		const rewriter = new MpfIndexRewriter(writer)
		const result = rewriter.processApp2(positionedReader(), payload)
		expect(result.isMpf).toBe(true)
		expect(result.segment).toEqual(payload)
		expect(rewriter.app2WritePos).toBe(10)
		expect(rewriter.reservedSize).toBe(payload.length)
	})

	test('attribute rewriter re-encodes attribute directories', () => {
		const attribute = mpfAttributePayload(2)
		const rewriter = new MpfAttributeRewriter()
		const result = rewriter.processApp2(positionedReader(), attribute)
		expect(result.isMpf).toBe(true)
		expect(result.segment).toEqual(attribute)
		expect(rewriter.tree?.space).toBe(TagSpace.MpfAttribute)
		expect(rewriter.tree?.fields.map((f) => f.tag)).toEqual([MpfTag.IndividualImageNumber])
	})
})

describe('copyImage', () => {
	test('copies one image and stops after EOI', () => {
		const image = secondaryImage(2)
		const reader = new MemoryStream(bytes(image, [0x5a, 0x5a]))
		const writer = new MemoryStream()
		copyImage(writer, reader, new MpfCheck())
		expect(writer.toUint8Array()).toEqual(image)
		expect(reader.tell()).toBe(image.length)
	})
})

describe('readMpfIndex', () => {
	test('reads the index of the first image', () => {
		const { file, starts, sizes } = mpfFile(3)
		const found = readMpfIndex(new MemoryStream(file))
		expect(found?.index).toEqual({
			offset: PRIMARY_APP2_POS + 8,
			imageOffsets: starts,
			imageLengths: sizes,
		})
	})

	test('returns null without an MPF segment', () => {
		expect(readMpfIndex(new MemoryStream(minimalImage()))).toBeNull()
	})
})

describe('rewriteMpf', () => {
	test('needs a reserved segment', () => {
		const rewriter = new MpfIndexRewriter(new MemoryStream())
		expect(mpfCode(() => rewriteMpf(new MemoryStream(), rewriter, [0], [10]))).toBe('MissingIndex')
	})

	test('refuses a segment that changed size', () => {
		const writer = new MemoryStream()
		const rewriter = new MpfIndexRewriter(writer)
		rewriter.processApp2(new MemoryStream(new Uint8Array(200)), mpfIndexPayload([{ length: 10, offset: 0 }]))
		rewriter.tree?.fields.push(createField(MpfTag.TotalFrames, TagType.Long, 1))
		expect(mpfCode(() => rewriteMpf(writer, rewriter, [0], [10]))).toBe('SizeMismatch')
	})
})

describe('copyMpfFile', () => {
	test('packs the images and rewrites the index', () => {
		const { file, sizes } = mpfFile(5)
		const writer = new MemoryStream()
		const result = copyMpfFile(writer, new MemoryStream(file))
		const out = writer.toUint8Array()

		expect(out.length).toBe(file.length - 10)
		expect(result.end).toBe(out.length)
		expect(writer.tell()).toBe(out.length)

		const starts = [0, sizes[0]!, sizes[0]! + sizes[1]!]
		expect(result.index).toEqual({ offset: PRIMARY_APP2_POS + 8, imageOffsets: starts, imageLengths: sizes })

		const reread = readMpfIndex(new MemoryStream(out))
		expect(reread?.index.imageOffsets).toEqual(starts)
		expect(reread?.index.imageLengths).toEqual(sizes)
		expect(sizes.reduce((a, b) => a + b, 0)).toBe(out.length)

		for (const start of starts) {
			expect([out[start], out[start + 1]]).toEqual([0xff, 0xd8])
		}
		expect(out.subarray(starts[1]!, starts[2]!)).toEqual(secondaryImage(2))
		expect(out.subarray(starts[2]!)).toEqual(secondaryImage(3))
	})

	test('copies a file without MPF as a single image', () => {
		const image = minimalImage([0x01, 0x02])
		const writer = new MemoryStream()
		const result = copyMpfFile(writer, new MemoryStream(image))
		expect(result).toEqual({ index: null, end: image.length })
		expect(writer.toUint8Array()).toEqual(image)
	})

	test('copies a standalone MPF image as a single image', () => {
		const image = secondaryImage(2)
		const writer = new MemoryStream()
		const result = copyMpfFile(writer, new MemoryStream(image))
		expect(result).toEqual({ index: null, end: image.length })
		expect(writer.toUint8Array()).toEqual(image)
		expect(readMpfIndex(new MemoryStream(image))).toBeNull()
	})

	test('leaves the primary image decodable', () => {
		const writer = new MemoryStream()
		copyMpfFile(writer, new MemoryStream(mpfFile(0).file))
		const segments = JpegSegmentCodec.decode(writer.toUint8Array())
		expect(segments.filter((s) => s.marker === 0xe2)).toHaveLength(1)
	})
})
