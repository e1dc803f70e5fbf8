import { DirectoryError } from '@jpegseg/core'
import {
	IFD_ENTRY_SIZE,
	type IfdField,
	type IfdNode,
	TIFF_BIG_ENDIAN,
	TIFF_HEADER_SIZE,
	TIFF_LITTLE_ENDIAN,
	TIFF_MAGIC,
	TYPE_SIZES,
	TagSpace,
	isTagType,
} from './types'

/**
 * Binary reader with endianness support and bounds checks
 */
class TiffReader {
	private data: Uint8Array
	private view: DataView
	littleEndian: boolean

	constructor(data: Uint8Array, littleEndian = true) {
		this.data = data
		this.view = new DataView(data.buffer, data.byteOffset, data.byteLength)
		this.littleEndian = littleEndian
	}

	readU16(offset: number): number {
		this.check(offset, 2)
		return this.view.getUint16(offset, this.littleEndian)
	}

	readU32(offset: number): number {
		this.check(offset, 4)
		return this.view.getUint32(offset, this.littleEndian)
	}

	slice(start: number, length: number): Uint8Array {
		this.check(start, length)
		return this.data.slice(start, start + length)
	}

	private check(offset: number, size: number): void {
		if (offset < 0 || offset + size > this.data.length) {
			throw new DirectoryError(
				'OutOfBounds',
				`read of ${size} bytes at ${offset} past end of ${this.data.length}-byte directory`
			)
		}
	}
}

/**
 * Tag space of the directory that follows one in `space`. In the first
 * image of an MPF file, the index IFD is followed by the attribute IFD.
 */
export function nextSpace(space: TagSpace): TagSpace {
	return space === TagSpace.MpfIndex ? TagSpace.MpfAttribute : space
}

/**
 * Check for a TIFF header and return the byte order and first IFD offset
 */
export function readTiffHeader(data: Uint8Array): { littleEndian: boolean; ifdOffset: number } {
	if (data.length < TIFF_HEADER_SIZE) {
		throw new DirectoryError('InvalidHeader', `${data.length} bytes is too short for a TIFF header`)
	}
	const reader = new TiffReader(data, false)
	const byteOrder = reader.readU16(0)
	let littleEndian: boolean
	if (byteOrder === TIFF_LITTLE_ENDIAN) {
		littleEndian = true
	} else if (byteOrder === TIFF_BIG_ENDIAN) {
		littleEndian = false
	} else {
		throw new DirectoryError('InvalidHeader', `invalid byte order 0x${byteOrder.toString(16)}`)
	}
	reader.littleEndian = littleEndian

	const magic = reader.readU16(2)
	if (magic !== TIFF_MAGIC) {
		throw new DirectoryError('InvalidHeader', `invalid TIFF magic number: ${magic}`)
	}
	return { littleEndian, ifdOffset: reader.readU32(4) }
}

/**
 * Parse a TIFF structure into a directory tree
 *
 * `data` must start with the TIFF header; value offsets are measured from
 * there. Field values are copied, so the tree does not alias `data`.
 */
export function parseDirectory(data: Uint8Array, space: TagSpace): IfdNode {
	const { littleEndian, ifdOffset } = readTiffHeader(data)
	const reader = new TiffReader(data, littleEndian)

	let head: IfdNode | null = null
	let tail: IfdNode | null = null
	const visited = new Set<number>()
	let offset = ifdOffset
	let currentSpace = space

	do {
		if (visited.has(offset)) {
			throw new DirectoryError('DirectoryLoop', `IFD at ${offset} is referenced twice`)
		}
		visited.add(offset)

		const { fields, nextOffset } = readIfd(reader, offset)
		const node: IfdNode = { littleEndian, space: currentSpace, fields, next: null }
		if (tail) {
			tail.next = node
		} else {
			head = node
		}
		tail = node

		offset = nextOffset
		currentSpace = nextSpace(currentSpace)
	} while (offset !== 0)

	if (!head) {
		throw new DirectoryError('InvalidHeader', 'no IFD found')
	}
	return head
}

/**
 * Read an IFD (Image File Directory)
 */
function readIfd(reader: TiffReader, offset: number): { fields: IfdField[]; nextOffset: number } {
	const numEntries = reader.readU16(offset)
	const fields: IfdField[] = []

	let pos = offset + 2
	for (let i = 0; i < numEntries; i++) {
		fields.push(readIfdEntry(reader, pos))
		pos += IFD_ENTRY_SIZE
	}

	return { fields, nextOffset: reader.readU32(pos) }
}

/**
 * Read an IFD entry
 */
function readIfdEntry(reader: TiffReader, offset: number): IfdField {
	const tag = reader.readU16(offset)
	const type = reader.readU16(offset + 2)
	const count = reader.readU32(offset + 4)

	if (!isTagType(type)) {
		throw new DirectoryError('UnknownFieldType', `tag 0x${tag.toString(16)} has type ${type}`)
	}

	const totalSize = TYPE_SIZES[type] * count

	// Value is stored inline if it fits in 4 bytes, otherwise at offset
	const valueOffset = totalSize <= 4 ? offset + 8 : reader.readU32(offset + 8)

	return { tag, type, count, data: reader.slice(valueOffset, totalSize) }
}
