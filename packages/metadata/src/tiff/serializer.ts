import { sortFields } from './field'
import {
	IFD_ENTRY_SIZE,
	type IfdField,
	type IfdNode,
	TIFF_BIG_ENDIAN,
	TIFF_HEADER_SIZE,
	TIFF_LITTLE_ENDIAN,
	TIFF_MAGIC,
} from './types'

/**
 * Binary writer with endianness support
 */
class TiffWriter {
	readonly data: Uint8Array
	private view: DataView
	private littleEndian: boolean

	constructor(size: number, littleEndian: boolean) {
		this.data = new Uint8Array(size)
		this.view = new DataView(this.data.buffer)
		this.littleEndian = littleEndian
	}

	writeU16(offset: number, value: number): void {
		this.view.setUint16(offset, value, this.littleEndian)
	}

	writeU32(offset: number, value: number): void {
		this.view.setUint32(offset, value, this.littleEndian)
	}

	writeBytes(offset: number, bytes: Uint8Array): void {
		this.data.set(bytes, offset)
	}
}

function outOfLineSize(field: IfdField): number {
	const size = field.data.length
	if (size <= 4) return 0
	// Values start on a word boundary
	return size + (size & 1)
}

function ifdSize(node: IfdNode): number {
	let size = 2 + node.fields.length * IFD_ENTRY_SIZE + 4
	for (const field of node.fields) {
		size += outOfLineSize(field)
	}
	return size
}

/**
 * Number of bytes `serializeDirectory` produces for a tree
 *
 * Depends on field types and counts only, never on values, so rewriting
 * values in place never changes the serialized size.
 */
export function directorySize(node: IfdNode): number {
	let size = TIFF_HEADER_SIZE
	for (let current: IfdNode | null = node; current; current = current.next) {
		size += ifdSize(current)
	}
	return size
}

/**
 * Serialize a directory tree to TIFF bytes, starting with the TIFF header
 *
 * The byte order of the first node is used throughout. Fields are written in
 * ascending tag order.
 */
export function serializeDirectory(node: IfdNode): Uint8Array {
	const writer = new TiffWriter(directorySize(node), node.littleEndian)

	writer.writeU16(0, node.littleEndian ? TIFF_LITTLE_ENDIAN : TIFF_BIG_ENDIAN)
	writer.writeU16(2, TIFF_MAGIC)
	writer.writeU32(4, TIFF_HEADER_SIZE)

	let pos = TIFF_HEADER_SIZE
	for (let current: IfdNode | null = node; current; current = current.next) {
		pos = writeIfd(writer, current, pos)
	}
	return writer.data
}

/**
 * Write one IFD at `offset`, followed by its out-of-line values. Returns the
 * position after the last byte written.
 */
function writeIfd(writer: TiffWriter, node: IfdNode, offset: number): number {
	const sorted = { ...node, fields: [...node.fields] }
	sortFields(sorted)
	const { fields } = sorted
	const entriesEnd = offset + 2 + fields.length * IFD_ENTRY_SIZE
	let dataPos = entriesEnd + 4

	writer.writeU16(offset, fields.length)
	let entryPos = offset + 2
	for (const field of fields) {
		writer.writeU16(entryPos, field.tag)
		writer.writeU16(entryPos + 2, field.type)
		writer.writeU32(entryPos + 4, field.count)
		if (field.data.length <= 4) {
			writer.writeBytes(entryPos + 8, field.data)
		} else {
			writer.writeU32(entryPos + 8, dataPos)
			writer.writeBytes(dataPos, field.data)
			dataPos += outOfLineSize(field)
		}
		entryPos += IFD_ENTRY_SIZE
	}

	writer.writeU32(entriesEnd, node.next ? dataPos : 0)
	return dataPos
}
