import { DirectoryError } from '@jpegseg/core'
import { type IfdField, type IfdNode, TYPE_SIZES, type TagType } from './types'

function fieldView(field: IfdField, offset: number, size: number): DataView {
	if (offset < 0 || offset + size > field.data.length) {
		throw new DirectoryError(
			'OutOfBounds',
			`tag 0x${field.tag.toString(16)} has ${field.data.length} bytes, cannot access ${size} at ${offset}`
		)
	}
	return new DataView(field.data.buffer, field.data.byteOffset, field.data.byteLength)
}

/**
 * Read the `index`-th 32-bit word of a field's data
 *
 * Works on any field type, so a LONG can be read out of an UNDEFINED blob
 * such as the MPF entry table.
 */
export function getLong(field: IfdField, index: number, littleEndian: boolean): number {
	return fieldView(field, index * 4, 4).getUint32(index * 4, littleEndian)
}

/**
 * Overwrite the `index`-th 32-bit word of a field's data in place
 */
export function setLong(field: IfdField, index: number, value: number, littleEndian: boolean): void {
	fieldView(field, index * 4, 4).setUint32(index * 4, value >>> 0, littleEndian)
}

/**
 * Read the `index`-th 16-bit word of a field's data
 */
export function getShort(field: IfdField, index: number, littleEndian: boolean): number {
	return fieldView(field, index * 2, 2).getUint16(index * 2, littleEndian)
}

export function findField(node: IfdNode, tag: number): IfdField | undefined {
	return node.fields.find((f) => f.tag === tag)
}

/**
 * Create a zero-filled field
 */
export function createField(tag: number, type: TagType, count: number): IfdField {
	return { tag, type, count, data: new Uint8Array(TYPE_SIZES[type] * count) }
}

/**
 * Put a node's fields in ascending tag order, in place
 */
export function sortFields(node: IfdNode): void {
	node.fields.sort((a, b) => a.tag - b.tag)
}
