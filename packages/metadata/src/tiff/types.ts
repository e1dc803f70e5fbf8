/**
 * TIFF tag directory types and constants
 */

// Byte order marks
export const TIFF_LITTLE_ENDIAN = 0x4949 // 'II'
export const TIFF_BIG_ENDIAN = 0x4d4d // 'MM'
export const TIFF_MAGIC = 42

/** Size of the TIFF header: byte order, magic, first IFD offset */
export const TIFF_HEADER_SIZE = 8

/** Size of one IFD entry */
export const IFD_ENTRY_SIZE = 12

// Field data types
export enum TagType {
	Byte = 1,
	Ascii = 2,
	Short = 3,
	Long = 4,
	Rational = 5,
	SByte = 6,
	Undefined = 7,
	SShort = 8,
	SLong = 9,
	SRational = 10,
	Float = 11,
	Double = 12,
}

/**
 * Type sizes in bytes
 */
export const TYPE_SIZES: Record<TagType, number> = {
	[TagType.Byte]: 1,
	[TagType.Ascii]: 1,
	[TagType.Short]: 2,
	[TagType.Long]: 4,
	[TagType.Rational]: 8,
	[TagType.SByte]: 1,
	[TagType.Undefined]: 1,
	[TagType.SShort]: 2,
	[TagType.SLong]: 4,
	[TagType.SRational]: 8,
	[TagType.Float]: 4,
	[TagType.Double]: 8,
}

export function isTagType(value: number): value is TagType {
	return Number.isInteger(value) && value >= TagType.Byte && value <= TagType.Double
}

/**
 * Tag namespace a directory belongs to. The same tag number means different
 * things in different spaces.
 */
export enum TagSpace {
	Tiff = 'TIFF',
	MpfIndex = 'MPFIndex',
	MpfAttribute = 'MPFAttribute',
}

/**
 * Directory entry with its value bytes in file byte order
 */
export interface IfdField {
	tag: number
	type: TagType
	count: number
	/** Owned copy of the value, `count * TYPE_SIZES[type]` bytes */
	data: Uint8Array
}

/**
 * Image File Directory and the chain that follows it
 */
export interface IfdNode {
	littleEndian: boolean
	space: TagSpace
	fields: IfdField[]
	next: IfdNode | null
}
