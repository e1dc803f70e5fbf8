/**
 * Error codes for malformed JPEG streams
 */
export type FormatErrorCode =
	| 'MissingStartMarker'
	| 'ExpectedMarkerPrefix'
	| 'InvalidMarkerZero'
	| 'InvalidMarkerValue'
	| 'Truncated'
	| 'InvalidLength'
	| 'SegmentTooLarge'
	| 'PastEndOfImage'
	| 'StaleSegment'

/**
 * Error codes for Multi-Picture Format index problems
 */
export type MpfErrorCode =
	| 'ZeroImageCount'
	| 'EntryTableTooShort'
	| 'InvalidMPFOffsetPattern'
	| 'OffsetOverflow'
	| 'SpaceMismatch'
	| 'SizeMismatch'
	| 'MissingIndex'

/**
 * Error codes for TIFF tag directories
 */
export type DirectoryErrorCode = 'InvalidHeader' | 'OutOfBounds' | 'UnknownFieldType' | 'DirectoryLoop'

/**
 * Base class for every error raised by the jpegseg packages
 */
export class CodecError<C extends string = string> extends Error {
	readonly code: C

	constructor(code: C, message?: string) {
		super(message ? `${code}: ${message}` : code)
		this.code = code
		this.name = 'CodecError'
	}
}

/**
 * Malformed marker or segment structure. Fatal to the current traversal.
 */
export class FormatError extends CodecError<FormatErrorCode> {
	constructor(code: FormatErrorCode, message?: string) {
		super(code, message)
		this.name = 'FormatError'
	}
}

/**
 * Inconsistent MPF index. Fatal to MPF processing only; a plain traversal of
 * the same file may still succeed.
 */
export class MpfError extends CodecError<MpfErrorCode> {
	constructor(code: MpfErrorCode, message?: string) {
		super(code, message)
		this.name = 'MpfError'
	}
}

/**
 * Malformed TIFF structure inside a segment
 */
export class DirectoryError extends CodecError<DirectoryErrorCode> {
	constructor(code: DirectoryErrorCode, message?: string) {
		super(code, message)
		this.name = 'DirectoryError'
	}
}
