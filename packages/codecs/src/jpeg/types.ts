/**
 * JPEG marker codes (the byte after 0xFF)
 */
export const Marker = {
	TEM: 0x01, // Temporary, no payload

	// Start of Frame markers: SOFn = SOF0 + n, n = 0-15 except 4, 8 and 12
	SOF0: 0xc0, // Baseline DCT
	SOF1: 0xc1, // Extended sequential DCT
	SOF2: 0xc2, // Progressive DCT
	SOF3: 0xc3, // Lossless

	DHT: 0xc4, // Huffman table
	JPG: 0xc8, // Reserved for JPEG extensions
	DAC: 0xcc, // Arithmetic coding conditioning

	// Restart markers: RSTn = RST0 + n, n = 0-7
	RST0: 0xd0,
	RST1: 0xd1,
	RST2: 0xd2,
	RST3: 0xd3,
	RST4: 0xd4,
	RST5: 0xd5,
	RST6: 0xd6,
	RST7: 0xd7,

	SOI: 0xd8, // Start of image
	EOI: 0xd9, // End of image
	SOS: 0xda, // Start of scan
	DQT: 0xdb, // Define quantization table
	DNL: 0xdc, // Define number of lines
	DRI: 0xdd, // Define restart interval
	DHP: 0xde, // Define hierarchical progression
	EXP: 0xdf, // Expand reference components

	// Application segments: APPn = APP0 + n, n = 0-15
	APP0: 0xe0, // JFIF
	APP1: 0xe1, // EXIF
	APP2: 0xe2, // ICC, MPF
	APP15: 0xef,

	// JPEG extensions: JPGn = JPG0 + n, n = 0-13
	JPG0: 0xf0,
	JPG13: 0xfd,

	COM: 0xfe, // Comment
} as const

/**
 * Pseudo-marker labelling a chunk of scan data. 0 is never a valid marker
 * byte, so it cannot collide with a real one.
 */
export const RAW_DATA = 0x00

/** Byte that starts every marker and pads between markers */
export const MARKER_PREFIX = 0xff

/** Largest payload a length-prefixed segment can carry */
export const MAX_SEGMENT_DATA = 65533

/**
 * Marker byte as returned by the scanner: a real marker (0x01-0xFE) or
 * `RAW_DATA`
 */
export type MarkerCode = number

/**
 * A marker and its payload
 *
 * `data` is null for markers without a payload (RSTn, EOI, TEM). For
 * `RAW_DATA` it holds de-stuffed scan bytes.
 */
export interface Segment {
	readonly marker: MarkerCode
	readonly data: Uint8Array | null
}
