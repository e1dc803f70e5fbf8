import { type IfdNode, type TagSpace, parseDirectory, serializeDirectory } from '@jpegseg/metadata'

/** Signature at the start of an MPF APP2 segment */
export const MPF_HEADER = new Uint8Array([0x4d, 0x50, 0x46, 0x00]) // "MPF\0"

export const MPF_HEADER_SIZE = 4

/**
 * Distance from an APP2 marker to the MPF offset base: marker, length and
 * MPF header
 */
export const MPF_BASE_DISTANCE = 2 + 2 + MPF_HEADER_SIZE

/**
 * Check whether an APP2 payload starts with the MPF header
 *
 * Returns the flag and the position of the byte after the header.
 */
export function getMpfHeader(segment: Uint8Array): { isMpf: boolean; next: number } {
	if (segment.length < MPF_HEADER_SIZE) return { isMpf: false, next: 0 }
	for (let i = 0; i < MPF_HEADER_SIZE; i++) {
		if (segment[i] !== MPF_HEADER[i]) return { isMpf: false, next: 0 }
	}
	return { isMpf: true, next: MPF_HEADER_SIZE }
}

/**
 * Parse the TIFF structure of an MPF payload
 *
 * `data` starts with the TIFF header. Use `TagSpace.MpfIndex` for the first
 * image in a file and `TagSpace.MpfAttribute` for the others.
 */
export function getMpfTree(data: Uint8Array, space: TagSpace): IfdNode {
	return parseDirectory(data, space)
}

/**
 * Serialize an MPF tree into a new APP2 payload, header included
 */
export function makeMpfSegment(tree: IfdNode): Uint8Array {
	const tiff = serializeDirectory(tree)
	const segment = new Uint8Array(MPF_HEADER_SIZE + tiff.length)
	segment.set(MPF_HEADER)
	segment.set(tiff, MPF_HEADER_SIZE)
	return segment
}
