/**
 * Image locations read from, or destined for, an MPF index
 */
export interface MpfIndex {
	/**
	 * File offset MPF offsets are measured from: the byte after the MPF
	 * header, 8 bytes past the APP2 marker
	 */
	offset: number
	/** Absolute file offset of each image; 0 for the primary image */
	imageOffsets: number[]
	/** Size in bytes of each image */
	imageLengths: number[]
}

/**
 * Outcome of handing an APP2 segment to an MPF processor
 */
export interface App2Result {
	/** Whether the segment carried an MPF header */
	isMpf: boolean
	/** Segment to write out, possibly re-encoded */
	segment: Uint8Array
}
