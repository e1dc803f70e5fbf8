/**
 * Multi-Picture Format tags (CIPA DC-007)
 */

import { TagSpace } from '../tiff/types'

/** Tags used in the MP Index IFD and the MP Attribute IFD */
export enum MpfTag {
	// Both spaces
	Version = 0xb000,

	// MP Index IFD
	NumberOfImages = 0xb001,
	Entry = 0xb002,
	ImageUIDList = 0xb003,
	TotalFrames = 0xb004,

	// MP Attribute IFD
	IndividualImageNumber = 0xb101,
	PanoramaScanningOrientation = 0xb201,
	PanoramaHorizontalOverlap = 0xb202,
	PanoramaVerticalOverlap = 0xb203,
	BaseViewpointNumber = 0xb204,
	ConvergenceAngle = 0xb205,
	BaselineLength = 0xb206,
	DivergenceAngle = 0xb207,
	HorizontalAxisDistance = 0xb208,
	VerticalAxisDistance = 0xb209,
	CollimationAxisDistance = 0xb20a,
	YawAngle = 0xb20b,
	PitchAngle = 0xb20c,
	RollAngle = 0xb20d,
}

/** Bytes per image in the MP Entry table */
export const MPF_ENTRY_SIZE = 16

/** MP Index IFD tag names */
export const MpfIndexTags: Record<number, string> = {
	[MpfTag.Version]: 'MPFVersion',
	[MpfTag.NumberOfImages]: 'MPFNumberOfImages',
	[MpfTag.Entry]: 'MPFEntry',
	[MpfTag.ImageUIDList]: 'MPFImageUIDList',
	[MpfTag.TotalFrames]: 'MPFTotalFrames',
}

/** MP Attribute IFD tag names */
export const MpfAttributeTags: Record<number, string> = {
	[MpfTag.Version]: 'MPFVersion',
	[MpfTag.IndividualImageNumber]: 'MPFIndividualImageNumber',
	[MpfTag.PanoramaScanningOrientation]: 'MPFPanoramaScanningOrientation',
	[MpfTag.PanoramaHorizontalOverlap]: 'MPFPanoramaHorizontalOverlap',
	[MpfTag.PanoramaVerticalOverlap]: 'MPFPanoramaVerticalOverlap',
	[MpfTag.BaseViewpointNumber]: 'MPFBaseViewpointNumber',
	[MpfTag.ConvergenceAngle]: 'MPFConvergenceAngle',
	[MpfTag.BaselineLength]: 'MPFBaselineLength',
	[MpfTag.DivergenceAngle]: 'MPFDivergenceAngle',
	[MpfTag.HorizontalAxisDistance]: 'MPFHorizontalAxisDistance',
	[MpfTag.VerticalAxisDistance]: 'MPFVerticalAxisDistance',
	[MpfTag.CollimationAxisDistance]: 'MPFCollimationAxisDistance',
	[MpfTag.YawAngle]: 'MPFYawAngle',
	[MpfTag.PitchAngle]: 'MPFPitchAngle',
	[MpfTag.RollAngle]: 'MPFRollAngle',
}

/**
 * Name of a tag within a tag space, or `Tag_0x....` when unknown
 */
export function tagName(space: TagSpace, tag: number): string {
	let table: Record<number, string> = {}
	if (space === TagSpace.MpfIndex) table = MpfIndexTags
	else if (space === TagSpace.MpfAttribute) table = MpfAttributeTags
	return table[tag] ?? `Tag_0x${tag.toString(16).padStart(4, '0')}`
}
