import { Marker, type MarkerCode } from './types'

function hex2(value: number): string {
	return value.toString(16).toUpperCase().padStart(2, '0')
}

/**
 * Display names for all 256 marker byte values
 */
const MARKER_NAMES: readonly string[] = (() => {
	const names: string[] = new Array(256).fill('')

	for (let code = 0x02; code <= 0xbf; code++) {
		names[code] = `RES${hex2(code)}` // Reserved
	}
	for (let n = 0; n <= 0xf; n++) {
		if (n === 4 || n === 8 || n === 12) continue
		names[Marker.SOF0 + n] = `SOF${n}`
	}
	for (let n = 0; n <= 7; n++) {
		names[Marker.RST0 + n] = `RST${n}`
	}
	for (let n = 0; n <= 0xf; n++) {
		names[Marker.APP0 + n] = `APP${n}`
	}
	for (let n = 0; n <= 0xd; n++) {
		names[Marker.JPG0 + n] = `JPG${n}`
	}

	names[0x00] = 'NUL'
	names[Marker.TEM] = 'TEM'
	names[Marker.DHT] = 'DHT'
	names[Marker.JPG] = 'JPG'
	names[Marker.DAC] = 'DAC'
	names[Marker.SOI] = 'SOI'
	names[Marker.EOI] = 'EOI'
	names[Marker.SOS] = 'SOS'
	names[Marker.DQT] = 'DQT'
	names[Marker.DNL] = 'DNL'
	names[Marker.DRI] = 'DRI'
	names[Marker.DHP] = 'DHP'
	names[Marker.EXP] = 'EXP'
	names[Marker.COM] = 'COM'
	names[0xff] = 'FILL'

	return Object.freeze(names)
})()

/**
 * Name of a marker value, e.g. `SOS`, `APP2`, `RES4F`
 */
export function markerName(marker: MarkerCode): string {
	return MARKER_NAMES[marker & 0xff] ?? ''
}

export function isRestartMarker(marker: MarkerCode): boolean {
	return marker >= Marker.RST0 && marker <= Marker.RST7
}

export function isAppMarker(marker: MarkerCode): boolean {
	return marker >= Marker.APP0 && marker <= Marker.APP15
}

export function isJpgExtensionMarker(marker: MarkerCode): boolean {
	return marker >= Marker.JPG0 && marker <= Marker.JPG13
}

/**
 * Whether a length-prefixed payload follows the marker
 */
export function hasPayload(marker: MarkerCode): boolean {
	return marker !== Marker.EOI && marker !== Marker.TEM && !isRestartMarker(marker)
}

/**
 * Whether scan data follows the marker
 */
export function startsScanData(marker: MarkerCode): boolean {
	return marker === Marker.SOS || isRestartMarker(marker)
}
