/**
 * jzazbz-gamut - Jzazbz ↔ Display P3 conversion and maximum-chroma boundary search
 */

export { GAMUT_CORNERS, bracketForHue, edgeIndexForHue } from './corners.ts'
export {
	assertMonotonicEdges,
	deriveCornerTable,
	deriveLmsToLinearDisplay,
	deriveRgbToXyz,
} from './derivation.ts'
export {
	isInDisplayGamut,
	linearDisplayToLms,
	lmsToLinearDisplay,
	toDisplayColor,
	toLinearDisplay,
} from './display.ts'
export { chromaOf, fromLch, fromLms, hueOf, toLch, toLms } from './jzazbz.ts'
export {
	SCALAR_SEARCH,
	WIDE_SEARCH,
	maxChromaAtHue,
	refineBracket,
	resolveSearchOptions,
	searchBoundary,
} from './locator.ts'
export { WHITE_LIGHTNESS, sampleHueDial, sampleHueSlice } from './slice.ts'
export type {
	AppearanceColor,
	AppearanceLch,
	BracketEndpoint,
	Chromaticities,
	ConeResponse,
	CornerName,
	DialSample,
	GamutCorner,
	HueSlice,
	LinearDisplayColor,
	Matrix3,
	SearchBracket,
	SearchOptions,
	SliceOptions,
	SliceSample,
	Vec3,
} from './types.ts'
export { normalizeHue } from './util.ts'
