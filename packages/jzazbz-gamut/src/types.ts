/**
 * Shared type definitions for jzazbz-gamut.
 */

export type Vec3 = readonly [number, number, number]

export type Matrix3 = readonly [Vec3, Vec3, Vec3]

/**
 * A color in the Jzazbz appearance space.
 * Hue is derived as `atan2(bz, az)` and never stored.
 */
export interface AppearanceColor {
	readonly jz: number
	readonly az: number
	readonly bz: number
}

/**
 * Cone responses, scaled so that Display P3 white has unit luminance.
 */
export interface ConeResponse {
	readonly l: number
	readonly m: number
	readonly s: number
}

/**
 * Linear-light Display P3. Channels outside [0, 1] mean the color is out of gamut;
 * nothing in this package clamps them.
 */
export interface LinearDisplayColor {
	readonly r: number
	readonly g: number
	readonly b: number
}

/**
 * Polar form of an appearance color. Hue in degrees.
 */
export interface AppearanceLch {
	readonly jz: number
	readonly cz: number
	readonly hz: number
}

export type CornerName = 'wrap' | 'cyan' | 'blue' | 'magenta' | 'red' | 'yellow' | 'green'

export interface GamutCorner {
	readonly name: CornerName
	readonly lms: ConeResponse
	/** Jzazbz hue of `lms`, in radians. */
	readonly hue: number
}

/**
 * A segment of the gamut boundary (linear in LMS) known to contain the solution.
 */
export interface SearchBracket {
	readonly lower: BracketEndpoint
	readonly upper: BracketEndpoint
}

export interface BracketEndpoint {
	readonly lms: ConeResponse
	/** Hue in radians, unwrapped against the bracket's starting corner. */
	readonly hue: number
}

/**
 * Parameters of the boundary search.
 * `lanes: 2` is plain bisection; wider lanes trade iterations for evaluations per iteration.
 */
export interface SearchOptions {
	/**
	 * Number of refinement iterations.
	 * @default 20
	 */
	readonly iterations?: number
	/**
	 * Parts each iteration splits the bracket into.
	 * @default 2
	 */
	readonly lanes?: number
}

export interface SliceOptions extends SearchOptions {
	/** @default 30 */
	readonly lightnessSteps?: number
	/** @default 30 */
	readonly chromaSteps?: number
	/**
	 * Tolerance for the in-gamut test of each sample.
	 * @default 1e-6
	 */
	readonly epsilon?: number
}

export interface SliceSample {
	readonly lightness: number
	readonly chroma: number
	readonly color: AppearanceColor
	readonly display: LinearDisplayColor
	readonly inGamut: boolean
}

/**
 * A lightness × chroma grid over one constant-hue plane.
 * `samples` is row-major: one row per lightness step.
 */
export interface HueSlice {
	readonly hue: number
	readonly boundary: AppearanceColor
	readonly maxLightness: number
	readonly maxChroma: number
	readonly lightnessSteps: number
	readonly chromaSteps: number
	readonly samples: readonly SliceSample[]
}

export interface DialSample {
	readonly hue: number
	readonly color: AppearanceColor
	readonly display: LinearDisplayColor
}

export interface Chromaticities {
	readonly red: readonly [number, number]
	readonly green: readonly [number, number]
	readonly blue: readonly [number, number]
	readonly white: readonly [number, number]
}
