/**
 * Shared constants for the Jzazbz transforms and the Display P3 boundary search.
 *
 * Every numeric constant of the color pipeline lives here so that the scalar
 * transforms, the table derivation and the tests agree on a single source.
 */

import type { Matrix3 } from './types.ts'

// =============================================================================
// Perceptual Quantizer
// =============================================================================

/** PQ exponent applied to normalized cone responses. */
export const PQ_N = 2610 / 16384

/** PQ exponent applied to the rational expression (Jzazbz uses 1.7× the ST 2084 value). */
export const PQ_P = (1.7 * 2523) / 32

export const PQ_C1 = 3424 / 4096
export const PQ_C2 = 2413 / 128
export const PQ_C3 = 2392 / 128

export const PQ_INV_N = 1 / PQ_N
export const PQ_INV_P = 1 / PQ_P

/**
 * Cone responses are divided by this before the PQ curve.
 * With responses scaled so that Display P3 white has Y = 1, this places white at 100 cd/m².
 */
export const PQ_NORMALIZATION = 100

/**
 * Smallest compressed value the PQ curve produces (its value at zero input).
 * Used as the lower clamp of the inverse transform so that it maps back to exactly 0.
 */
export const PQ_COMPRESSED_MIN = PQ_C1 ** PQ_P

/**
 * Upper clamp of the inverse transform. The curve's supremum is (c2 / c3)^p ≈ 3.2271,
 * where the inverse diverges.
 */
export const PQ_COMPRESSED_MAX = 3.227

// =============================================================================
// Lightness Warp
// =============================================================================

export const JZ_D = -0.56

/** Offset restoring Jz = 0 at black. */
export const JZ_D0 = 1.6295499532821566e-11

// =============================================================================
// Matrices (row-major)
// =============================================================================

/** PQ-compressed LMS to (Iz, az, bz). */
export const LMSP_TO_IZAZBZ: Matrix3 = [
	[0.5, 0.5, 0],
	[3.524, -4.066708, 0.542708],
	[0.199076, 1.096799, -1.295875],
]

/** (Iz, az, bz) to PQ-compressed LMS. */
export const IZAZBZ_TO_LMSP: Matrix3 = [
	[1, 0.138605043271539, 0.0580473161561189],
	[1, -0.138605043271539, -0.0580473161561189],
	[1, -0.0960192420263189, -0.811891896056039],
]

/**
 * LMS to linear Display P3, pre-composed as
 * XYZ→P3 · XYZ′→XYZ(D65) · LMS→XYZ′.
 */
export const LMS_TO_LINEAR_P3: Matrix3 = [
	[4.4820606379518333, -3.6184317541411817, 0.16694496856407345],
	[-1.9532025238860451, 3.5217700975984596, -0.54063532522070301],
	[-0.0027453573623004834, -0.45182653146288487, 1.4822547119502889],
]

// =============================================================================
// Colorimetry
// =============================================================================

/** Jzazbz XYZ′ pre-adaptation factors (X′ = bX − (b−1)Z, Y′ = gY − (g−1)X). */
export const JZ_B = 1.15
export const JZ_G = 0.66

/** XYZ′ (D65, absolute scale) to LMS. */
export const XYZP_TO_LMS: Matrix3 = [
	[0.41478972, 0.579999, 0.014648],
	[-0.20151, 1.120649, 0.0531008],
	[-0.0166008, 0.2648, 0.6684799],
]

/** Display P3 primaries and white point as CIE 1931 xy chromaticities. */
export const DISPLAY_P3_CHROMATICITIES = {
	red: [0.68, 0.32],
	green: [0.265, 0.69],
	blue: [0.15, 0.06],
	white: [0.3127, 0.329],
} as const

// =============================================================================
// Search
// =============================================================================

/** Bisection iterations of the scalar search. */
export const SCALAR_ITERATIONS = 20

/** Iterations of the wide search; each one splits the bracket into `WIDE_LANES` parts. */
export const WIDE_ITERATIONS = 4
export const WIDE_LANES = 64
