/**
 * Linear Display P3 conversion and colorjs.io interop.
 */

import Color from 'colorjs.io'
import { inverse, Matrix } from 'ml-matrix'
import { LMS_TO_LINEAR_P3 } from './constants.ts'
import { toLms } from './jzazbz.ts'
import type { AppearanceColor, ConeResponse, LinearDisplayColor, Matrix3 } from './types.ts'
import { multiply, toMatrix3 } from './util.ts'

const LINEAR_P3_TO_LMS: Matrix3 = toMatrix3(
	inverse(new Matrix(LMS_TO_LINEAR_P3.map((row) => [...row]))).to2DArray(),
)

/**
 * Project cone responses onto linear Display P3. No clamping.
 */
export function lmsToLinearDisplay(lms: ConeResponse): LinearDisplayColor {
	const [r, g, b] = multiply(LMS_TO_LINEAR_P3, [lms.l, lms.m, lms.s])
	return { r, g, b }
}

export function linearDisplayToLms(rgb: LinearDisplayColor): ConeResponse {
	const [l, m, s] = multiply(LINEAR_P3_TO_LMS, [rgb.r, rgb.g, rgb.b])
	return { l, m, s }
}

/**
 * Convert a Jzazbz color to linear Display P3. Values outside [0, 1] are left as-is.
 */
export function toLinearDisplay(color: AppearanceColor): LinearDisplayColor {
	return lmsToLinearDisplay(toLms(color))
}

export function isInDisplayGamut(rgb: LinearDisplayColor, epsilon = 0): boolean {
	return [rgb.r, rgb.g, rgb.b].every((c) => c >= -epsilon && c <= 1 + epsilon)
}

/**
 * Wrap a Jzazbz color as a colorjs.io `p3-linear` color for encoding or CSS output.
 *
 * @example
 * ```ts
 * toDisplayColor(maxChromaAtHue(240)).to('p3').toString()
 * ```
 */
export function toDisplayColor(color: AppearanceColor): Color {
	const { r, g, b } = toLinearDisplay(color)
	return new Color('p3-linear', [r, g, b])
}
