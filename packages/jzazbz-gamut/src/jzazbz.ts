/**
 * Jzazbz ↔ LMS conversion.
 *
 * Both directions are closed-form. Cone responses are clamped rather than rejected,
 * so every finite input produces a finite result.
 */

import {
	IZAZBZ_TO_LMSP,
	JZ_D,
	JZ_D0,
	LMSP_TO_IZAZBZ,
	PQ_C1,
	PQ_C2,
	PQ_C3,
	PQ_COMPRESSED_MAX,
	PQ_COMPRESSED_MIN,
	PQ_INV_N,
	PQ_INV_P,
	PQ_N,
	PQ_NORMALIZATION,
	PQ_P,
} from './constants.ts'
import type { AppearanceColor, AppearanceLch, ConeResponse } from './types.ts'
import { clamp, degreesToRadians, multiply, normalizeHue, radiansToDegrees } from './util.ts'

function compress(value: number): number {
	const valp = Math.max(value / PQ_NORMALIZATION, 0) ** PQ_N
	return ((PQ_C1 + PQ_C2 * valp) / (1 + PQ_C3 * valp)) ** PQ_P
}

function expand(compressed: number): number {
	const valp = clamp(PQ_COMPRESSED_MIN, compressed, PQ_COMPRESSED_MAX) ** PQ_INV_P
	const linear = (PQ_C1 - valp) / (PQ_C3 * valp - PQ_C2)
	return PQ_NORMALIZATION * Math.max(linear, 0) ** PQ_INV_N
}

/**
 * Convert cone responses to Jzazbz.
 */
export function fromLms(lms: ConeResponse): AppearanceColor {
	const [iz, az, bz] = multiply(LMSP_TO_IZAZBZ, [compress(lms.l), compress(lms.m), compress(lms.s)])
	const jz = ((1 + JZ_D) * iz) / (1 + JZ_D * iz) - JZ_D0

	return { jz, az, bz }
}

/**
 * Convert Jzazbz to cone responses.
 *
 * Compressed channels are clamped to the PQ curve's range before inversion; callers
 * probing past the display gamut get the nearest representable response instead of NaN.
 */
export function toLms(color: AppearanceColor): ConeResponse {
	const jzp = color.jz + JZ_D0
	const iz = jzp / (1 + JZ_D - JZ_D * jzp)
	const [lp, mp, sp] = multiply(IZAZBZ_TO_LMSP, [iz, color.az, color.bz])

	return { l: expand(lp), m: expand(mp), s: expand(sp) }
}

/**
 * Hue angle in radians, in (-π, π].
 */
export function hueOf(color: AppearanceColor): number {
	return Math.atan2(color.bz, color.az)
}

export function chromaOf(color: AppearanceColor): number {
	return Math.hypot(color.az, color.bz)
}

export function toLch(color: AppearanceColor): AppearanceLch {
	return {
		jz: color.jz,
		cz: chromaOf(color),
		hz: normalizeHue(radiansToDegrees(hueOf(color))),
	}
}

export function fromLch(lch: AppearanceLch): AppearanceColor {
	const h = degreesToRadians(lch.hz)
	return {
		jz: lch.jz,
		az: lch.cz * Math.cos(h),
		bz: lch.cz * Math.sin(h),
	}
}
