/**
 * Rebuild the corner table and the LMS → display matrix from primary chromaticities.
 *
 * The compiled-in constants in `constants.ts` and `corners.ts` are the runtime source;
 * this module exists to reproduce them from first principles and to check the
 * monotonic-hue precondition the search relies on.
 */

import { inverse, Matrix, solve } from 'ml-matrix'
import { DISPLAY_P3_CHROMATICITIES, JZ_B, JZ_G, XYZP_TO_LMS } from './constants.ts'
import { fromLms, hueOf } from './jzazbz.ts'
import type { Chromaticities, ConeResponse, CornerName, GamutCorner, Matrix3 } from './types.ts'
import { lerp, toMatrix3, unwrapHue } from './util.ts'

const RGB_CORNERS: readonly (readonly [Exclude<CornerName, 'wrap'>, number, number, number])[] = [
	['red', 1, 0, 0],
	['yellow', 1, 1, 0],
	['green', 0, 1, 0],
	['cyan', 0, 1, 1],
	['blue', 0, 0, 1],
	['magenta', 1, 0, 1],
]

function toMatrix(m: Matrix3): Matrix {
	return new Matrix(m.map((row) => [...row]))
}

function xyToXyz([x, y]: readonly [number, number]): number[] {
	return [x / y, 1, (1 - x - y) / y]
}

/**
 * RGB → XYZ for primaries and white given as xy chromaticities, normalized to white Y = 1.
 */
export function deriveRgbToXyz(chromaticities: Chromaticities = DISPLAY_P3_CHROMATICITIES): Matrix3 {
	const columns = [chromaticities.red, chromaticities.green, chromaticities.blue].map(xyToXyz)
	const primaries = new Matrix([0, 1, 2].map((row) => columns.map((column) => column[row])))
	const scale = solve(primaries, Matrix.columnVector(xyToXyz(chromaticities.white))).to1DArray()

	return toMatrix3(primaries.to2DArray().map((row) => row.map((value, i) => value * scale[i])))
}

function xyzToLms(): Matrix {
	const xyzToXyzp = new Matrix([
		[JZ_B, 0, 1 - JZ_B],
		[1 - JZ_G, JZ_G, 0],
		[0, 0, 1],
	])
	return toMatrix(XYZP_TO_LMS).mmul(xyzToXyzp)
}

export function deriveLmsToLinearDisplay(
	chromaticities: Chromaticities = DISPLAY_P3_CHROMATICITIES,
): Matrix3 {
	const xyzToRgb = inverse(toMatrix(deriveRgbToXyz(chromaticities)))
	return toMatrix3(xyzToRgb.mmul(inverse(xyzToLms())).to2DArray())
}

function lmsAt(lower: ConeResponse, upper: ConeResponse, t: number): ConeResponse {
	return {
		l: lerp(lower.l, upper.l, t),
		m: lerp(lower.m, upper.m, t),
		s: lerp(lower.s, upper.s, t),
	}
}

/**
 * Throw if hue ever decreases along an edge of `table`.
 * Each edge is sampled at `samples` evenly spaced points after its lower corner.
 */
export function assertMonotonicEdges(table: readonly GamutCorner[], samples = 256): void {
	for (let j = 0; j + 1 < table.length; j++) {
		const lower = table[j]
		const upper = table[j + 1]
		let previous = lower.hue

		for (let i = 1; i <= samples; i++) {
			const t = i / samples
			const hue = unwrapHue(hueOf(fromLms(lmsAt(lower.lms, upper.lms, t))), lower.hue)
			if (hue < previous) {
				throw new Error(
					`Hue decreases along the ${lower.name}→${upper.name} edge at t = ${t} (${previous} → ${hue}).`,
				)
			}
			previous = hue
		}
	}
}

/**
 * Compute the eight-entry corner table: the six primaries and secondaries sorted by hue,
 * closed at both ends by the point where the boundary crosses hue ±π.
 */
export function deriveCornerTable(
	chromaticities: Chromaticities = DISPLAY_P3_CHROMATICITIES,
	samples = 256,
): GamutCorner[] {
	const rgbToLms = xyzToLms().mmul(toMatrix(deriveRgbToXyz(chromaticities)))

	const sorted = RGB_CORNERS.map(([name, r, g, b]): GamutCorner => {
		const [l, m, s] = rgbToLms.mmul(Matrix.columnVector([r, g, b])).to1DArray()
		const lms = { l, m, s }
		return { name, lms, hue: hueOf(fromLms(lms)) }
	}).sort((a, b) => a.hue - b.hue)

	// The seam edge runs from the largest hue, through ±π, to the smallest
	const before = sorted[sorted.length - 1]
	const after = sorted[0]
	let low = 0
	let high = 1
	for (let i = 0; i < 64; i++) {
		const mid = (low + high) / 2
		const hue = unwrapHue(hueOf(fromLms(lmsAt(before.lms, after.lms, mid))), before.hue)
		if (hue <= Math.PI) {
			low = mid
		} else {
			high = mid
		}
	}
	const wrap = lmsAt(before.lms, after.lms, low)

	const table: GamutCorner[] = [
		{ name: 'wrap', lms: wrap, hue: -Math.PI },
		...sorted,
		{ name: 'wrap', lms: wrap, hue: Math.PI },
	]

	assertMonotonicEdges(table, samples)

	return table
}
