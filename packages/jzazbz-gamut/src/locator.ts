/**
 * Maximum-chroma search along the Display P3 gamut boundary.
 *
 * The bracket for a hue is refined by evaluating `lanes - 1` evenly spaced interior
 * points per iteration and keeping the sub-segment that starts at the last point whose
 * hue does not exceed the target. With two lanes this is bisection; with many lanes the
 * per-iteration evaluations are independent and the selection is a max-reduction, which
 * is the shape a data-parallel evaluator needs.
 */

import { SCALAR_ITERATIONS, WIDE_ITERATIONS, WIDE_LANES } from './constants.ts'
import { bracketForHue } from './corners.ts'
import { fromLms, hueOf } from './jzazbz.ts'
import type {
	AppearanceColor,
	BracketEndpoint,
	ConeResponse,
	SearchBracket,
	SearchOptions,
} from './types.ts'
import { degreesToRadians, lerp, normalizeHue, unwrapHue } from './util.ts'

export const SCALAR_SEARCH = Object.freeze({
	iterations: SCALAR_ITERATIONS,
	lanes: 2,
}) satisfies Required<SearchOptions>

export const WIDE_SEARCH = Object.freeze({
	iterations: WIDE_ITERATIONS,
	lanes: WIDE_LANES,
}) satisfies Required<SearchOptions>

const NAN_COLOR: AppearanceColor = Object.freeze({ jz: Number.NaN, az: Number.NaN, bz: Number.NaN })

/**
 * Apply defaults and validate search options.
 */
export function resolveSearchOptions(options: SearchOptions = {}): Required<SearchOptions> {
	const iterations = options.iterations ?? SCALAR_SEARCH.iterations
	const lanes = options.lanes ?? SCALAR_SEARCH.lanes

	if (!Number.isInteger(iterations) || iterations < 0) {
		throw new Error(
			`Invalid search iterations '${iterations}'. Iterations must be a non-negative integer.`,
		)
	}
	if (!Number.isInteger(lanes) || lanes < 2) {
		throw new Error(`Invalid search lanes '${lanes}'. Lanes must be an integer of at least 2.`)
	}

	return { iterations, lanes }
}

function pointAt(bracket: SearchBracket, t: number): ConeResponse {
	const { lower, upper } = bracket
	return {
		l: lerp(lower.lms.l, upper.lms.l, t),
		m: lerp(lower.lms.m, upper.lms.m, t),
		s: lerp(lower.lms.s, upper.lms.s, t),
	}
}

/**
 * One search iteration: split `bracket` into `lanes` equal parts (in LMS) and return the
 * part whose start is the furthest point with hue ≤ `target` (radians).
 */
export function refineBracket(bracket: SearchBracket, target: number, lanes = 2): SearchBracket {
	const hues = new Float64Array(lanes + 1)
	hues[0] = bracket.lower.hue
	hues[lanes] = bracket.upper.hue

	for (let lane = 1; lane < lanes; lane++) {
		const hue = hueOf(fromLms(pointAt(bracket, lane / lanes)))
		// atan2 may report the ±π seam on either side; keep every lane in the bracket's frame
		hues[lane] = unwrapHue(hue, bracket.lower.hue)
	}

	let selected = 0
	for (let lane = 1; lane < lanes; lane++) {
		selected = Math.max(selected, hues[lane] <= target ? lane : 0)
	}

	const endpoint = (lane: number): BracketEndpoint => {
		if (lane === 0) {
			return bracket.lower
		}
		if (lane === lanes) {
			return bracket.upper
		}
		return { lms: pointAt(bracket, lane / lanes), hue: hues[lane] }
	}

	return { lower: endpoint(selected), upper: endpoint(selected + 1) }
}

/**
 * Run the full search for a hue in radians, in [-π, π]. Returns the final bracket;
 * its lower endpoint is the boundary color.
 */
export function searchBoundary(target: number, options: SearchOptions = {}): SearchBracket {
	const { iterations, lanes } = resolveSearchOptions(options)

	let bracket = bracketForHue(target)
	for (let i = 0; i < iterations; i++) {
		bracket = refineBracket(bracket, target, lanes)
	}

	return bracket
}

/**
 * Find the Display P3 color of maximum chroma at a hue.
 *
 * The hue is in degrees and may be any real value; it is reduced to [-180, 180) here.
 * The returned color's hue never exceeds the requested hue and falls short of it by at
 * most 360° / lanes^iterations. A NaN or infinite hue yields a NaN color.
 *
 * @example
 * ```ts
 * const red = maxChromaAtHue(0)
 * const fast = maxChromaAtHue(200, WIDE_SEARCH)
 * ```
 */
export function maxChromaAtHue(hue: number, options: SearchOptions = {}): AppearanceColor {
	const resolved = resolveSearchOptions(options)
	const target = degreesToRadians(normalizeHue(hue))

	if (Number.isNaN(target)) {
		return NAN_COLOR
	}

	return fromLms(searchBoundary(target, resolved).lower.lms)
}
