/**
 * Display P3 gamut-boundary corners in LMS, tagged with their Jzazbz hue.
 *
 * Along the boundary edge joining two adjacent corners (a straight segment in LMS,
 * since LMS is linear in display RGB) hue increases monotonically, so any hue is
 * bracketed by one edge and can be located on it by bisection.
 */

import type { CornerName, GamutCorner, SearchBracket } from './types.ts'

function corner(name: CornerName, l: number, m: number, s: number, hue: number): GamutCorner {
	return Object.freeze({ name, lms: Object.freeze({ l, m, s }), hue })
}

// The wrap corner is the point of the green→cyan edge (RGB ≈ 0, 1, 0.6501) where bz
// crosses zero with az < 0, i.e. hue ±π. It closes the table at both ends.
const WRAP_L = 0.5160889560818874
const WRAP_M = 0.6689538495464404
const WRAP_S = 0.6434566818125762

/**
 * Corners sorted by ascending hue over [-π, π].
 */
export const GAMUT_CORNERS: readonly GamutCorner[] = Object.freeze([
	corner('wrap', WRAP_L, WRAP_M, WRAP_S, -Math.PI),
	corner('cyan', 0.55608700197488292, 0.73025516799564405, 0.89827700087481577, -2.7604618631505451),
	corner('blue', 0.11431238432553269, 0.17519605565166838, 0.72826353378675235, -1.7688992503294745),
	corner('magenta', 0.53001160774764933, 0.41718828256028762, 0.8027984639562511, -0.60623058828496412),
	corner('red', 0.41569922342211668, 0.24199222690861924, 0.074534930169498803, 0.74690126898001996),
	corner('yellow', 0.85747384107146684, 0.79705133925259486, 0.24454839725756228, 1.789331917784555),
	corner('green', 0.44177461764935022, 0.55505911234397565, 0.17001346708806347, 2.3782967581439904),
	corner('wrap', WRAP_L, WRAP_M, WRAP_S, Math.PI),
])

/**
 * Index of the edge `[corners[j], corners[j + 1]]` containing `hue`.
 * Three comparisons over the eight sorted entries; no loop, so every caller
 * takes the same path length.
 */
export function edgeIndexForHue(
	hue: number,
	corners: readonly GamutCorner[] = GAMUT_CORNERS,
): number {
	let j = 0
	j += corners[4].hue <= hue ? 4 : 0
	j += corners[j + 2].hue <= hue ? 2 : 0
	j += corners[j + 1].hue <= hue ? 1 : 0
	// hue = +π lands on the closing entry; it belongs to the last edge
	return Math.min(j, corners.length - 2)
}

/**
 * Select the pair of adjacent corners whose hue range contains `hue` (radians, [-π, π]).
 */
export function bracketForHue(
	hue: number,
	corners: readonly GamutCorner[] = GAMUT_CORNERS,
): SearchBracket {
	const j = edgeIndexForHue(hue, corners)
	const lower = corners[j]
	const upper = corners[j + 1]

	return {
		lower: { lms: lower.lms, hue: lower.hue },
		upper: { lms: upper.lms, hue: upper.hue },
	}
}
