/**
 * Compare the compiled corner table with one derived from the Display P3 chromaticities,
 * and report the worst hue error of each search preset.
 */

import { GAMUT_CORNERS } from '../src/corners.ts'
import { deriveCornerTable } from '../src/derivation.ts'
import { hueOf } from '../src/jzazbz.ts'
import { maxChromaAtHue, SCALAR_SEARCH, WIDE_SEARCH } from '../src/locator.ts'
import { normalizeHue, radiansToDegrees } from '../src/util.ts'

const derived = deriveCornerTable()

console.log('Corner\tHue (°)\tΔHue\t\tΔL\t\tΔM\t\tΔS')
console.log('------\t-------\t----\t\t--\t\t--\t\t--')

for (const [i, compiled] of GAMUT_CORNERS.entries()) {
	const corner = derived[i]
	console.log(
		[
			compiled.name,
			radiansToDegrees(compiled.hue).toFixed(4),
			(corner.hue - compiled.hue).toExponential(2),
			(corner.lms.l - compiled.lms.l).toExponential(2),
			(corner.lms.m - compiled.lms.m).toExponential(2),
			(corner.lms.s - compiled.lms.s).toExponential(2),
		].join('\t'),
	)
}

console.log('\n=== Search precision ===')

for (const [name, options] of [
	['scalar', SCALAR_SEARCH],
	['wide', WIDE_SEARCH],
] as const) {
	let worst = 0
	for (let tenth = -1800; tenth < 1800; tenth++) {
		const hue = tenth / 10
		const error = normalizeHue(radiansToDegrees(hueOf(maxChromaAtHue(hue, options))) - hue)
		worst = Math.min(worst, error)
	}
	const bound = 360 / options.lanes ** options.iterations
	console.log(`${name}\t${options.iterations}×${options.lanes}\tworst ${worst.toExponential(3)}°\tbound ${bound.toExponential(3)}°`)
}
