import Color from 'colorjs.io'
import { describe, expect, it } from 'vitest'
import { GAMUT_CORNERS } from '../src/corners.ts'
import { lmsToLinearDisplay } from '../src/display.ts'
import { chromaOf, fromLch, fromLms, hueOf, toLch, toLms } from '../src/jzazbz.ts'
import type { CornerName } from '../src/types.ts'

/**
 * Jzazbz via colorjs.io, with linear P3 scaled so that white sits at 100 cd/m².
 */
function referenceJzazbz(r: number, g: number, b: number) {
	const [x, y, z] = new Color('p3-linear', [r, g, b]).to('xyz-d65').coords
	const [jz, az, bz] = new Color('xyz-abs-d65', [x * 100, y * 100, z * 100]).to('jzazbz').coords
	return { jz, az, bz }
}

function cornerLms(name: CornerName) {
	const corner = GAMUT_CORNERS.find((c) => c.name === name)
	if (corner === undefined) {
		throw new Error(`No corner named ${name}`)
	}
	return corner.lms
}

describe('fromLms', () => {
	it('maps black to the origin', () => {
		const black = fromLms({ l: 0, m: 0, s: 0 })

		expect(black.jz).toBeCloseTo(0, 12)
		expect(black.az).toBeCloseTo(0, 12)
		expect(black.bz).toBeCloseTo(0, 12)
	})

	it('converts the red corner', () => {
		const red = fromLms(cornerLms('red'))

		expect(red.jz).toBeCloseTo(0.10446036371863092, 10)
		expect(red.az).toBeCloseTo(0.1141436386048856, 10)
		expect(red.bz).toBeCloseTo(0.10567704212538415, 10)
	})

	it('agrees with colorjs.io for every corner', () => {
		for (const corner of GAMUT_CORNERS) {
			const { r, g, b } = lmsToLinearDisplay(corner.lms)
			const expected = referenceJzazbz(r, g, b)
			const actual = fromLms(corner.lms)

			expect(actual.jz).toBeCloseTo(expected.jz, 4)
			expect(actual.az).toBeCloseTo(expected.az, 4)
			expect(actual.bz).toBeCloseTo(expected.bz, 4)
		}
	})

	it('treats negative responses as zero', () => {
		expect(fromLms({ l: -1, m: 0.5, s: 0.5 })).toEqual(fromLms({ l: 0, m: 0.5, s: 0.5 }))
	})

	it('propagates NaN', () => {
		expect(fromLms({ l: Number.NaN, m: 0.5, s: 0.5 }).jz).toBeNaN()
	})
})

describe('toLms', () => {
	it('inverts the yellow corner', () => {
		const yellow = cornerLms('yellow')
		const lms = toLms(fromLms(yellow))

		expect(lms.l).toBeCloseTo(yellow.l, 10)
		expect(lms.m).toBeCloseTo(yellow.m, 10)
		expect(lms.s).toBeCloseTo(yellow.s, 10)
	})

	it('maps the origin to black', () => {
		const lms = toLms({ jz: 0, az: 0, bz: 0 })

		expect(lms.l).toBeCloseTo(0, 10)
		expect(lms.m).toBeCloseTo(0, 10)
		expect(lms.s).toBeCloseTo(0, 10)
	})

	it('clamps below black instead of producing NaN', () => {
		const lms = toLms({ jz: -0.01, az: 0, bz: 0 })

		expect(lms.l).toBeCloseTo(0, 10)
		expect(lms.m).toBeCloseTo(0, 10)
		expect(lms.s).toBeCloseTo(0, 10)
	})

	it('clamps above the curve domain instead of diverging', () => {
		const lms = toLms({ jz: 0.6, az: 0, bz: 0 })

		expect(Number.isFinite(lms.l)).toBe(true)
		expect(lms.l).toBe(lms.m)
		expect(lms.m).toBe(lms.s)
	})
})

describe('polar helpers', () => {
	it('derives hue and chroma from the chromatic axes', () => {
		const color = { jz: 0.1, az: 0, bz: 0.05 }

		expect(hueOf(color)).toBeCloseTo(Math.PI / 2, 12)
		expect(chromaOf(color)).toBeCloseTo(0.05, 12)
	})

	it('round-trips through lch with hue in [-180, 180)', () => {
		const lch = toLch(fromLch({ jz: 0.12, cz: 0.08, hz: 270 }))

		expect(lch.jz).toBe(0.12)
		expect(lch.cz).toBeCloseTo(0.08, 12)
		expect(lch.hz).toBeCloseTo(-90, 10)
	})
})
