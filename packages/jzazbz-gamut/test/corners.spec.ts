import { describe, expect, it } from 'vitest'
import { bracketForHue, edgeIndexForHue, GAMUT_CORNERS } from '../src/corners.ts'
import { fromLms, hueOf } from '../src/jzazbz.ts'
import { unwrapHue } from '../src/util.ts'

describe('GAMUT_CORNERS', () => {
	it('has eight entries sorted by hue', () => {
		expect(GAMUT_CORNERS).toHaveLength(8)
		for (let i = 1; i < GAMUT_CORNERS.length; i++) {
			expect(GAMUT_CORNERS[i].hue).toBeGreaterThan(GAMUT_CORNERS[i - 1].hue)
		}
	})

	it('lists corners in hue order', () => {
		expect(GAMUT_CORNERS.map((c) => c.name)).toEqual([
			'wrap',
			'cyan',
			'blue',
			'magenta',
			'red',
			'yellow',
			'green',
			'wrap',
		])
	})

	it('closes the turn with the same color at -π and π', () => {
		const first = GAMUT_CORNERS[0]
		const last = GAMUT_CORNERS[7]

		expect(first.hue).toBe(-Math.PI)
		expect(last.hue).toBe(Math.PI)
		expect(first.lms).toEqual(last.lms)
	})

	it('stores the hue each corner converts to', () => {
		for (const corner of GAMUT_CORNERS) {
			const hue = unwrapHue(hueOf(fromLms(corner.lms)), corner.hue)
			expect(hue).toBeCloseTo(corner.hue, 9)
		}
	})

	it('is frozen', () => {
		expect(Object.isFrozen(GAMUT_CORNERS)).toBe(true)
		expect(Object.isFrozen(GAMUT_CORNERS[4])).toBe(true)
		expect(Object.isFrozen(GAMUT_CORNERS[4].lms)).toBe(true)
	})
})

describe('edgeIndexForHue', () => {
	it('selects the edge whose hue range contains the hue', () => {
		expect(edgeIndexForHue(-Math.PI)).toBe(0)
		expect(edgeIndexForHue(-2.9)).toBe(0)
		expect(edgeIndexForHue(-2)).toBe(1)
		expect(edgeIndexForHue(-1)).toBe(2)
		expect(edgeIndexForHue(0)).toBe(3)
		expect(edgeIndexForHue(1)).toBe(4)
		expect(edgeIndexForHue(2)).toBe(5)
		expect(edgeIndexForHue(3)).toBe(6)
	})

	it('starts the edge at a corner hue', () => {
		for (let i = 0; i < 7; i++) {
			expect(edgeIndexForHue(GAMUT_CORNERS[i].hue)).toBe(i)
		}
	})

	it('keeps π on the last edge', () => {
		expect(edgeIndexForHue(Math.PI)).toBe(6)
	})
})

describe('bracketForHue', () => {
	it('returns the adjacent corners around the hue', () => {
		const bracket = bracketForHue(0)

		expect(bracket.lower.lms).toBe(GAMUT_CORNERS[3].lms)
		expect(bracket.upper.lms).toBe(GAMUT_CORNERS[4].lms)
		expect(bracket.lower.hue).toBe(GAMUT_CORNERS[3].hue)
		expect(bracket.upper.hue).toBe(GAMUT_CORNERS[4].hue)
	})

	it('brackets the hue between the endpoint hues', () => {
		for (let hue = -Math.PI; hue < Math.PI; hue += 0.05) {
			const { lower, upper } = bracketForHue(hue)
			expect(lower.hue).toBeLessThanOrEqual(hue)
			expect(upper.hue).toBeGreaterThan(hue)
		}
	})
})
