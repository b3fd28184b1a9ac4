import * as fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import { linearDisplayToLms, toLinearDisplay } from '../../src/display.ts'
import { fromLms, toLms } from '../../src/jzazbz.ts'

const channelArb = fc.double({ min: 0, max: 1, noNaN: true })
const rgbArb = fc.record({ r: channelArb, g: channelArb, b: channelArb })
const lmsArb = fc.record({
	l: fc.double({ min: 0, max: 2, noNaN: true }),
	m: fc.double({ min: 0, max: 2, noNaN: true }),
	s: fc.double({ min: 0, max: 2, noNaN: true }),
})

describe('Jzazbz round trip', () => {
	it('fromLms ∘ toLms is the identity on forward results', () => {
		fc.assert(
			fc.property(lmsArb, (lms) => {
				const color = fromLms(lms)
				const again = fromLms(toLms(color))

				expect(again.jz).toBeCloseTo(color.jz, 8)
				expect(again.az).toBeCloseTo(color.az, 8)
				expect(again.bz).toBeCloseTo(color.bz, 8)
			}),
		)
	})

	it('toLms ∘ fromLms recovers in-gamut cone responses', () => {
		fc.assert(
			fc.property(rgbArb, (rgb) => {
				const lms = linearDisplayToLms(rgb)
				const again = toLms(fromLms(lms))

				expect(again.l).toBeCloseTo(lms.l, 8)
				expect(again.m).toBeCloseTo(lms.m, 8)
				expect(again.s).toBeCloseTo(lms.s, 8)
			}),
		)
	})

	it('recovers in-gamut display colors', () => {
		fc.assert(
			fc.property(rgbArb, (rgb) => {
				const again = toLinearDisplay(fromLms(linearDisplayToLms(rgb)))

				expect(again.r).toBeCloseTo(rgb.r, 7)
				expect(again.g).toBeCloseTo(rgb.g, 7)
				expect(again.b).toBeCloseTo(rgb.b, 7)
			}),
		)
	})

	it('produces non-negative lightness for non-negative responses', () => {
		fc.assert(
			fc.property(lmsArb, (lms) => {
				expect(fromLms(lms).jz).toBeGreaterThanOrEqual(-1e-12)
			}),
		)
	})
})
