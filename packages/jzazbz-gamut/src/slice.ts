/**
 * Sample grids for drawing a constant-hue slice and a hue dial.
 */

import { isInDisplayGamut, linearDisplayToLms, toLinearDisplay } from './display.ts'
import { chromaOf, fromLch, fromLms } from './jzazbz.ts'
import { maxChromaAtHue, resolveSearchOptions } from './locator.ts'
import type {
	DialSample,
	HueSlice,
	SearchOptions,
	SliceOptions,
	SliceSample,
} from './types.ts'
import { normalizeHue } from './util.ts'

/** Jz of Display P3 white. */
export const WHITE_LIGHTNESS = fromLms(linearDisplayToLms({ r: 1, g: 1, b: 1 })).jz

function validateSteps(name: string, steps: number, min: number): void {
	if (!Number.isInteger(steps) || steps < min) {
		throw new Error(`Invalid ${name} '${steps}'. Must be an integer of at least ${min}.`)
	}
}

/**
 * Sample the constant-hue plane on a lightness × chroma grid spanning black to white
 * and zero to the hue's maximum chroma.
 */
export function sampleHueSlice(hue: number, options: SliceOptions = {}): HueSlice {
	const lightnessSteps = options.lightnessSteps ?? 30
	const chromaSteps = options.chromaSteps ?? 30
	const epsilon = options.epsilon ?? 1e-6
	const search = resolveSearchOptions(options)

	validateSteps('lightnessSteps', lightnessSteps, 2)
	validateSteps('chromaSteps', chromaSteps, 2)

	const normalized = normalizeHue(hue)
	const boundary = maxChromaAtHue(normalized, search)
	const maxChroma = chromaOf(boundary)
	const samples: SliceSample[] = []

	for (let i = 0; i < lightnessSteps; i++) {
		const lightness = (WHITE_LIGHTNESS * i) / (lightnessSteps - 1)

		for (let k = 0; k < chromaSteps; k++) {
			const chroma = (maxChroma * k) / (chromaSteps - 1)
			const color = fromLch({ jz: lightness, cz: chroma, hz: normalized })
			const display = toLinearDisplay(color)

			samples.push({
				lightness,
				chroma,
				color,
				display,
				inGamut: isInDisplayGamut(display, epsilon),
			})
		}
	}

	return {
		hue: normalized,
		boundary,
		maxLightness: WHITE_LIGHTNESS,
		maxChroma,
		lightnessSteps,
		chromaSteps,
		samples,
	}
}

/**
 * Maximum-chroma colors at `steps` evenly spaced hues, starting at 0°.
 */
export function sampleHueDial(steps = 360, options: SearchOptions = {}): DialSample[] {
	validateSteps('steps', steps, 1)
	const search = resolveSearchOptions(options)

	return Array.from({ length: steps }, (_, i) => {
		const hue = (360 * i) / steps
		const color = maxChromaAtHue(hue, search)
		return { hue, color, display: toLinearDisplay(color) }
	})
}
