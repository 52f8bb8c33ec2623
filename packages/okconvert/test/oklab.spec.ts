import Color from 'colorjs.io'
import { describe, expect, it } from 'vitest'
import { oklab, rgb } from '../src/color.ts'
import { chromaOf, oklabToRgb, rgbToOklab } from '../src/oklab.ts'

describe('rgbToOklab', () => {
	it('converts the primaries', () => {
		const red = rgbToOklab(rgb(1, 0, 0))
		expect(red.l).toBeCloseTo(0.627955, 5)
		expect(red.a).toBeCloseTo(0.224863, 5)
		expect(red.b).toBeCloseTo(0.125846, 5)

		const green = rgbToOklab(rgb(0, 1, 0))
		expect(green.l).toBeCloseTo(0.86644, 5)
		expect(green.a).toBeCloseTo(-0.233888, 5)
		expect(green.b).toBeCloseTo(0.179498, 5)

		const blue = rgbToOklab(rgb(0, 0, 1))
		expect(blue.l).toBeCloseTo(0.452014, 5)
		expect(blue.a).toBeCloseTo(-0.032457, 5)
		expect(blue.b).toBeCloseTo(-0.311528, 5)
	})

	it('maps white to lightness 1 with no chroma', () => {
		const white = rgbToOklab(rgb(1, 1, 1))

		expect(white.l).toBeCloseTo(1, 7)
		expect(chromaOf(white)).toBeLessThan(1e-7)
	})

	it('agrees with colorjs.io', () => {
		const samples: [number, number, number][] = [
			[0.2, 0.4, 0.6],
			[0.9, 0.1, 0.3],
			[0.05, 0.05, 0.8],
			[0.5, 0.5, 0.5],
		]

		for (const [r, g, b] of samples) {
			const [l, a, bb] = new Color('srgb-linear', [r, g, b]).to('oklab').coords
			const result = rgbToOklab(rgb(r, g, b))

			expect(result.l).toBeCloseTo(l, 3)
			expect(result.a).toBeCloseTo(a, 3)
			expect(result.b).toBeCloseTo(bb, 3)
		}
	})
})

describe('oklabToRgb', () => {
	it('inverts rgbToOklab', () => {
		const source = rgb(0.3, 0.6, 0.1)
		const result = oklabToRgb(rgbToOklab(source))

		// The published 10-digit matrices are inverses to about 1e-7
		expect(result.r).toBeCloseTo(source.r, 6)
		expect(result.g).toBeCloseTo(source.g, 6)
		expect(result.b).toBeCloseTo(source.b, 6)
	})

	it('returns out-of-gamut channels unclamped', () => {
		const result = oklabToRgb(oklab(0.7, 0.4, 0))

		expect(result.r).toBeGreaterThan(1)
		expect(Math.min(result.g, result.b)).toBeLessThan(0)
	})
})
