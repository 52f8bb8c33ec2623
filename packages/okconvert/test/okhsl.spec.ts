import { describe, expect, it } from 'vitest'
import { okhsl, oklab, srgb } from '../src/color.ts'
import { okhslToOklab, oklabToOkhsl } from '../src/okhsl.ts'
import { oklabToRgb, rgbToOklab } from '../src/oklab.ts'
import { rgbToSrgb, srgbToRgb } from '../src/transfer.ts'
import type { Srgb } from '../src/types.ts'

function fromSrgb(r: number, g: number, b: number) {
	return oklabToOkhsl(rgbToOklab(srgbToRgb(srgb(r, g, b))))
}

function toSrgb(h: number, s: number, l: number): Srgb {
	return rgbToSrgb(oklabToRgb(okhslToOklab(okhsl(h, s, l))))
}

describe('oklabToOkhsl', () => {
	it('converts sRGB red', () => {
		const red = fromSrgb(1, 0, 0)

		expect(red.h).toBeCloseTo(0.0812052, 6)
		expect(red.s).toBeCloseTo(1, 6)
		expect(red.l).toBeCloseTo(0.5680847, 6)
	})

	it('puts the primaries at full saturation', () => {
		expect(fromSrgb(0, 1, 0).s).toBeCloseTo(1, 4)

		const blue = fromSrgb(0, 0, 1)
		expect(blue.h).toBeCloseTo(0.7334778, 6)
		expect(blue.s).toBeCloseTo(1, 6)
		expect(blue.l).toBeCloseTo(0.3665653, 6)
	})

	it('converts an in-gamut color', () => {
		const result = fromSrgb(0.2, 0.4, 0.6)

		expect(result.h).toBeCloseTo(0.6956474, 6)
		expect(result.s).toBeCloseTo(0.6170652, 6)
		expect(result.l).toBeCloseTo(0.4203582, 6)
	})

	it('reports grays with zero hue and saturation', () => {
		const gray = fromSrgb(0.5, 0.5, 0.5)
		expect(gray.h).toBe(0)
		expect(gray.s).toBe(0)
		expect(gray.l).toBeCloseTo(0.5337598, 6)

		const white = fromSrgb(1, 1, 1)
		expect(white.h).toBe(0)
		expect(white.s).toBe(0)
		expect(white.l).toBeCloseTo(1, 7)

		expect(oklabToOkhsl(oklab(0, 0, 0))).toEqual(okhsl(0, 0, 0))
	})

	it('keeps hues just below the red axis under a full turn', () => {
		expect(oklabToOkhsl(oklab(0.6, 0.1, -1e-18)).h).toBe(0)
	})
})

describe('okhslToOklab', () => {
	it('applies the inverse toe to lightness', () => {
		const result = okhslToOklab(okhsl(0, 0.8, 0.8))

		expect(result.l).toBeCloseTo(0.8281324, 6)
		expect(result.a).toBeCloseTo(0.0918761, 6)
		expect(result.b).toBeCloseTo(0, 12)
	})

	it('returns black and white at the ends of the lightness range', () => {
		expect(okhslToOklab(okhsl(0.3, 1, 0))).toEqual(oklab(0, 0, 0))
		expect(okhslToOklab(okhsl(0.3, 1, 1))).toEqual(oklab(1, 0, 0))
	})

	it('returns grays at zero saturation', () => {
		const result = okhslToOklab(okhsl(0.6, 0, 0.5))

		expect(result.a).toBeCloseTo(0, 12)
		expect(result.b).toBeCloseTo(0, 12)
	})

	it('converts a mid-range color to sRGB', () => {
		const { r, g, b } = toSrgb(0.5, 0.5, 0.5)

		expect(r).toBeCloseTo(0.2787704, 6)
		expect(g).toBeCloseTo(0.5179171, 6)
		expect(b).toBeCloseTo(0.47228, 5)
	})

	it('inverts oklabToOkhsl', () => {
		const samples: [number, number, number][] = [
			[1, 0, 0],
			[0.2, 0.4, 0.6],
			[0.9, 0.8, 0.1],
			[0.05, 0.3, 0.02],
		]

		for (const [r, g, b] of samples) {
			const { h, s, l } = fromSrgb(r, g, b)
			const result = toSrgb(h, s, l)

			expect(result.r).toBeCloseTo(r, 5)
			expect(result.g).toBeCloseTo(g, 5)
			expect(result.b).toBeCloseTo(b, 5)
		}
	})
})
