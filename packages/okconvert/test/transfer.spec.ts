import Color from 'colorjs.io'
import { describe, expect, it } from 'vitest'
import { rgb, srgb } from '../src/color.ts'
import { decodeChannel, encodeChannel, rgbToSrgb, srgbToRgb } from '../src/transfer.ts'

describe('srgbToRgb', () => {
	it('leaves the primaries unchanged', () => {
		expect(srgbToRgb(srgb(1, 0, 0))).toEqual(rgb(1, 0, 0))
		expect(srgbToRgb(srgb(0, 1, 0))).toEqual(rgb(0, 1, 0))
		expect(srgbToRgb(srgb(0, 0, 1))).toEqual(rgb(0, 0, 1))
		expect(srgbToRgb(srgb(1, 1, 0))).toEqual(rgb(1, 1, 0))
	})

	it('decodes mid gray', () => {
		const result = srgbToRgb(srgb(0.5, 0.5, 0.5))

		expect(result.r).toBeCloseTo(0.21404114, 8)
		expect(result.g).toBe(result.r)
		expect(result.b).toBe(result.r)
	})

	it('uses the linear segment near black', () => {
		expect(decodeChannel(0.04)).toBeCloseTo(0.04 / 12.92, 15)
		expect(encodeChannel(0.003)).toBeCloseTo(0.003 * 12.92, 15)
	})

	it('passes extended values through the curve', () => {
		expect(decodeChannel(-0.1)).toBeCloseTo(-0.1 / 12.92, 15)
		expect(decodeChannel(1.1)).toBeGreaterThan(1)
	})

	it('agrees with colorjs.io', () => {
		for (const value of [0.02, 0.1, 0.25, 0.5, 0.75, 0.9]) {
			const [expected] = new Color('srgb', [value, value, value]).to('srgb-linear').coords
			expect(decodeChannel(value)).toBeCloseTo(expected, 6)
		}
	})
})

describe('rgbToSrgb', () => {
	it('encodes white as white', () => {
		const white = rgbToSrgb(rgb(1, 1, 1))

		expect(white.r).toBeCloseTo(1, 12)
		expect(white.g).toBe(white.r)
		expect(white.b).toBe(white.r)
	})

	it('inverts srgbToRgb', () => {
		for (let i = 0; i <= 100; i++) {
			const x = i / 100
			expect(encodeChannel(decodeChannel(x))).toBeCloseTo(x, 12)
		}
	})
})
