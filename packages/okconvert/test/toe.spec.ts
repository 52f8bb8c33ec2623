import { describe, expect, it } from 'vitest'
import { toe, toeInv } from '../src/toe.ts'

describe('toe', () => {
	it('fixes both ends of the range', () => {
		expect(toe(0)).toBeCloseTo(0, 12)
		expect(toe(1)).toBeCloseTo(1, 12)
		expect(toeInv(0)).toBe(0)
		expect(toeInv(1)).toBeCloseTo(1, 12)
	})

	it('darkens mid tones', () => {
		// oklab lightness of sRGB red
		expect(toe(0.6279553606145516)).toBeCloseTo(0.5680846525, 8)
		expect(toe(0.5)).toBeLessThan(0.5)
	})

	it('is monotonic on [0, 1]', () => {
		let previous = toe(0)
		for (let i = 1; i <= 1000; i++) {
			const next = toe(i / 1000)
			expect(next).toBeGreaterThan(previous)
			previous = next
		}
	})

	it('is inverted by toeInv on 1000 samples', () => {
		for (let i = 0; i <= 1000; i++) {
			const x = i / 1000
			expect(Math.abs(toeInv(toe(x)) - x)).toBeLessThan(1e-5)
			expect(Math.abs(toe(toeInv(x)) - x)).toBeLessThan(1e-5)
		}
	})

	it('maps 0.8 back to the oklab lightness of okhsl l = 0.8', () => {
		expect(toeInv(0.8)).toBeCloseTo(0.8281324302, 9)
	})
})
