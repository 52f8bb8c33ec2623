/**
 * Sweep the hue circle and report how closely okhsl and okhsv track the sRGB
 * gamut boundary.
 */

import { okhsl, okhsv } from '../src/color.ts'
import { toRgb } from '../src/convert.ts'
import { findCusp, hueVector } from '../src/gamut.ts'
import type { AnyColor } from '../src/types.ts'

const HUE_STEPS = 24
const GRID_STEPS = 20

function overshoot(color: AnyColor): number {
	const { r, g, b } = toRgb(color)
	return Math.max(0, Math.max(r, g, b) - 1, -Math.min(r, g, b))
}

console.log('Hue\tCusp L\tCusp C\tOkhsl\t\tOkhsv')
console.log('---\t------\t------\t-----\t\t-----')

let worstOkhsl = 0
let worstOkhsv = 0

for (let i = 0; i < HUE_STEPS; i++) {
	const h = i / HUE_STEPS
	const cusp = findCusp(hueVector(h))

	let hueOkhsl = 0
	let hueOkhsv = 0
	for (let j = 0; j <= GRID_STEPS; j++) {
		for (let k = 0; k <= GRID_STEPS; k++) {
			const s = j / GRID_STEPS
			const x = k / GRID_STEPS
			hueOkhsl = Math.max(hueOkhsl, overshoot(okhsl(h, s, x)))
			hueOkhsv = Math.max(hueOkhsv, overshoot(okhsv(h, s, x)))
		}
	}

	console.log(
		`${h.toFixed(3)}\t${cusp.lightness.toFixed(4)}\t${cusp.chroma.toFixed(4)}\t${hueOkhsl.toExponential(2)}\t${hueOkhsv.toExponential(2)}`,
	)

	worstOkhsl = Math.max(worstOkhsl, hueOkhsl)
	worstOkhsv = Math.max(worstOkhsv, hueOkhsv)
}

console.log('\n=== Summary ===')
console.log(`Worst okhsl overshoot: ${worstOkhsl.toExponential(2)}`)
console.log(`Worst okhsv overshoot: ${worstOkhsv.toExponential(2)}`)
