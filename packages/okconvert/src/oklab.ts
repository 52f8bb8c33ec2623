/**
 * Oklab codec: linear sRGB <-> LMS <-> oklab.
 */

import { oklab, rgb } from './color.ts'
import { LMS_TO_OKLAB, LMS_TO_RGB, multiply, OKLAB_TO_LMS, RGB_TO_LMS } from './matrix.ts'
import type { Oklab, Rgb } from './types.ts'

export function rgbToOklab(color: Rgb): Oklab {
	const [l, m, s] = multiply(RGB_TO_LMS, [color.r, color.g, color.b])
	const [L, a, b] = multiply(LMS_TO_OKLAB, [Math.cbrt(l), Math.cbrt(m), Math.cbrt(s)])
	return oklab(L, a, b)
}

export function oklabToRgb(color: Oklab): Rgb {
	const [l_, m_, s_] = multiply(OKLAB_TO_LMS, [color.l, color.a, color.b])
	const [r, g, b] = multiply(LMS_TO_RGB, [l_ * l_ * l_, m_ * m_ * m_, s_ * s_ * s_])
	return rgb(r, g, b)
}

export function chromaOf(color: Oklab): number {
	return Math.sqrt(color.a * color.a + color.b * color.b)
}
