/**
 * Okhsv <-> oklab.
 *
 * Saturation and value are first laid out on the triangle spanned by black,
 * white and the cusp. The toe and a uniform rescale then pull the result onto
 * the curved upper edge of the real gamut, so `v = 1` touches the boundary
 * without clipping.
 */

import { okhsv, oklab } from './color.ts'
import { ACHROMATIC_THRESHOLD, OKHSV_S0 } from './constants.ts'
import { getStMax, hueOf, hueVector } from './gamut.ts'
import { chromaOf, oklabToRgb } from './oklab.ts'
import { toe, toeInv } from './toe.ts'
import type { HueVector, Okhsv, Oklab } from './types.ts'
import { maxChannel } from './util.ts'

/**
 * Factor that moves the triangle vertex `(lv, cv)` (the `v = 1` point for the
 * current saturation) onto the gamut boundary.
 */
function boundaryScale(hue: HueVector, lv: number, cv: number): number {
	const lvt = toeInv(lv)
	const cvt = (cv * lvt) / lv

	const scale = oklabToRgb(oklab(lvt, hue.a * cvt, hue.b * cvt))
	return Math.cbrt(1 / maxChannel(scale.r, scale.g, scale.b, 0))
}

export function okhsvToOklab(color: Okhsv): Oklab {
	const { h, s, v } = color

	if (v === 0) {
		return oklab(0, 0, 0)
	}

	const hue = hueVector(h)
	const { s: sMax, t: tMax } = getStMax(hue)
	const k = 1 - OKHSV_S0 / sMax

	// Lightness and chroma at v = 1, as if the gamut were a triangle
	const denominator = OKHSV_S0 + tMax - tMax * k * s
	const lv = 1 - (s * OKHSV_S0) / denominator
	const cv = (s * tMax * OKHSV_S0) / denominator

	const lTri = v * lv
	const cTri = v * cv

	const L = toeInv(lTri)
	const C = (cTri * L) / lTri

	const scale = boundaryScale(hue, lv, cv)

	return oklab(L * scale, C * scale * hue.a, C * scale * hue.b)
}

export function oklabToOkhsv(color: Oklab): Okhsv {
	const C = chromaOf(color)

	if (C < ACHROMATIC_THRESHOLD) {
		return okhsv(0, 0, toe(color.l))
	}

	const hue = { a: color.a / C, b: color.b / C }
	const { s: sMax, t: tMax } = getStMax(hue)
	const k = 1 - OKHSV_S0 / sMax

	// Project along the ray from black onto the triangle's upper edge
	const t = tMax / (C + color.l * tMax)
	const lv = t * color.l
	const cv = t * C

	// Undo the boundary rescale, then the toe
	const scale = boundaryScale(hue, lv, cv)
	const v = toe(color.l / scale) / lv
	const s = ((OKHSV_S0 + tMax) * cv) / (tMax * OKHSV_S0 + tMax * k * cv)

	return okhsv(hueOf(color.a, color.b), s, v)
}
