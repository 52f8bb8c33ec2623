/**
 * sRGB gamut hull queries in oklab.
 *
 * For a fixed hue the gamut slice in lightness/chroma is close to a triangle
 * with corners at black, white and the cusp. The lower edge (black to cusp)
 * is exactly straight; the upper edge (cusp to white) bulges slightly and is
 * corrected with one Halley step.
 */

import { oklab } from './color.ts'
import {
	HALLEY_REJECTED_STEP,
	OKHSL_C0_S,
	OKHSL_C0_T,
	OKHSL_MID_SCALE,
} from './constants.ts'
import { dot, LMS_TO_RGB, OKLAB_TO_LMS, type Vec3 } from './matrix.ts'
import { oklabToRgb } from './oklab.ts'
import type { ChromaAnchors, Cusp, HueVector, StPair } from './types.ts'
import { maxChannel, wrapHue } from './util.ts'

/**
 * Polynomial fit of the maximum saturation for hues where one channel clips
 * first, together with the LMS-to-RGB row of that channel.
 */
interface SaturationFit {
	readonly k: readonly [number, number, number, number, number]
	readonly row: Vec3
}

const RED_FIT: SaturationFit = {
	k: [1.19086277, 1.76576728, 0.59662641, 0.75515197, 0.56771245],
	row: LMS_TO_RGB[0],
}

const GREEN_FIT: SaturationFit = {
	k: [0.73956515, -0.45954404, 0.08285427, 0.1254107, 0.14503204],
	row: LMS_TO_RGB[1],
}

const BLUE_FIT: SaturationFit = {
	k: [1.35733652, -0.00915799, -1.1513021, -0.50559606, 0.00692167],
	row: LMS_TO_RGB[2],
}

export function hueVector(h: number): HueVector {
	return { a: Math.cos(2 * Math.PI * h), b: Math.sin(2 * Math.PI * h) }
}

/**
 * Hue in turns of an a/b direction, the inverse of {@link hueVector}.
 */
export function hueOf(a: number, b: number): number {
	return wrapHue(0.5 + (0.5 * Math.atan2(-b, -a)) / Math.PI)
}

/**
 * Change of the three nonlinear LMS components per unit of chroma along a hue.
 */
function lmsChromaSlopes(hue: HueVector): Vec3 {
	return [
		OKLAB_TO_LMS[0][1] * hue.a + OKLAB_TO_LMS[0][2] * hue.b,
		OKLAB_TO_LMS[1][1] * hue.a + OKLAB_TO_LMS[1][2] * hue.b,
		OKLAB_TO_LMS[2][1] * hue.a + OKLAB_TO_LMS[2][2] * hue.b,
	]
}

function saturationFit(hue: HueVector): SaturationFit {
	const { a, b } = hue
	if (-1.88170328 * a - 0.80936493 * b > 1) {
		return RED_FIT
	}
	if (1.81444104 * a - 1.19445276 * b > 1) {
		return GREEN_FIT
	}
	return BLUE_FIT
}

/**
 * Maximum saturation `S = C / L` reachable at a hue, i.e. the slope of the
 * line from black through the cusp.
 */
export function computeMaxSaturation(hue: HueVector): number {
	const { a, b } = hue
	const { k, row } = saturationFit(hue)
	const [kl, km, ks] = lmsChromaSlopes(hue)

	const S = k[0] + k[1] * a + k[2] * b + k[3] * a * a + k[4] * a * b

	// One Halley step on the clipping channel, which is 0 at the true maximum
	const l_ = 1 + S * kl
	const m_ = 1 + S * km
	const s_ = 1 + S * ks

	const f = dot(row, [l_ * l_ * l_, m_ * m_ * m_, s_ * s_ * s_])
	const f1 = dot(row, [3 * kl * l_ * l_, 3 * km * m_ * m_, 3 * ks * s_ * s_])
	const f2 = dot(row, [6 * kl * kl * l_, 6 * km * km * m_, 6 * ks * ks * s_])

	return S - (f * f1) / (f1 * f1 - 0.5 * f * f2)
}

/**
 * Find the cusp of the gamut slice at a hue.
 */
export function findCusp(hue: HueVector): Cusp {
	const sCusp = computeMaxSaturation(hue)

	// Linear RGB scales with L³ along the black-cusp line
	const atMax = oklabToRgb(oklab(1, sCusp * hue.a, sCusp * hue.b))
	const lightness = Math.cbrt(1 / maxChannel(atMax.r, atMax.g, atMax.b))

	return { lightness, chroma: lightness * sCusp }
}

/**
 * Find `t` such that the point `(l0 * (1 - t) + t * l1, t * c1)` lies on the
 * gamut boundary.
 *
 * @param hue - Direction in the a/b plane
 * @param l1 - Lightness of the ray's far end
 * @param c1 - Chroma of the ray's far end
 * @param l0 - Lightness of the ray's origin (chroma 0)
 * @param cusp - Cusp for this hue, when the caller already has it
 */
export function findGamutIntersection(
	hue: HueVector,
	l1: number,
	c1: number,
	l0: number,
	cusp: Cusp = findCusp(hue),
): number {
	if ((l1 - l0) * cusp.chroma - (cusp.lightness - l0) * c1 <= 0) {
		// Lower half: the black-cusp edge is exact
		return (cusp.chroma * l0) / (c1 * cusp.lightness + cusp.chroma * (l0 - l1))
	}

	// Upper half: intersect with the triangle first
	const t = (cusp.chroma * (l0 - 1)) / (c1 * (cusp.lightness - 1) + cusp.chroma * (l0 - l1))

	const dL = l1 - l0
	const dC = c1
	const [kl, km, ks] = lmsChromaSlopes(hue)

	const ldt = dL + dC * kl
	const mdt = dL + dC * km
	const sdt = dL + dC * ks

	const L = l0 * (1 - t) + t * l1
	const C = t * c1

	const l_ = L + C * kl
	const m_ = L + C * km
	const s_ = L + C * ks

	const lms: Vec3 = [l_ * l_ * l_, m_ * m_ * m_, s_ * s_ * s_]
	const lmsDt: Vec3 = [3 * ldt * l_ * l_, 3 * mdt * m_ * m_, 3 * sdt * s_ * s_]
	const lmsDt2: Vec3 = [6 * ldt * ldt * l_, 6 * mdt * mdt * m_, 6 * sdt * sdt * s_]

	const steps = LMS_TO_RGB.map((row) => {
		const f = dot(row, lms) - 1
		const f1 = dot(row, lmsDt)
		const f2 = dot(row, lmsDt2)

		const u = f1 / (f1 * f1 - 0.5 * f * f2)
		return u >= 0 ? -f * u : HALLEY_REJECTED_STEP
	})

	return t + Math.min(...steps)
}

/**
 * Slopes of the gamut triangle at a hue.
 */
export function getStMax(hue: HueVector, cusp: Cusp = findCusp(hue)): StPair {
	const { lightness: L, chroma: C } = cusp
	return { s: C / L, t: C / (1 - L) }
}

/**
 * Smooth approximation of the slopes of a triangle inscribed in the gamut
 * slice, used for the middle of the okhsl saturation range.
 */
export function getStMid(hue: HueVector): StPair {
	const { a, b } = hue

	const s =
		0.11516993 +
		1 /
			(7.4477897 +
				4.1590124 * b +
				a *
					(-2.19557347 +
						1.75198401 * b +
						a *
							(-2.13704948 -
								10.02301043 * b +
								a * (-4.24894561 + 5.38770819 * b + 4.69891013 * a))))

	const t =
		0.11239642 +
		1 /
			(1.6132032 -
				0.68124379 * b +
				a *
					(0.40370612 +
						0.90148123 * b +
						a *
							(-0.27087943 +
								0.6122399 * b +
								a * (0.00299215 - 0.45399568 * b - 0.14661872 * a))))

	return { s, t }
}

/**
 * Characteristic chromas at lightness `l` for a hue: `c0` is hue-independent,
 * `cMid` sits inside the gamut and `cMax` is on the boundary.
 */
export function getCs(l: number, hue: HueVector, cusp: Cusp = findCusp(hue)): ChromaAnchors {
	const cMax = findGamutIntersection(hue, l, 1, l, cusp)
	const stMax = getStMax(hue, cusp)

	// Compensates for the curved upper edge of the gamut
	const k = cMax / Math.min(l * stMax.s, (1 - l) * stMax.t)

	const stMid = getStMid(hue)
	const cMid = OKHSL_MID_SCALE * k * softMin4(l * stMid.s, (1 - l) * stMid.t)
	const c0 = softMin2(l * OKHSL_C0_S, (1 - l) * OKHSL_C0_T)

	return { c0, cMid, cMax }
}

function softMin2(x: number, y: number): number {
	return Math.sqrt(1 / (1 / (x * x) + 1 / (y * y)))
}

function softMin4(x: number, y: number): number {
	return Math.sqrt(Math.sqrt(1 / (1 / (x * x * x * x) + 1 / (y * y * y * y))))
}
