/**
 * Okhsl <-> oklab.
 *
 * Saturation is a two-segment rational map of chroma: the first 80% of the
 * range reaches `cMid`, the rest bends toward `cMax` on the gamut boundary.
 */

import { okhsl, oklab } from './color.ts'
import { ACHROMATIC_THRESHOLD, OKHSL_MID, OKHSL_MID_INV } from './constants.ts'
import { getCs, hueOf, hueVector } from './gamut.ts'
import { chromaOf } from './oklab.ts'
import { toe, toeInv } from './toe.ts'
import type { ChromaAnchors, Okhsl, Oklab } from './types.ts'

function lowerSegment(c0: number, cMid: number) {
	const k1 = OKHSL_MID * c0
	return { k1, k2: 1 - k1 / cMid }
}

function upperSegment({ c0, cMid, cMax }: ChromaAnchors) {
	const k1 = ((1 - OKHSL_MID) * cMid * cMid * OKHSL_MID_INV * OKHSL_MID_INV) / c0
	return { k1, k2: 1 - k1 / (cMax - cMid) }
}

function chromaToSaturation(C: number, anchors: ChromaAnchors): number {
	if (C < anchors.cMid) {
		const { k1, k2 } = lowerSegment(anchors.c0, anchors.cMid)
		const t = C / (k1 + k2 * C)
		return t * OKHSL_MID
	}

	const { k1, k2 } = upperSegment(anchors)
	const t = (C - anchors.cMid) / (k1 + k2 * (C - anchors.cMid))
	return OKHSL_MID + (1 - OKHSL_MID) * t
}

function saturationToChroma(s: number, anchors: ChromaAnchors): number {
	if (s < OKHSL_MID) {
		const { k1, k2 } = lowerSegment(anchors.c0, anchors.cMid)
		const t = OKHSL_MID_INV * s
		return (t * k1) / (1 - k2 * t)
	}

	const { k1, k2 } = upperSegment(anchors)
	const t = (s - OKHSL_MID) / (1 - OKHSL_MID)
	return anchors.cMid + (t * k1) / (1 - k2 * t)
}

export function oklabToOkhsl(color: Oklab): Okhsl {
	const L = color.l
	const C = chromaOf(color)

	if (C < ACHROMATIC_THRESHOLD) {
		return okhsl(0, 0, toe(L))
	}

	const hue = { a: color.a / C, b: color.b / C }
	const s = chromaToSaturation(C, getCs(L, hue))

	return okhsl(hueOf(color.a, color.b), s, toe(L))
}

export function okhslToOklab(color: Okhsl): Oklab {
	const { h, s, l } = color

	// The gamut slice degenerates to a point at both ends
	if (l === 1) {
		return oklab(1, 0, 0)
	}
	if (l === 0) {
		return oklab(0, 0, 0)
	}

	const hue = hueVector(h)
	const L = toeInv(l)
	const C = saturationToChroma(s, getCs(L, hue))

	return oklab(L, C * hue.a, C * hue.b)
}
