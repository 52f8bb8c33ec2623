import { hsv, srgb } from './color.ts'
import { hexconeHue } from './hsl.ts'
import type { Hsv, Srgb } from './types.ts'
import { wrapHue } from './util.ts'

export function srgbToHsv(color: Srgb): Hsv {
	const { r, g, b } = color
	const max = Math.max(r, g, b)
	const min = Math.min(r, g, b)
	const delta = max - min
	const s = max === 0 ? 0 : delta / max

	if (delta === 0) {
		return hsv(0, s, max)
	}

	return hsv(hexconeHue(color, max, delta), s, max)
}

export function hsvToSrgb(color: Hsv): Srgb {
	const { s, v } = color
	const h6 = wrapHue(color.h) * 6
	const sector = Math.floor(h6)
	const f = h6 - sector

	const p = v * (1 - s)
	const q = v * (1 - f * s)
	const t = v * (1 - (1 - f) * s)

	switch (sector) {
		case 0:
			return srgb(v, t, p)
		case 1:
			return srgb(q, v, p)
		case 2:
			return srgb(p, v, t)
		case 3:
			return srgb(p, q, v)
		case 4:
			return srgb(t, p, v)
		default:
			return srgb(v, p, q)
	}
}
