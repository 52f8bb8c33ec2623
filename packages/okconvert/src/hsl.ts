import { hsl, srgb } from './color.ts'
import type { Hsl, Srgb } from './types.ts'
import { wrapHue } from './util.ts'

/**
 * Hue in turns of an sRGB color whose largest and smallest channels are known
 * to differ.
 */
export function hexconeHue(color: Srgb, max: number, delta: number): number {
	const { r, g, b } = color
	let sector: number
	if (max === r) {
		sector = (g - b) / delta + (g < b ? 6 : 0)
	} else if (max === g) {
		sector = (b - r) / delta + 2
	} else {
		sector = (r - g) / delta + 4
	}
	return wrapHue(sector / 6)
}

export function srgbToHsl(color: Srgb): Hsl {
	const { r, g, b } = color
	const max = Math.max(r, g, b)
	const min = Math.min(r, g, b)
	const l = (max + min) / 2

	if (max === min) {
		return hsl(0, 0, l)
	}

	const delta = max - min
	const s = l > 0.5 ? delta / (2 - max - min) : delta / (max + min)

	return hsl(hexconeHue(color, max, delta), s, l)
}

function hueToChannel(p: number, q: number, t: number): number {
	const x = wrapHue(t)
	if (x < 1 / 6) {
		return p + (q - p) * 6 * x
	}
	if (x < 1 / 2) {
		return q
	}
	if (x < 2 / 3) {
		return p + (q - p) * (2 / 3 - x) * 6
	}
	return p
}

export function hslToSrgb(color: Hsl): Srgb {
	const { h, s, l } = color

	if (s === 0) {
		return srgb(l, l, l)
	}

	const q = l < 0.5 ? l * (1 + s) : l + s - l * s
	const p = 2 * l - q

	return srgb(hueToChannel(p, q, h + 1 / 3), hueToChannel(p, q, h), hueToChannel(p, q, h - 1 / 3))
}
