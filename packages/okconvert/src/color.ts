/**
 * Color record factories and comparisons.
 */

import type {
	AnyColor,
	ApproxEqualOptions,
	ColorBySpace,
	ColorSpace,
	Hsl,
	Hsv,
	Okhsl,
	Okhsv,
	Oklab,
	Rgb,
	Srgb,
} from './types.ts'

export const COLOR_SPACES: readonly ColorSpace[] = [
	'srgb',
	'rgb',
	'oklab',
	'okhsl',
	'okhsv',
	'hsl',
	'hsv',
]

export function srgb(r = 0, g = 0, b = 0): Srgb {
	return { space: 'srgb', r, g, b }
}

export function rgb(r = 0, g = 0, b = 0): Rgb {
	return { space: 'rgb', r, g, b }
}

export function oklab(l = 0, a = 0, b = 0): Oklab {
	return { space: 'oklab', l, a, b }
}

export function okhsl(h = 0, s = 0, l = 0): Okhsl {
	return { space: 'okhsl', h, s, l }
}

export function okhsv(h = 0, s = 0, v = 0): Okhsv {
	return { space: 'okhsv', h, s, v }
}

export function hsl(h = 0, s = 0, l = 0): Hsl {
	return { space: 'hsl', h, s, l }
}

export function hsv(h = 0, s = 0, v = 0): Hsv {
	return { space: 'hsv', h, s, v }
}

export function isColorSpace(value: unknown): value is ColorSpace {
	return typeof value === 'string' && (COLOR_SPACES as readonly string[]).includes(value)
}

/**
 * Narrow a color to a specific representation.
 */
export function isSpace<S extends ColorSpace>(color: AnyColor, space: S): color is ColorBySpace[S] {
	return color.space === space
}

/**
 * The three components of a color in declaration order.
 */
export function components(color: AnyColor): [number, number, number] {
	switch (color.space) {
		case 'srgb':
		case 'rgb':
			return [color.r, color.g, color.b]
		case 'oklab':
			return [color.l, color.a, color.b]
		case 'okhsl':
		case 'hsl':
			return [color.h, color.s, color.l]
		case 'okhsv':
		case 'hsv':
			return [color.h, color.s, color.v]
	}
}

/**
 * Compare two colors component by component.
 * Colors in different spaces are never equal; convert first.
 */
export function approxEqual(x: AnyColor, y: AnyColor, options: ApproxEqualOptions = {}): boolean {
	const epsilon = options.epsilon ?? 1e-4
	if (x.space !== y.space) {
		return false
	}

	const [x0, x1, x2] = components(x)
	const [y0, y1, y2] = components(y)
	return (
		Math.abs(x0 - y0) <= epsilon && Math.abs(x1 - y1) <= epsilon && Math.abs(x2 - y2) <= epsilon
	)
}
