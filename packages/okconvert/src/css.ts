/**
 * CSS color strings via colorjs.io.
 */

import _Color from 'colorjs.io'
import { srgb } from './color.ts'
import { convert } from './convert.ts'
import type { AnyColor, FormatOptions, Srgb } from './types.ts'
import { clamp } from './util.ts'

function coordinate(value: number | null | undefined): number {
	return typeof value === 'number' && !Number.isNaN(value) ? value : 0
}

/**
 * Parse any CSS color string colorjs.io understands into gamma-encoded sRGB.
 * Colors outside sRGB keep their out-of-range channels.
 */
export function parseCss(input: string): Srgb {
	let parsed: _Color
	try {
		parsed = new _Color(input)
	} catch (error) {
		throw new Error(`Invalid CSS color '${input}'.`, { cause: error })
	}

	const [r, g, b] = parsed.to('srgb').coords
	return srgb(coordinate(r), coordinate(g), coordinate(b))
}

/**
 * Serialize a color as a CSS sRGB color string.
 */
export function formatCss(color: AnyColor, options: FormatOptions = {}): string {
	const precision = options.precision ?? 4
	const { r, g, b } = convert(color, 'srgb')
	const coords: [number, number, number] = options.clamp
		? [clamp(0, r, 1), clamp(0, g, 1), clamp(0, b, 1)]
		: [r, g, b]

	return new _Color('srgb', coords).toString({ precision })
}
