/**
 * Conversion between any two representations.
 *
 * Every representation belongs to one of three families, each with a hub:
 * srgb (srgb, hsl, hsv), rgb, and oklab (oklab, okhsl, okhsv). A color is
 * first brought to its family's hub by a direct formula and then converted
 * with that hub's table.
 */

import { isSpace } from './color.ts'
import { hslToSrgb, srgbToHsl } from './hsl.ts'
import { hsvToSrgb, srgbToHsv } from './hsv.ts'
import { okhslToOklab, oklabToOkhsl } from './okhsl.ts'
import { okhsvToOklab, oklabToOkhsv } from './okhsv.ts'
import { oklabToRgb, rgbToOklab } from './oklab.ts'
import { rgbToSrgb, srgbToRgb } from './transfer.ts'
import type {
	AnyColor,
	ColorBySpace,
	ColorSpace,
	GamutOptions,
	Hsl,
	Hsv,
	Okhsl,
	Okhsv,
	Oklab,
	Rgb,
	Srgb,
} from './types.ts'

type ConverterTable<From> = { readonly [S in ColorSpace]: (color: From) => ColorBySpace[S] }

const fromSrgb: ConverterTable<Srgb> = {
	srgb: (color) => color,
	rgb: srgbToRgb,
	oklab: (color) => rgbToOklab(srgbToRgb(color)),
	okhsl: (color) => oklabToOkhsl(rgbToOklab(srgbToRgb(color))),
	okhsv: (color) => oklabToOkhsv(rgbToOklab(srgbToRgb(color))),
	hsl: srgbToHsl,
	hsv: srgbToHsv,
}

const fromRgb: ConverterTable<Rgb> = {
	srgb: rgbToSrgb,
	rgb: (color) => color,
	oklab: rgbToOklab,
	okhsl: (color) => oklabToOkhsl(rgbToOklab(color)),
	okhsv: (color) => oklabToOkhsv(rgbToOklab(color)),
	hsl: (color) => srgbToHsl(rgbToSrgb(color)),
	hsv: (color) => srgbToHsv(rgbToSrgb(color)),
}

const fromOklab: ConverterTable<Oklab> = {
	srgb: (color) => rgbToSrgb(oklabToRgb(color)),
	rgb: oklabToRgb,
	oklab: (color) => color,
	okhsl: oklabToOkhsl,
	okhsv: oklabToOkhsv,
	hsl: (color) => srgbToHsl(rgbToSrgb(oklabToRgb(color))),
	hsv: (color) => srgbToHsv(rgbToSrgb(oklabToRgb(color))),
}

/**
 * Convert a color in any representation to `target`.
 * A color already in `target` is returned unchanged.
 *
 * @example
 * ```ts
 * const lab = convert(srgb(1, 0.5, 0.25), 'oklab')
 * const back = convert(lab, 'srgb')
 * ```
 */
export function convert<S extends ColorSpace>(color: AnyColor, target: S): ColorBySpace[S] {
	if (isSpace(color, target)) {
		return color
	}

	switch (color.space) {
		case 'srgb':
			return fromSrgb[target](color)
		case 'hsl':
			return fromSrgb[target](hslToSrgb(color))
		case 'hsv':
			return fromSrgb[target](hsvToSrgb(color))
		case 'rgb':
			return fromRgb[target](color)
		case 'oklab':
			return fromOklab[target](color)
		case 'okhsl':
			return fromOklab[target](okhslToOklab(color))
		case 'okhsv':
			return fromOklab[target](okhsvToOklab(color))
	}
}

export function toSrgb(color: AnyColor): Srgb {
	return convert(color, 'srgb')
}

export function toRgb(color: AnyColor): Rgb {
	return convert(color, 'rgb')
}

export function toOklab(color: AnyColor): Oklab {
	return convert(color, 'oklab')
}

export function toOkhsl(color: AnyColor): Okhsl {
	return convert(color, 'okhsl')
}

export function toOkhsv(color: AnyColor): Okhsv {
	return convert(color, 'okhsv')
}

export function toHsl(color: AnyColor): Hsl {
	return convert(color, 'hsl')
}

export function toHsv(color: AnyColor): Hsv {
	return convert(color, 'hsv')
}

/**
 * Whether a color is displayable, i.e. its linear sRGB channels lie in [0, 1]
 * up to `epsilon`.
 */
export function inGamut(color: AnyColor, options: GamutOptions = {}): boolean {
	const epsilon = options.epsilon ?? 0
	const { r, g, b } = toRgb(color)
	return [r, g, b].every((channel) => channel >= -epsilon && channel <= 1 + epsilon)
}
