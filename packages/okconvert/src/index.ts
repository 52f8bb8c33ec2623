/**
 * okconvert - conversions between sRGB, linear RGB, Oklab, Okhsl, Okhsv, HSL and HSV
 */

export {
	approxEqual,
	COLOR_SPACES,
	hsl,
	hsv,
	isColorSpace,
	isSpace,
	okhsl,
	okhsv,
	oklab,
	rgb,
	srgb,
} from './color.ts'
export {
	convert,
	inGamut,
	toHsl,
	toHsv,
	toOkhsl,
	toOkhsv,
	toOklab,
	toRgb,
	toSrgb,
} from './convert.ts'
export { formatCss, parseCss } from './css.ts'
export {
	computeMaxSaturation,
	findCusp,
	findGamutIntersection,
	getCs,
	getStMax,
	getStMid,
	hueOf,
	hueVector,
} from './gamut.ts'
export { hslToSrgb, srgbToHsl } from './hsl.ts'
export { hsvToSrgb, srgbToHsv } from './hsv.ts'
export { AQUA, BLACK, BLUE, GREEN, PURPLE, RED, WHITE, YELLOW } from './named.ts'
export { okhslToOklab, oklabToOkhsl } from './okhsl.ts'
export { okhsvToOklab, oklabToOkhsv } from './okhsv.ts'
export { oklabToRgb, rgbToOklab } from './oklab.ts'
export { toe, toeInv } from './toe.ts'
export { rgbToSrgb, srgbToRgb } from './transfer.ts'
export { COMPONENT_NAMES, fromArray, fromTuple, parseColor, toTuple } from './tuple.ts'
export type {
	AnyColor,
	ApproxEqualOptions,
	ChromaAnchors,
	ColorBySpace,
	ColorSpace,
	ColorTuple,
	Cusp,
	FormatOptions,
	GamutOptions,
	Hsl,
	Hsv,
	HueVector,
	Okhsl,
	Okhsv,
	Oklab,
	Rgb,
	Srgb,
	StPair,
} from './types.ts'
