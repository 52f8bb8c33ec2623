/**
 * Shared type definitions for okconvert.
 */

/**
 * Gamma-encoded sRGB. Channels are nominally 0-1; values outside that range
 * describe out-of-gamut colors and are carried through unchanged.
 */
export interface Srgb {
	readonly space: 'srgb'
	readonly r: number
	readonly g: number
	readonly b: number
}

/**
 * Linear-light sRGB.
 */
export interface Rgb {
	readonly space: 'rgb'
	readonly r: number
	readonly g: number
	readonly b: number
}

export interface Oklab {
	readonly space: 'oklab'
	readonly l: number
	readonly a: number
	readonly b: number
}

/**
 * Okhsl. Saturation and lightness are relative to the sRGB gamut: `s = 1`
 * always lands on the gamut boundary for the given lightness.
 */
export interface Okhsl {
	readonly space: 'okhsl'
	/** Hue as a fraction of a full turn */
	readonly h: number
	readonly s: number
	readonly l: number
}

export interface Okhsv {
	readonly space: 'okhsv'
	/** Hue as a fraction of a full turn */
	readonly h: number
	readonly s: number
	readonly v: number
}

export interface Hsl {
	readonly space: 'hsl'
	/** Hue as a fraction of a full turn */
	readonly h: number
	readonly s: number
	readonly l: number
}

export interface Hsv {
	readonly space: 'hsv'
	/** Hue as a fraction of a full turn */
	readonly h: number
	readonly s: number
	readonly v: number
}

export interface ColorBySpace {
	readonly srgb: Srgb
	readonly rgb: Rgb
	readonly oklab: Oklab
	readonly okhsl: Okhsl
	readonly okhsv: Okhsv
	readonly hsl: Hsl
	readonly hsv: Hsv
}

export type ColorSpace = keyof ColorBySpace

export type AnyColor = ColorBySpace[ColorSpace]

/**
 * The three components of a color in declaration order.
 */
export type ColorTuple = readonly [number, number, number]

/**
 * Unit vector in the oklab a/b plane for a hue angle.
 */
export interface HueVector {
	readonly a: number
	readonly b: number
}

/**
 * The point of maximum chroma of the sRGB gamut slice at a fixed hue.
 */
export interface Cusp {
	readonly lightness: number
	readonly chroma: number
}

/**
 * Slopes of the two edges of a gamut slice triangle.
 * `s` is chroma over lightness (toward black), `t` is chroma over
 * `1 - lightness` (toward white).
 */
export interface StPair {
	readonly s: number
	readonly t: number
}

/**
 * Characteristic chromas at a lightness, used as the control points of the
 * okhsl saturation curve.
 */
export interface ChromaAnchors {
	readonly c0: number
	readonly cMid: number
	readonly cMax: number
}

export interface ApproxEqualOptions {
	/**
	 * Largest accepted absolute difference per component.
	 * @default 1e-4
	 */
	readonly epsilon?: number
}

export interface GamutOptions {
	/**
	 * Slack allowed on each side of the 0-1 linear RGB range.
	 * @default 0
	 */
	readonly epsilon?: number
}

export interface FormatOptions {
	/**
	 * Significant digits of each serialized component.
	 * @default 4
	 */
	readonly precision?: number
	/**
	 * Clamp the color into the sRGB gamut before serializing.
	 * @default false
	 */
	readonly clamp?: boolean
}
