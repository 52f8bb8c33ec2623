/**
 * Marshaling between color records, component tuples and serialized values.
 */

import { components, hsl, hsv, isColorSpace, okhsl, okhsv, oklab, rgb, srgb } from './color.ts'
import type { AnyColor, ColorBySpace, ColorSpace, ColorTuple } from './types.ts'

type TupleFactories = {
	readonly [S in ColorSpace]: (x: number, y: number, z: number) => ColorBySpace[S]
}

const factories: TupleFactories = { srgb, rgb, oklab, okhsl, okhsv, hsl, hsv }

/**
 * Component names of each representation, in tuple order.
 */
export const COMPONENT_NAMES = {
	srgb: ['r', 'g', 'b'],
	rgb: ['r', 'g', 'b'],
	oklab: ['l', 'a', 'b'],
	okhsl: ['h', 's', 'l'],
	okhsv: ['h', 's', 'v'],
	hsl: ['h', 's', 'l'],
	hsv: ['h', 's', 'v'],
} as const satisfies { readonly [S in ColorSpace]: readonly [string, string, string] }

export function toTuple(color: AnyColor): ColorTuple {
	return components(color)
}

export function fromTuple<S extends ColorSpace>(space: S, tuple: ColorTuple): ColorBySpace[S] {
	return factories[space](tuple[0], tuple[1], tuple[2])
}

function isFiniteNumber(value: unknown): value is number {
	return typeof value === 'number' && Number.isFinite(value)
}

/**
 * Build a color from an untyped array, e.g. one read from JSON.
 * Throws unless the array holds exactly three finite numbers.
 */
export function fromArray<S extends ColorSpace>(space: S, values: readonly unknown[]): ColorBySpace[S] {
	const [x, y, z] = values
	if (values.length !== 3 || !isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(z)) {
		throw new Error(
			`Invalid ${space} components ${JSON.stringify(values)}. Expected exactly three finite numbers.`,
		)
	}
	return fromTuple(space, [x, y, z])
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null
}

/**
 * Validate a serialized color record, such as the result of `JSON.parse` on a
 * value produced by `JSON.stringify(color)`.
 */
export function parseColor(value: unknown): AnyColor {
	if (!isRecord(value)) {
		throw new Error(`Invalid color ${JSON.stringify(value)}. Expected an object.`)
	}

	const space = value.space
	if (!isColorSpace(space)) {
		throw new Error(
			`Unknown color space ${JSON.stringify(space)}. Expected one of: ${Object.keys(COMPONENT_NAMES).join(', ')}.`,
		)
	}

	const names: readonly string[] = COMPONENT_NAMES[space]
	const values = names.map((name) => value[name])
	if (!values.every(isFiniteNumber)) {
		throw new Error(
			`Invalid ${space} color ${JSON.stringify(value)}. Expected finite numbers for ${names.join(', ')}.`,
		)
	}

	return fromArray(space, values)
}
