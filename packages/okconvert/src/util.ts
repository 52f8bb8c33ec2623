export function clamp(min: number, value: number, max: number): number {
	return Math.max(min, Math.min(max, value))
}

/**
 * Wrap a hue expressed in turns into [0, 1).
 */
export function wrapHue(h: number): number {
	const wrapped = h - Math.floor(h)
	return wrapped === 1 ? 0 : wrapped
}

/**
 * Largest of three channels, or `floor` when all of them are below it.
 */
export function maxChannel(r: number, g: number, b: number, floor = Number.NEGATIVE_INFINITY) {
	return Math.max(Math.max(r, g), Math.max(b, floor))
}
