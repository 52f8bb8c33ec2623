/**
 * Fixed 3x3 transforms between linear sRGB, LMS and oklab.
 */

export type Vec3 = readonly [number, number, number]

/** Row-major 3x3 matrix */
export type Mat3 = readonly [Vec3, Vec3, Vec3]

/** Linear sRGB to LMS cone response */
export const RGB_TO_LMS: Mat3 = [
	[0.4122214708, 0.5363325363, 0.0514459929],
	[0.2119034982, 0.6806995451, 0.1073969566],
	[0.0883024619, 0.2817188376, 0.6299787005],
]

/** Nonlinear LMS (cube-rooted) to oklab */
export const LMS_TO_OKLAB: Mat3 = [
	[0.2104542553, 0.793617785, -0.0040720468],
	[1.9779984951, -2.428592205, 0.4505937099],
	[0.0259040371, 0.7827717662, -0.808675766],
]

/** Oklab to nonlinear LMS */
export const OKLAB_TO_LMS: Mat3 = [
	[1, 0.3963377774, 0.2158037573],
	[1, -0.1055613458, -0.0638541728],
	[1, -0.0894841775, -1.291485548],
]

/** LMS cone response to linear sRGB */
export const LMS_TO_RGB: Mat3 = [
	[4.0767416621, -3.3077115913, 0.2309699292],
	[-1.2684380046, 2.6097574011, -0.3413193965],
	[-0.0041960863, -0.7034186147, 1.707614701],
]

export function multiply(m: Mat3, v: Vec3): Vec3 {
	const [x, y, z] = v
	return [
		m[0][0] * x + m[0][1] * y + m[0][2] * z,
		m[1][0] * x + m[1][1] * y + m[1][2] * z,
		m[2][0] * x + m[2][1] * y + m[2][2] * z,
	]
}

/**
 * Dot product of a matrix row with a vector.
 */
export function dot(row: Vec3, v: Vec3): number {
	return row[0] * v[0] + row[1] * v[1] + row[2] * v[2]
}
