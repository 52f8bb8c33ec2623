/**
 * sRGB transfer function between gamma-encoded and linear-light channels.
 */

import { rgb, srgb } from './color.ts'
import {
	SRGB_DECODE_THRESHOLD,
	SRGB_ENCODE_THRESHOLD,
	SRGB_GAMMA,
	SRGB_LINEAR_SLOPE,
	SRGB_OFFSET,
} from './constants.ts'
import type { Rgb, Srgb } from './types.ts'

export function decodeChannel(x: number): number {
	if (x >= SRGB_DECODE_THRESHOLD) {
		return ((x + SRGB_OFFSET) / (1 + SRGB_OFFSET)) ** SRGB_GAMMA
	}
	return x / SRGB_LINEAR_SLOPE
}

export function encodeChannel(x: number): number {
	if (x >= SRGB_ENCODE_THRESHOLD) {
		return (1 + SRGB_OFFSET) * x ** (1 / SRGB_GAMMA) - SRGB_OFFSET
	}
	return SRGB_LINEAR_SLOPE * x
}

export function srgbToRgb(color: Srgb): Rgb {
	return rgb(decodeChannel(color.r), decodeChannel(color.g), decodeChannel(color.b))
}

export function rgbToSrgb(color: Rgb): Srgb {
	return srgb(encodeChannel(color.r), encodeChannel(color.g), encodeChannel(color.b))
}
