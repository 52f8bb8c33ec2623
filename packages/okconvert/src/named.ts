import { srgb } from './color.ts'
import type { Srgb } from './types.ts'

export const WHITE: Srgb = srgb(1, 1, 1)
export const BLACK: Srgb = srgb(0, 0, 0)
export const RED: Srgb = srgb(1, 0, 0)
export const YELLOW: Srgb = srgb(1, 1, 0)
export const GREEN: Srgb = srgb(0, 1, 0)
export const AQUA: Srgb = srgb(0, 1, 1)
export const BLUE: Srgb = srgb(0, 0, 1)
export const PURPLE: Srgb = srgb(1, 0, 1)
