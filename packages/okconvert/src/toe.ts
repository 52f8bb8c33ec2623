import { TOE_K1, TOE_K2, TOE_K3 } from './constants.ts'

/**
 * Map oklab lightness to a lightness estimate that tracks CIE L* near black.
 * Solves `y² + (K1 - K3 x) y - K2 K3 x = 0` for its non-negative root.
 */
export function toe(x: number): number {
	const u = TOE_K3 * x - TOE_K1
	return 0.5 * (u + Math.sqrt(u * u + 4 * TOE_K2 * TOE_K3 * x))
}

/**
 * Inverse of {@link toe}.
 */
export function toeInv(x: number): number {
	return (x * x + TOE_K1 * x) / (TOE_K3 * (x + TOE_K2))
}
