/**
 * Shared constants for the Okhsl/Okhsv gamut engine.
 *
 * The polynomial and rational coefficients encode a fitted approximation of
 * the sRGB gamut boundary in oklab. They are calibration data, not tunables.
 */

// =============================================================================
// sRGB Transfer Function
// =============================================================================

/** Encoded value below which the sRGB curve is linear */
export const SRGB_DECODE_THRESHOLD = 0.04045

/** Linear value below which the sRGB curve is linear */
export const SRGB_ENCODE_THRESHOLD = 0.0031308

export const SRGB_LINEAR_SLOPE = 12.92
export const SRGB_GAMMA = 2.4
export const SRGB_OFFSET = 0.055

// =============================================================================
// Toe
// =============================================================================

/**
 * Parameters of the toe curve that maps oklab lightness to a lightness
 * estimate closer to CIE L*. `TOE_K3` is chosen so that `toe(1) = 1`.
 */
export const TOE_K1 = 0.206
export const TOE_K2 = 0.03
export const TOE_K3 = (1 + TOE_K1) / (1 + TOE_K2)

// =============================================================================
// Okhsl
// =============================================================================

/** Saturation at which the okhsl chroma curve passes through `cMid` */
export const OKHSL_MID = 0.8
export const OKHSL_MID_INV = 1.25

/**
 * Hue-independent slopes used for `c0`, roughly the average of the gamut
 * triangle slopes over all hues.
 */
export const OKHSL_C0_S = 0.4
export const OKHSL_C0_T = 0.8

/** Shrinks `cMid` so the middle of the saturation range stays inside the gamut */
export const OKHSL_MID_SCALE = 0.9

// =============================================================================
// Okhsv
// =============================================================================

/** Saturation slope of the okhsv triangle at `s = 0.5` */
export const OKHSV_S0 = 0.5

// =============================================================================
// Shared
// =============================================================================

/**
 * Chroma below which a color is treated as achromatic. Gray inputs pick up
 * chroma on the order of 1e-8 from matrix round-off.
 */
export const ACHROMATIC_THRESHOLD = 1e-7

/** Stand-in for a Halley step that moves away from the boundary */
export const HALLEY_REJECTED_STEP = Number.MAX_VALUE
