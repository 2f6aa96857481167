/**
 * Shared constants used across the bonding curve implementations.
 *
 * Every quantity is a signed fixed-point `bigint` scaled by PRECISION.
 */

// ============================================
// Precision Constants
// ============================================

/** Fixed-point scale: 18 fractional decimal digits (1e18) */
export const PRECISION = 10n ** 18n;

/** Number of fractional decimal digits carried by PRECISION */
export const DECIMALS = 18;

/** Internal scale used by ln/exp series (1e36) */
export const EXTENDED_PRECISION = 10n ** 36n;

/** Factor between EXTENDED_PRECISION and PRECISION */
export const EXTENSION_FACTOR = EXTENDED_PRECISION / PRECISION;

// ============================================
// Representable Range (signed 256-bit)
// ============================================

/** Largest raw fixed-point value (2^255 - 1) */
export const MAX_FIXED = 2n ** 255n - 1n;

/** Smallest raw fixed-point value (-2^255) */
export const MIN_FIXED = -(2n ** 255n);

// ============================================
// Transcendental Bounds
// ============================================

/** ln(2) at 36 decimals */
export const LN2_EXTENDED = 693147180559945309417232121458176568n;

/** ln(2) in fixed point */
export const LN2 = LN2_EXTENDED / EXTENSION_FACTOR;

/** Largest x for which e^x stays below MAX_FIXED (~135.306) */
export const MAX_EXP_INPUT = 135_305999368893231588n;

/** Smallest x for which e^x is at least one unit; below it e^x truncates to zero (~-41.447) */
export const MIN_EXP_INPUT = -41_446531673892822312n;

/** Bound on |k(S - m)| for the sigmoid curve; beyond it e^-|z| truncates to zero */
export const MAX_SIGMOID_EXPONENT = -MIN_EXP_INPUT;

// ============================================
// Logging
// ============================================

/** Environment variable consulted for the log level */
export const LOG_LEVEL_ENV = "BONDING_CURVE_LOG_LEVEL";

/** Level used when LOG_LEVEL_ENV is unset */
export const DEFAULT_LOG_LEVEL = "warn";
