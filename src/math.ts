/**
 * Checked Fixed-Point Math
 *
 * Deterministic arithmetic on `bigint` values scaled by PRECISION (1e18).
 * Every primitive either returns an in-range result or throws
 * CalculationError; none of them saturates or wraps.
 *
 * ln and exp are evaluated at 36 fractional digits and truncated back to 18,
 * so results are identical on every platform.
 */

export {
  PRECISION,
  DECIMALS,
  MAX_FIXED,
  MIN_FIXED,
  MAX_EXP_INPUT,
  MIN_EXP_INPUT,
  LN2,
} from "./constants";

import {
  PRECISION,
  DECIMALS,
  EXTENDED_PRECISION,
  EXTENSION_FACTOR,
  LN2_EXTENDED,
  MAX_FIXED,
  MIN_FIXED,
  MAX_EXP_INPUT,
  MIN_EXP_INPUT,
} from "./constants";
import { CalculationError, InvalidInputError } from "./errors";

// ============================================
// Range Checks
// ============================================

function checked(value: bigint, operation: string): bigint {
  if (value > MAX_FIXED || value < MIN_FIXED) {
    throw new CalculationError(`${operation}: result outside fixed-point range`);
  }
  return value;
}

export function abs(x: bigint): bigint {
  return x < 0n ? -x : x;
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function max(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

// ============================================
// Basic Arithmetic
// ============================================

export function checkedAdd(a: bigint, b: bigint): bigint {
  return checked(a + b, "checkedAdd");
}

export function checkedSub(a: bigint, b: bigint): bigint {
  return checked(a - b, "checkedSub");
}

/**
 * a * b, truncated toward zero
 */
export function checkedMul(a: bigint, b: bigint): bigint {
  return checked((a * b) / PRECISION, "checkedMul");
}

/**
 * a / b, truncated toward zero
 * @throws CalculationError if b is zero
 */
export function checkedDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new CalculationError("checkedDiv: division by zero");
  }
  return checked((a * PRECISION) / b, "checkedDiv");
}

/**
 * a * b / c on raw values with a single truncation, for ratios whose
 * intermediate products would lose precision if rescaled step by step
 * @throws CalculationError if c is zero
 */
export function checkedMulDiv(a: bigint, b: bigint, c: bigint): bigint {
  if (c === 0n) {
    throw new CalculationError("checkedMulDiv: division by zero");
  }
  return checked((a * b) / c, "checkedMulDiv");
}

// ============================================
// Transcendental Functions
// ============================================

function bitLength(x: bigint): number {
  return x.toString(2).length;
}

/**
 * Natural logarithm
 *
 * Reduces x = m * 2^k with m in [1, 2), then
 * ln(m) = 2 * atanh(z) = 2 * (z + z^3/3 + z^5/5 + ...) with z = (m-1)/(m+1) < 1/3
 *
 * @throws CalculationError if x <= 0
 */
export function checkedLn(x: bigint): bigint {
  if (x <= 0n) {
    throw new CalculationError(
      `checkedLn: cannot take logarithm of non-positive value ${formatFixed(x)}`
    );
  }

  let m = x * EXTENSION_FACTOR;
  let k = BigInt(bitLength(m) - bitLength(EXTENDED_PRECISION));
  m = k >= 0n ? m >> k : m << -k;

  // bit lengths only bound the shift to within one position
  while (m >= 2n * EXTENDED_PRECISION) {
    m >>= 1n;
    k += 1n;
  }
  while (m < EXTENDED_PRECISION) {
    m <<= 1n;
    k -= 1n;
  }

  const z = ((m - EXTENDED_PRECISION) * EXTENDED_PRECISION) / (m + EXTENDED_PRECISION);
  const z2 = (z * z) / EXTENDED_PRECISION;

  let sum = 0n;
  let term = z;
  for (let i = 1n; term !== 0n; i += 2n) {
    sum += term / i;
    term = (term * z2) / EXTENDED_PRECISION;
  }

  return checked((k * LN2_EXTENDED + 2n * sum) / EXTENSION_FACTOR, "checkedLn");
}

/**
 * Exponential function
 *
 * Reduces x = k * ln2 + r with |r| < ln2, sums the Taylor series of e^r,
 * then scales by 2^k.
 *
 * @throws CalculationError if x > MAX_EXP_INPUT
 */
export function checkedExp(x: bigint): bigint {
  if (x > MAX_EXP_INPUT) {
    throw new CalculationError(
      `checkedExp: exponent ${formatFixed(x)} overflows fixed-point range`
    );
  }
  if (x < MIN_EXP_INPUT) return 0n;

  const xExt = x * EXTENSION_FACTOR;
  const k = xExt / LN2_EXTENDED;
  const r = xExt - k * LN2_EXTENDED;

  let sum = EXTENDED_PRECISION;
  let term = EXTENDED_PRECISION;
  for (let i = 1n; ; i++) {
    term = (term * r) / (EXTENDED_PRECISION * i);
    if (term === 0n) break;
    sum += term;
  }

  const scaled = k >= 0n ? sum << k : sum >> -k;
  return checked(scaled / EXTENSION_FACTOR, "checkedExp");
}

function integerPow(base: bigint, n: bigint): bigint {
  if (n < 0n) {
    return checkedDiv(PRECISION, integerPow(base, -n));
  }

  let result = PRECISION;
  let b = base;
  let e = n;
  while (e > 0n) {
    if ((e & 1n) === 1n) {
      result = checkedMul(result, b);
    }
    e >>= 1n;
    if (e > 0n) {
      b = checkedMul(b, b);
    }
  }
  return result;
}

/**
 * base ^ exponent
 *
 * Whole exponents use square-and-multiply with checked multiplication.
 * Fractional exponents use exp(exponent * ln(base)) and so need base > 0.
 *
 * @throws CalculationError on a non-positive base with a fractional exponent,
 *   or when the result leaves the fixed-point range
 */
export function checkedPow(base: bigint, exponent: bigint): bigint {
  if (exponent % PRECISION === 0n) {
    return integerPow(base, exponent / PRECISION);
  }
  if (base <= 0n) {
    throw new CalculationError(
      `checkedPow: cannot raise non-positive base ${formatFixed(base)} to fractional power`
    );
  }
  return checkedExp(checkedMul(exponent, checkedLn(base)));
}

/**
 * Square root, truncated toward zero
 * @throws CalculationError if x < 0
 */
export function checkedSqrt(x: bigint): bigint {
  if (x < 0n) {
    throw new CalculationError(
      `checkedSqrt: cannot take square root of negative value ${formatFixed(x)}`
    );
  }
  const n = x * PRECISION;
  if (n < 2n) return n;

  // Newton's method from an upper bound converges monotonically downwards
  let y = 1n << BigInt(Math.ceil(bitLength(n) / 2));
  for (;;) {
    const next = (y + n / y) / 2n;
    if (next >= y) return y;
    y = next;
  }
}

// ============================================
// Decimal Conversion
// ============================================

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?$/;

/**
 * Parse a decimal string ("0.01", "-3", "1000") into fixed point
 * @throws InvalidInputError on malformed input or more than 18 fractional digits
 */
export function parseFixed(value: string): bigint {
  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidInputError(`parseFixed: "${value}" is not a decimal number`);
  }
  const [, sign, whole, fraction = ""] = match;
  if (fraction.length > DECIMALS) {
    throw new InvalidInputError(
      `parseFixed: "${value}" has more than ${DECIMALS} fractional digits`
    );
  }
  const raw = BigInt(whole) * PRECISION + BigInt(fraction.padEnd(DECIMALS, "0"));
  return checked(sign ? -raw : raw, "parseFixed");
}

/**
 * Format a fixed-point value as a decimal string
 *
 * @param value - Fixed-point value
 * @param decimals - Fractional digits to keep (truncated), default all 18
 * @returns Decimal string with trailing zeros removed
 */
export function formatFixed(value: bigint, decimals: number = DECIMALS): string {
  const sign = value < 0n ? "-" : "";
  const magnitude = abs(value);
  const whole = magnitude / PRECISION;
  const fraction = (magnitude % PRECISION)
    .toString()
    .padStart(DECIMALS, "0")
    .slice(0, Math.max(0, Math.min(decimals, DECIMALS)))
    .replace(/0+$/, "");
  const body = fraction ? `${whole}.${fraction}` : whole.toString();
  return body === "0" ? body : `${sign}${body}`;
}
