/**
 * Error taxonomy shared by every curve and math primitive.
 *
 * Nothing in this library returns a sentinel on failure: bad input and
 * numeric domain violations are thrown as one of the two kinds below, and
 * state is never mutated by an operation that throws.
 */

export type BondingCurveErrorKind = "InvalidInput" | "CalculationError";

/**
 * Base class for all errors thrown by this library
 */
export abstract class BondingCurveError extends Error {
  abstract readonly kind: BondingCurveErrorKind;

  protected constructor(prefix: string, detail: string) {
    super(`${prefix}: ${detail}`);
    this.name = new.target.name;
  }
}

/**
 * Malformed parameters, negative amounts, selling more than the supply,
 * or requests with no defined price
 */
export class InvalidInputError extends BondingCurveError {
  readonly kind = "InvalidInput" as const;

  constructor(detail: string) {
    super("Invalid input", detail);
  }
}

/**
 * Numeric domain violations and results outside the fixed-point range
 */
export class CalculationError extends BondingCurveError {
  readonly kind = "CalculationError" as const;

  constructor(detail: string) {
    super("Calculation error", detail);
  }
}

export function isBondingCurveError(value: unknown): value is BondingCurveError {
  return value instanceof BondingCurveError;
}
