/**
 * Exponential (Power) Bonding Curve
 *
 * P(S) = c * S^n
 *
 * Cost of moving supply from a to b:
 *   c / (n + 1) * (b^(n+1) - a^(n+1))
 *
 * Fractional exponents go through exp/ln, which is undefined at zero, so a
 * zero supply is answered directly (0^(n+1) = 0) instead of through checkedPow.
 */

import { PRECISION } from "./constants";
import { SupplyCurve, assertNonNegative, assertPositive } from "./curve";
import { checkedAdd, checkedDiv, checkedMul, checkedPow, checkedSub } from "./math";

export interface ExponentialParams {
  /** c, scaling factor (> 0) */
  coefficient: bigint;
  /** n, steepness of the curve (>= 0) */
  exponent: bigint;
  /** Starting supply, default 0 */
  supply?: bigint;
}

export class ExponentialCurve extends SupplyCurve {
  readonly kind = "exponential" as const;
  readonly coefficient: bigint;
  readonly exponent: bigint;

  constructor(params: ExponentialParams) {
    assertPositive(params.coefficient, "coefficient", "ExponentialCurve");
    assertNonNegative(params.exponent, "exponent", "ExponentialCurve");
    super("ExponentialCurve", params.supply ?? 0n);
    this.coefficient = params.coefficient;
    this.exponent = params.exponent;
  }

  private power(base: bigint, exponent: bigint): bigint {
    if (base === 0n) {
      return exponent === 0n ? PRECISION : 0n;
    }
    return checkedPow(base, exponent);
  }

  priceAt(supply: bigint): bigint {
    return checkedMul(this.coefficient, this.power(supply, this.exponent));
  }

  integrate(lower: bigint, upper: bigint): bigint {
    const nPlusOne = checkedAdd(this.exponent, PRECISION);
    const delta = checkedSub(this.power(upper, nPlusOne), this.power(lower, nPlusOne));
    return checkedDiv(checkedMul(this.coefficient, delta), nPlusOne);
  }
}
