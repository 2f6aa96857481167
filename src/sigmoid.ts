/**
 * Sigmoid Bonding Curve
 *
 * P(S) = M / (1 + e^(-k(S - m)))
 *
 * With z = k(S - m) the antiderivative is (M/k) * ln(1 + e^z), so the cost of
 * moving supply from a to b is
 *   (M/k) * [ln(1 + e^(k(b-m))) - ln(1 + e^(k(a-m)))]
 *
 * Only e^(-|z|) is ever evaluated, using
 *   1 / (1 + e^-z)   = e^z / (1 + e^z)
 *   ln(1 + e^z)      = z + ln(1 + e^-z)
 * so nothing overflows inside the bound. |z| beyond MAX_SIGMOID_EXPONENT, where
 * e^-|z| would truncate to zero, is rejected rather than saturated, and so is a
 * price that truncates onto either asymptote.
 */

import { MAX_SIGMOID_EXPONENT, PRECISION } from "./constants";
import { SupplyCurve, assertPositive } from "./curve";
import { CalculationError } from "./errors";
import {
  abs,
  checkedAdd,
  checkedDiv,
  checkedExp,
  checkedLn,
  checkedMul,
  checkedMulDiv,
  checkedSub,
  formatFixed,
} from "./math";

export interface SigmoidParams {
  /** M, upper asymptote of the price (> 0) */
  maxPrice: bigint;
  /** k, how sharply the price rises around the midpoint (> 0) */
  steepness: bigint;
  /** m, supply at which the price is M/2 */
  midpoint: bigint;
  /** Starting supply, default 0 */
  supply?: bigint;
}

export class SigmoidCurve extends SupplyCurve {
  readonly kind = "sigmoid" as const;
  readonly maxPrice: bigint;
  readonly steepness: bigint;
  readonly midpoint: bigint;

  constructor(params: SigmoidParams) {
    assertPositive(params.maxPrice, "maxPrice", "SigmoidCurve");
    assertPositive(params.steepness, "steepness", "SigmoidCurve");
    super("SigmoidCurve", params.supply ?? 0n);
    this.maxPrice = params.maxPrice;
    this.steepness = params.steepness;
    this.midpoint = params.midpoint;
  }

  /**
   * z = k(S - m), bounded so that e^-|z| is at least one unit
   * @throws CalculationError if |z| > MAX_SIGMOID_EXPONENT
   */
  private exponentAt(supply: bigint): bigint {
    const z = checkedMul(this.steepness, checkedSub(supply, this.midpoint));
    if (abs(z) > MAX_SIGMOID_EXPONENT) {
      throw new CalculationError(
        `sigmoid: exponent ${formatFixed(z)} at supply ${formatFixed(supply)} is out of range`
      );
    }
    return z;
  }

  // ln(1 + e^z)
  private softplus(z: bigint): bigint {
    const tail = checkedLn(checkedAdd(PRECISION, checkedExp(-abs(z))));
    return z > 0n ? checkedAdd(z, tail) : tail;
  }

  /**
   * @throws CalculationError if the price is not strictly between 0 and maxPrice
   */
  priceAt(supply: bigint): bigint {
    const z = this.exponentAt(supply);
    const e = checkedExp(-abs(z));
    const denominator = checkedAdd(PRECISION, e);
    const price =
      z >= 0n
        ? checkedMulDiv(this.maxPrice, PRECISION, denominator)
        : checkedMulDiv(this.maxPrice, e, denominator);
    if (price <= 0n || price >= this.maxPrice) {
      throw new CalculationError(
        `sigmoid: price at supply ${formatFixed(supply)} is below fixed-point resolution`
      );
    }
    return price;
  }

  integrate(lower: bigint, upper: bigint): bigint {
    const delta = checkedSub(
      this.softplus(this.exponentAt(upper)),
      this.softplus(this.exponentAt(lower))
    );
    return checkedDiv(checkedMul(this.maxPrice, delta), this.steepness);
  }
}
