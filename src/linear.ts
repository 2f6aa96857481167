/**
 * Linear Bonding Curve
 *
 * P(S) = k * S
 *
 * Cost of moving supply from a to b:
 *   integral of k*S dS over [a, b] = k * (b^2 - a^2) / 2
 */

import { SupplyCurve, assertPositive } from "./curve";
import { checkedMul, checkedSub } from "./math";

export interface LinearParams {
  /** k, price increase per token of supply (> 0) */
  slope: bigint;
  /** Starting supply, default 0 */
  supply?: bigint;
}

export class LinearCurve extends SupplyCurve {
  readonly kind = "linear" as const;
  readonly slope: bigint;

  constructor(params: LinearParams) {
    assertPositive(params.slope, "slope", "LinearCurve");
    super("LinearCurve", params.supply ?? 0n);
    this.slope = params.slope;
  }

  priceAt(supply: bigint): bigint {
    return checkedMul(this.slope, supply);
  }

  integrate(lower: bigint, upper: bigint): bigint {
    const squares = checkedSub(checkedMul(upper, upper), checkedMul(lower, lower));
    return checkedMul(this.slope, squares) / 2n;
  }
}
