/**
 * Logarithmic Bonding Curve
 *
 * P(S) = c * ln(S + k)
 *
 * With x = S + k the antiderivative is c * (x*ln(x) - x), so the cost of
 * moving supply from a to b is
 *   c * [(b+k)ln(b+k) - (b+k)] - c * [(a+k)ln(a+k) - (a+k)]
 *
 * k > 0 keeps every logarithm argument positive for S >= 0.
 */

import { SupplyCurve, assertPositive } from "./curve";
import { checkedAdd, checkedLn, checkedMul, checkedSub } from "./math";

export interface LogarithmicParams {
  /** c, scaling factor (> 0) */
  coefficient: bigint;
  /** k, shift applied to supply before taking the log (> 0) */
  constant: bigint;
  /** Starting supply, default 0 */
  supply?: bigint;
}

export class LogarithmicCurve extends SupplyCurve {
  readonly kind = "logarithmic" as const;
  readonly coefficient: bigint;
  readonly constant: bigint;

  constructor(params: LogarithmicParams) {
    assertPositive(params.coefficient, "coefficient", "LogarithmicCurve");
    assertPositive(params.constant, "constant", "LogarithmicCurve");
    super("LogarithmicCurve", params.supply ?? 0n);
    this.coefficient = params.coefficient;
    this.constant = params.constant;
  }

  // x*ln(x) - x
  private antiderivative(supply: bigint): bigint {
    const x = checkedAdd(supply, this.constant);
    return checkedSub(checkedMul(x, checkedLn(x)), x);
  }

  priceAt(supply: bigint): bigint {
    return checkedMul(this.coefficient, checkedLn(checkedAdd(supply, this.constant)));
  }

  integrate(lower: bigint, upper: bigint): bigint {
    const delta = checkedSub(this.antiderivative(upper), this.antiderivative(lower));
    return checkedMul(this.coefficient, delta);
  }
}
