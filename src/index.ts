/**
 * Bonding curve pricing in deterministic fixed-point arithmetic.
 *
 * All amounts are bigints scaled by PRECISION (1e18).
 */

export * from "./constants";
export * from "./errors";
export { logger, setLogLevel } from "./logger";
export {
  abs,
  min,
  max,
  checkedAdd,
  checkedSub,
  checkedMul,
  checkedDiv,
  checkedMulDiv,
  checkedLn,
  checkedExp,
  checkedPow,
  checkedSqrt,
  parseFixed,
  formatFixed,
} from "./math";
export {
  SupplyCurve,
  type BondingCurve,
  type CurveKind,
  type CurveState,
  type TradeQuote,
} from "./curve";
export { LinearCurve, type LinearParams } from "./linear";
export { ExponentialCurve, type ExponentialParams } from "./exponential";
export { LogarithmicCurve, type LogarithmicParams } from "./logarithmic";
export { SigmoidCurve, type SigmoidParams } from "./sigmoid";
export { BancorCurve, type BancorParams } from "./bancor";
export * from "./factory";
