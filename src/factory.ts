/**
 * Build curves from plain configuration objects.
 *
 * The variant set is closed, so configurations are a discriminated union on
 * `kind`. Numeric fields accept fixed-point bigints or decimal strings.
 */

import { BancorCurve } from "./bancor";
import type { BondingCurve, CurveKind } from "./curve";
import { ExponentialCurve } from "./exponential";
import { LinearCurve } from "./linear";
import { LogarithmicCurve } from "./logarithmic";
import { parseFixed } from "./math";
import { SigmoidCurve } from "./sigmoid";

/** Fixed-point bigint, or a decimal string such as "0.01" */
export type FixedInput = bigint | string;

export interface LinearConfig {
  kind: "linear";
  slope: FixedInput;
  supply?: FixedInput;
}

export interface ExponentialConfig {
  kind: "exponential";
  coefficient: FixedInput;
  exponent: FixedInput;
  supply?: FixedInput;
}

export interface LogarithmicConfig {
  kind: "logarithmic";
  coefficient: FixedInput;
  constant: FixedInput;
  supply?: FixedInput;
}

export interface SigmoidConfig {
  kind: "sigmoid";
  maxPrice: FixedInput;
  steepness: FixedInput;
  midpoint: FixedInput;
  supply?: FixedInput;
}

export interface BancorConfig {
  kind: "bancor";
  reserve: FixedInput;
  supply: FixedInput;
  connectorWeight: FixedInput;
}

export type CurveConfig =
  | LinearConfig
  | ExponentialConfig
  | LogarithmicConfig
  | SigmoidConfig
  | BancorConfig;

export const CURVE_KINDS: readonly CurveKind[] = [
  "linear",
  "exponential",
  "logarithmic",
  "sigmoid",
  "bancor",
];

export function toFixed(value: FixedInput): bigint {
  return typeof value === "bigint" ? value : parseFixed(value);
}

function optionalFixed(value: FixedInput | undefined): bigint | undefined {
  return value === undefined ? undefined : toFixed(value);
}

/**
 * Create a curve from its configuration
 * @throws InvalidInputError on malformed numbers or out-of-domain parameters
 */
export function createCurve(config: CurveConfig): BondingCurve {
  switch (config.kind) {
    case "linear":
      return new LinearCurve({
        slope: toFixed(config.slope),
        supply: optionalFixed(config.supply),
      });
    case "exponential":
      return new ExponentialCurve({
        coefficient: toFixed(config.coefficient),
        exponent: toFixed(config.exponent),
        supply: optionalFixed(config.supply),
      });
    case "logarithmic":
      return new LogarithmicCurve({
        coefficient: toFixed(config.coefficient),
        constant: toFixed(config.constant),
        supply: optionalFixed(config.supply),
      });
    case "sigmoid":
      return new SigmoidCurve({
        maxPrice: toFixed(config.maxPrice),
        steepness: toFixed(config.steepness),
        midpoint: toFixed(config.midpoint),
        supply: optionalFixed(config.supply),
      });
    case "bancor":
      return new BancorCurve({
        reserve: toFixed(config.reserve),
        supply: toFixed(config.supply),
        connectorWeight: toFixed(config.connectorWeight),
      });
  }
}
