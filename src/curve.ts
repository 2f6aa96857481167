/**
 * Bonding Curve Abstraction
 *
 * Every curve exposes the same capability set: spot price, buy, sell,
 * supply and (Bancor only) reserve. Trades are computed as a TradeQuote
 * first and committed only once the whole computation has succeeded, so an
 * operation that throws never leaves a curve half-updated.
 */

import { InvalidInputError } from "./errors";
import { logger } from "./logger";
import { checkedAdd, checkedDiv, checkedSub, formatFixed } from "./math";

export type CurveKind = "linear" | "exponential" | "logarithmic" | "sigmoid" | "bancor";

/**
 * Snapshot of a curve's mutable state
 */
export interface CurveState {
  supply: bigint;
  /** Present only for reserve-backed curves */
  reserve?: bigint;
}

/**
 * Result of pricing a trade without applying it
 */
export interface TradeQuote {
  /** Tokens minted (buy) or burned (sell) */
  tokens: bigint;
  /** Reserve paid in (buy) or paid out (sell) */
  value: bigint;
  priceBefore: bigint;
  priceAfter: bigint;
  /** value / tokens, 0 for an empty trade */
  effectivePrice: bigint;
  supplyAfter: bigint;
  reserveAfter?: bigint;
}

export interface BondingCurve {
  readonly kind: CurveKind;
  /** Current spot price */
  getPrice(): bigint;
  /**
   * Buy against the curve. Supply curves take a token amount and return its
   * cost; Bancor takes a reserve amount and returns the tokens minted.
   */
  buyToken(amount: bigint): bigint;
  /** Burn `amount` tokens and return the reserve paid out */
  sellToken(amount: bigint): bigint;
  getSupply(): bigint;
  /** Reserve balance, or undefined when the curve does not track one */
  getReserve(): bigint | undefined;
  /** Price a buy without changing state */
  quoteBuy(amount: bigint): TradeQuote;
  /** Price a sell without changing state */
  quoteSell(amount: bigint): TradeQuote;
  getState(): CurveState;
}

// ============================================
// Validation Helpers
// ============================================

export function assertAmount(amount: bigint, operation: string): void {
  if (amount < 0n) {
    throw new InvalidInputError(`${operation}: amount must be non-negative, got ${formatFixed(amount)}`);
  }
}

export function assertSellable(amount: bigint, supply: bigint, operation: string): void {
  assertAmount(amount, operation);
  if (amount > supply) {
    throw new InvalidInputError(
      `${operation}: cannot sell ${formatFixed(amount)} tokens, supply is ${formatFixed(supply)}`
    );
  }
}

export function assertPositive(value: bigint, name: string, curve: string): void {
  if (value <= 0n) {
    throw new InvalidInputError(`${curve}: ${name} must be positive, got ${formatFixed(value)}`);
  }
}

export function assertNonNegative(value: bigint, name: string, curve: string): void {
  if (value < 0n) {
    throw new InvalidInputError(`${curve}: ${name} must be non-negative, got ${formatFixed(value)}`);
  }
}

export function effectivePrice(value: bigint, tokens: bigint): bigint {
  return tokens === 0n ? 0n : checkedDiv(value, tokens);
}

// ============================================
// Supply-Driven Curves
// ============================================

/**
 * Base for curves whose price is a function of supply alone.
 *
 * The cost of moving supply from `lower` to `upper` is the definite integral
 * of the price function. Buys and sells over the same interval go through the
 * same `integrate` call, so buying and immediately selling the same amount
 * refunds exactly what was paid.
 */
export abstract class SupplyCurve implements BondingCurve {
  abstract readonly kind: CurveKind;

  protected supply: bigint;

  protected constructor(name: string, initialSupply: bigint) {
    assertNonNegative(initialSupply, "supply", name);
    this.supply = initialSupply;
  }

  /** Price at an arbitrary supply */
  abstract priceAt(supply: bigint): bigint;

  /** Integral of the price function over [lower, upper] */
  abstract integrate(lower: bigint, upper: bigint): bigint;

  getPrice(): bigint {
    return this.priceAt(this.supply);
  }

  getSupply(): bigint {
    return this.supply;
  }

  getReserve(): bigint | undefined {
    return undefined;
  }

  getState(): CurveState {
    return { supply: this.supply };
  }

  quoteBuy(amount: bigint): TradeQuote {
    assertAmount(amount, `${this.kind}.buyToken`);
    const supplyAfter = checkedAdd(this.supply, amount);
    const cost = this.integrate(this.supply, supplyAfter);
    return {
      tokens: amount,
      value: cost,
      priceBefore: this.getPrice(),
      priceAfter: this.priceAt(supplyAfter),
      effectivePrice: effectivePrice(cost, amount),
      supplyAfter,
    };
  }

  quoteSell(amount: bigint): TradeQuote {
    assertSellable(amount, this.supply, `${this.kind}.sellToken`);
    const supplyAfter = checkedSub(this.supply, amount);
    const refund = this.integrate(supplyAfter, this.supply);
    return {
      tokens: amount,
      value: refund,
      priceBefore: this.getPrice(),
      priceAfter: this.priceAt(supplyAfter),
      effectivePrice: effectivePrice(refund, amount),
      supplyAfter,
    };
  }

  buyToken(amount: bigint): bigint {
    const quote = this.quoteBuy(amount);
    this.supply = quote.supplyAfter;
    if (logger.isDebugEnabled()) {
      logger.debug(`${this.kind}: bought ${formatFixed(amount)} for ${formatFixed(quote.value)}`, {
        supply: formatFixed(this.supply),
      });
    }
    return quote.value;
  }

  sellToken(amount: bigint): bigint {
    const quote = this.quoteSell(amount);
    this.supply = quote.supplyAfter;
    if (logger.isDebugEnabled()) {
      logger.debug(`${this.kind}: sold ${formatFixed(amount)} for ${formatFixed(quote.value)}`, {
        supply: formatFixed(this.supply),
      });
    }
    return quote.value;
  }
}
