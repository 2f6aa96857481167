/**
 * Bancor Bonding Curve
 *
 * Reserve-driven rather than integrated: the connector weight w fixes the
 * ratio between the reserve and the market cap,
 *   P = reserve / (supply * w)
 *
 * Buying with dR of reserve mints
 *   supply * ((1 + dR/reserve)^w - 1)
 * and selling dS tokens returns
 *   reserve * (1 - (1 - dS/supply)^w)
 */

import { PRECISION } from "./constants";
import {
  type BondingCurve,
  type CurveState,
  type TradeQuote,
  assertAmount,
  assertNonNegative,
  assertSellable,
  effectivePrice,
} from "./curve";
import { InvalidInputError } from "./errors";
import { logger } from "./logger";
import {
  checkedAdd,
  checkedDiv,
  checkedMul,
  checkedMulDiv,
  checkedPow,
  checkedSub,
  formatFixed,
} from "./math";

export interface BancorParams {
  /** Starting reserve balance */
  reserve: bigint;
  /** Starting token supply */
  supply: bigint;
  /** w, in (0, 1] */
  connectorWeight: bigint;
}

export class BancorCurve implements BondingCurve {
  readonly kind = "bancor" as const;
  readonly connectorWeight: bigint;

  private reserve: bigint;
  private supply: bigint;

  constructor(params: BancorParams) {
    const { reserve, supply, connectorWeight } = params;

    if (connectorWeight <= 0n || connectorWeight > PRECISION) {
      throw new InvalidInputError(
        `BancorCurve: connectorWeight must be in (0, 1], got ${formatFixed(connectorWeight)}`
      );
    }
    assertNonNegative(reserve, "reserve", "BancorCurve");
    assertNonNegative(supply, "supply", "BancorCurve");
    // An empty pool is allowed; a half-empty one has no defined price
    if (supply === 0n && reserve !== 0n) {
      throw new InvalidInputError("BancorCurve: cannot have reserve with zero token supply");
    }
    if (reserve === 0n && supply !== 0n) {
      throw new InvalidInputError("BancorCurve: cannot have zero reserve with non-zero token supply");
    }

    this.reserve = reserve;
    this.supply = supply;
    this.connectorWeight = connectorWeight;
  }

  private priceAt(reserve: bigint, supply: bigint): bigint {
    if (supply === 0n) return 0n;
    return checkedMulDiv(reserve, PRECISION * PRECISION, supply * this.connectorWeight);
  }

  getPrice(): bigint {
    return this.priceAt(this.reserve, this.supply);
  }

  getSupply(): bigint {
    return this.supply;
  }

  getReserve(): bigint {
    return this.reserve;
  }

  getState(): CurveState {
    return { supply: this.supply, reserve: this.reserve };
  }

  /**
   * Price depositing `amount` of reserve
   * @throws InvalidInputError if amount < 0 or the reserve is empty
   */
  quoteBuy(amount: bigint): TradeQuote {
    assertAmount(amount, "bancor.buyToken");
    if (this.reserve === 0n) {
      throw new InvalidInputError("bancor.buyToken: reserve is empty, price is undefined");
    }

    const ratio = checkedAdd(PRECISION, checkedDiv(amount, this.reserve));
    const growth = checkedSub(checkedPow(ratio, this.connectorWeight), PRECISION);
    const minted = checkedMul(this.supply, growth);

    const supplyAfter = checkedAdd(this.supply, minted);
    const reserveAfter = checkedAdd(this.reserve, amount);
    return {
      tokens: minted,
      value: amount,
      priceBefore: this.getPrice(),
      priceAfter: this.priceAt(reserveAfter, supplyAfter),
      effectivePrice: effectivePrice(amount, minted),
      supplyAfter,
      reserveAfter,
    };
  }

  /**
   * Price burning `amount` tokens
   * @throws InvalidInputError if amount < 0 or amount > supply
   */
  quoteSell(amount: bigint): TradeQuote {
    assertSellable(amount, this.supply, "bancor.sellToken");

    let returned: bigint;
    if (amount === this.supply) {
      // (1 - 1)^w is 0 but ln(0) is undefined
      returned = this.reserve;
    } else {
      const remaining = checkedSub(PRECISION, checkedDiv(amount, this.supply));
      const shrink = checkedSub(PRECISION, checkedPow(remaining, this.connectorWeight));
      returned = checkedMul(this.reserve, shrink);
    }

    const supplyAfter = checkedSub(this.supply, amount);
    const reserveAfter = checkedSub(this.reserve, returned);
    return {
      tokens: amount,
      value: returned,
      priceBefore: this.getPrice(),
      priceAfter: this.priceAt(reserveAfter, supplyAfter),
      effectivePrice: effectivePrice(returned, amount),
      supplyAfter,
      reserveAfter,
    };
  }

  /**
   * Deposit `amount` of reserve and return the tokens minted
   */
  buyToken(amount: bigint): bigint {
    const quote = this.quoteBuy(amount);
    this.commit(quote);
    if (logger.isDebugEnabled()) {
      logger.debug(`bancor: deposited ${formatFixed(amount)} for ${formatFixed(quote.tokens)} tokens`, {
        supply: formatFixed(this.supply),
        reserve: formatFixed(this.reserve),
      });
    }
    return quote.tokens;
  }

  /**
   * Burn `amount` tokens and return the reserve paid out
   */
  sellToken(amount: bigint): bigint {
    const quote = this.quoteSell(amount);
    this.commit(quote);
    if (logger.isDebugEnabled()) {
      logger.debug(`bancor: burned ${formatFixed(amount)} for ${formatFixed(quote.value)} reserve`, {
        supply: formatFixed(this.supply),
        reserve: formatFixed(this.reserve),
      });
    }
    return quote.value;
  }

  private commit(quote: TradeQuote): void {
    this.supply = quote.supplyAfter;
    this.reserve = quote.reserveAfter ?? this.reserve;
  }
}
