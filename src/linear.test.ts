import { describe, it, expect } from "vitest";
import { LinearCurve } from "./linear";
import { InvalidInputError } from "./errors";
import { PRECISION } from "./constants";

describe("Linear Curve", () => {
  const slope = PRECISION / 100n; // 0.01

  describe("constructor", () => {
    it("should start at zero supply", () => {
      const curve = new LinearCurve({ slope });
      expect(curve.getSupply()).toBe(0n);
      expect(curve.getPrice()).toBe(0n);
      expect(curve.getReserve()).toBeUndefined();
      expect(curve.getState()).toEqual({ supply: 0n });
    });

    it("should accept an initial supply", () => {
      const curve = new LinearCurve({ slope: PRECISION, supply: 10n * PRECISION });
      expect(curve.getSupply()).toBe(10n * PRECISION);
      expect(curve.getPrice()).toBe(10n * PRECISION);
    });

    it("should reject a non-positive slope", () => {
      expect(() => new LinearCurve({ slope: 0n })).toThrow(InvalidInputError);
      expect(() => new LinearCurve({ slope: -PRECISION })).toThrow(
        "LinearCurve: slope must be positive, got -1"
      );
    });

    it("should reject a negative initial supply", () => {
      expect(() => new LinearCurve({ slope, supply: -1n })).toThrow(
        "LinearCurve: supply must be non-negative"
      );
    });
  });

  describe("buyToken", () => {
    it("should charge k * D^2 / 2 from zero supply", () => {
      const curve = new LinearCurve({ slope });
      expect(curve.buyToken(100n * PRECISION)).toBe(50n * PRECISION);
      expect(curve.getSupply()).toBe(100n * PRECISION);
      expect(curve.getPrice()).toBe(PRECISION);
    });

    it("should integrate from the current supply", () => {
      const curve = new LinearCurve({ slope: 2n * PRECISION });
      expect(curve.buyToken(10n * PRECISION)).toBe(100n * PRECISION);
      // 2 * (30^2 - 10^2) / 2
      expect(curve.buyToken(20n * PRECISION)).toBe(800n * PRECISION);
      expect(curve.getSupply()).toBe(30n * PRECISION);
    });

    it("should treat a zero amount as a free no-op", () => {
      const curve = new LinearCurve({ slope, supply: 5n * PRECISION });
      expect(curve.buyToken(0n)).toBe(0n);
      expect(curve.getSupply()).toBe(5n * PRECISION);
    });

    it("should reject negative amounts without changing supply", () => {
      const curve = new LinearCurve({ slope, supply: 5n * PRECISION });
      expect(() => curve.buyToken(-1n)).toThrow("linear.buyToken: amount must be non-negative");
      expect(curve.getSupply()).toBe(5n * PRECISION);
    });
  });

  describe("sellToken", () => {
    it("should refund the integral over [S - D, S]", () => {
      const curve = new LinearCurve({ slope: 2n * PRECISION, supply: 30n * PRECISION });
      expect(curve.sellToken(20n * PRECISION)).toBe(800n * PRECISION);
      expect(curve.getSupply()).toBe(10n * PRECISION);
    });

    it("should refund exactly what a matching buy cost", () => {
      const curve = new LinearCurve({ slope: 3n * 10n ** 15n, supply: 7n * PRECISION });
      const amount = 123_456789000000000000n;
      const cost = curve.buyToken(amount);
      expect(curve.sellToken(amount)).toBe(cost);
      expect(curve.getSupply()).toBe(7n * PRECISION);
    });

    it("should reject selling more than the supply", () => {
      const curve = new LinearCurve({ slope, supply: 10n * PRECISION });
      expect(() => curve.sellToken(10n * PRECISION + 1n)).toThrow(InvalidInputError);
      expect(curve.getSupply()).toBe(10n * PRECISION);
    });

    it("should allow selling the entire supply", () => {
      const curve = new LinearCurve({ slope, supply: 100n * PRECISION });
      expect(curve.sellToken(100n * PRECISION)).toBe(50n * PRECISION);
      expect(curve.getSupply()).toBe(0n);
    });
  });

  describe("quotes", () => {
    it("should describe a buy without applying it", () => {
      const curve = new LinearCurve({ slope });
      const quote = curve.quoteBuy(100n * PRECISION);
      expect(quote).toEqual({
        tokens: 100n * PRECISION,
        value: 50n * PRECISION,
        priceBefore: 0n,
        priceAfter: PRECISION,
        effectivePrice: PRECISION / 2n,
        supplyAfter: 100n * PRECISION,
      });
      expect(curve.getSupply()).toBe(0n);
    });

    it("should describe a sell without applying it", () => {
      const curve = new LinearCurve({ slope, supply: 100n * PRECISION });
      const quote = curve.quoteSell(100n * PRECISION);
      expect(quote.value).toBe(50n * PRECISION);
      expect(quote.priceBefore).toBe(PRECISION);
      expect(quote.priceAfter).toBe(0n);
      expect(quote.supplyAfter).toBe(0n);
      expect(curve.getSupply()).toBe(100n * PRECISION);
    });

    it("should report a zero effective price for an empty trade", () => {
      const curve = new LinearCurve({ slope });
      expect(curve.quoteBuy(0n).effectivePrice).toBe(0n);
    });
  });
});
