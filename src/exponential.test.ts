import { describe, it, expect } from "vitest";
import { ExponentialCurve } from "./exponential";
import { CalculationError, InvalidInputError } from "./errors";
import { PRECISION } from "./constants";
import { abs } from "./math";

describe("Exponential Curve", () => {
  const coefficient = PRECISION / 1000n; // 0.001

  describe("constructor", () => {
    it("should accept a zero exponent", () => {
      const curve = new ExponentialCurve({ coefficient: 2n * PRECISION, exponent: 0n });
      // n = 0 is a flat price of c
      expect(curve.getPrice()).toBe(2n * PRECISION);
      expect(curve.buyToken(5n * PRECISION)).toBe(10n * PRECISION);
    });

    it("should reject a non-positive coefficient", () => {
      expect(() => new ExponentialCurve({ coefficient: 0n, exponent: PRECISION })).toThrow(
        "ExponentialCurve: coefficient must be positive, got 0"
      );
    });

    it("should reject a negative exponent", () => {
      expect(() => new ExponentialCurve({ coefficient, exponent: -1n })).toThrow(InvalidInputError);
    });
  });

  describe("getPrice", () => {
    it("should compute c * S^n", () => {
      const curve = new ExponentialCurve({
        coefficient,
        exponent: 2n * PRECISION,
        supply: 50n * PRECISION,
      });
      expect(curve.getPrice()).toBe(25n * 10n ** 17n);
      expect(curve.getReserve()).toBeUndefined();
    });

    it("should be zero at zero supply for a fractional exponent", () => {
      const curve = new ExponentialCurve({ coefficient, exponent: 15n * 10n ** 17n });
      expect(curve.getPrice()).toBe(0n);
    });
  });

  describe("buyToken", () => {
    it("should charge c/(n+1) * D^(n+1) from zero supply", () => {
      const curve = new ExponentialCurve({ coefficient, exponent: 2n * PRECISION });
      // 0.001 / 3 * 50^3
      expect(curve.buyToken(50n * PRECISION)).toBe(41666666666666666666n);
      expect(curve.getSupply()).toBe(50n * PRECISION);
    });

    it("should handle fractional exponents starting from zero supply", () => {
      const curve = new ExponentialCurve({ coefficient: PRECISION, exponent: 15n * 10n ** 17n });
      // 4^2.5 / 2.5 = 12.8
      const cost = curve.buyToken(4n * PRECISION);
      expect(abs(cost - 128n * 10n ** 17n)).toBeLessThan(100n);
    });

    it("should throw and keep state when the power overflows", () => {
      const curve = new ExponentialCurve({ coefficient: PRECISION, exponent: 10n * PRECISION });
      expect(() => curve.buyToken(10n ** 8n * PRECISION)).toThrow(CalculationError);
      expect(curve.getSupply()).toBe(0n);
    });
  });

  describe("sellToken", () => {
    it("should refund exactly what a matching buy cost", () => {
      const curve = new ExponentialCurve({
        coefficient,
        exponent: 17n * 10n ** 17n,
        supply: 20n * PRECISION,
      });
      const cost = curve.buyToken(15n * PRECISION);
      expect(curve.sellToken(15n * PRECISION)).toBe(cost);
      expect(curve.getSupply()).toBe(20n * PRECISION);
    });

    it("should sell down to zero supply with a fractional exponent", () => {
      const curve = new ExponentialCurve({ coefficient: PRECISION, exponent: 15n * 10n ** 17n });
      const cost = curve.buyToken(4n * PRECISION);
      expect(curve.sellToken(4n * PRECISION)).toBe(cost);
      expect(curve.getSupply()).toBe(0n);
    });

    it("should reject selling more than the supply", () => {
      const curve = new ExponentialCurve({ coefficient, exponent: PRECISION, supply: PRECISION });
      expect(() => curve.sellToken(2n * PRECISION)).toThrow(InvalidInputError);
      expect(curve.getSupply()).toBe(PRECISION);
    });
  });
});
