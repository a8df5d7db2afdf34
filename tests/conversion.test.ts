import { describe, it, expect } from "vitest";
import {
  FeeConversion,
  IdentityConversion,
  InvalidConversionError,
  mulDiv,
} from "@maturity/principal-token";

describe("conversion", () => {
  // =====================================================================
  // mulDiv
  // =====================================================================
  describe("mulDiv", () => {
    it("is exact when there is no remainder", () => {
      expect(mulDiv(6n, 10n, 4n, "floor")).toBe(15n);
      expect(mulDiv(6n, 10n, 4n, "ceil")).toBe(15n);
    });

    it("rounds a remainder in the requested direction", () => {
      expect(mulDiv(7n, 10n, 4n, "floor")).toBe(17n);
      expect(mulDiv(7n, 10n, 4n, "ceil")).toBe(18n);
    });

    it("does not overflow on large operands", () => {
      const big = 2n ** 200n;
      expect(mulDiv(big, big, big, "floor")).toBe(big);
    });

    it("rejects a zero divisor", () => {
      expect(() => mulDiv(1n, 1n, 0n, "floor")).toThrow(InvalidConversionError);
    });
  });

  // =====================================================================
  // strategies
  // =====================================================================
  describe("IdentityConversion", () => {
    it("returns the amount for both roundings", () => {
      const identity = new IdentityConversion();
      expect(identity.toUnderlying(42n)).toBe(42n);
      expect(identity.toPrincipal(42n)).toBe(42n);
    });
  });

  describe("FeeConversion", () => {
    it("rejects a fee of 100% or more", () => {
      expect(() => new FeeConversion(10_000n)).toThrow("Invalid conversion: fee must be in [0, 10000) bps, got 10000");
      expect(() => new FeeConversion(-1n)).toThrow(InvalidConversionError);
    });

    it("a zero fee behaves like identity", () => {
      const fee = new FeeConversion(0n);
      expect(fee.toUnderlying(999n, "floor")).toBe(999n);
      expect(fee.toPrincipal(999n, "ceil")).toBe(999n);
    });

    it("floor never exceeds the exact rate and ceil never falls below it", () => {
      const fee = new FeeConversion(7n); // rate 9993 / 10000
      for (const amount of [1n, 3n, 101n, 9_999n, 123_457n]) {
        const down = fee.toUnderlying(amount, "floor");
        expect(down * 10_000n <= amount * 9_993n).toBe(true);
        expect((down + 1n) * 10_000n > amount * 9_993n).toBe(true);

        const up = fee.toPrincipal(amount, "ceil");
        expect(up * 9_993n >= amount * 10_000n).toBe(true);
        expect((up - 1n) * 9_993n < amount * 10_000n).toBe(true);
      }
    });

    it("withdraw burns the least PT whose redemption covers the amount", () => {
      const fee = new FeeConversion(25n);
      for (const underlying of [1n, 17n, 4_001n]) {
        const principal = fee.toPrincipal(underlying, "ceil");
        expect(fee.toUnderlying(principal, "floor") >= underlying).toBe(true);
        expect(fee.toUnderlying(principal - 1n, "floor") < underlying).toBe(true);
      }
    });
  });
});
