import { describe, it, expect } from "vitest";
import {
  depositAmounts,
  effectiveInput,
  orientReserves,
  requiredInput,
  spotPrice,
  swapAmounts,
  swapOutput,
  withdrawAmounts,
} from "./curve";
import {
  ArithmeticOverflowError,
  DivisionByZeroError,
  InsufficientLiquidityError,
  InvalidAmountError,
  InvalidPoolStateError,
  SlippageExceededError,
  UndefinedPriceError,
} from "./errors";
import { U64_MAX } from "./constants";
import { Side, type PoolSnapshot } from "./types";

describe("Constant-Product Curve", () => {
  // Balanced pool used throughout: 1M / 1M with 1M shares and a 0.3% fee
  const pool: PoolSnapshot = {
    reserveX: 1_000_000n,
    reserveY: 1_000_000n,
    shareSupply: 1_000_000n,
    feeBps: 30,
    locked: false,
  };

  describe("depositAmounts", () => {
    it("should be exact for proportional shares", () => {
      expect(depositAmounts(1_000_000n, 2_000_000n, 1_000_000n, 1_000n)).toEqual({
        amountX: 1_000n,
        amountY: 2_000n,
      });
    });

    it("should round each leg up", () => {
      // 10 * 1 / 3 = 3.33 -> 4
      expect(depositAmounts(10n, 10n, 3n, 1n)).toEqual({ amountX: 4n, amountY: 4n });
    });

    it("should reject an empty share supply", () => {
      expect(() => depositAmounts(0n, 0n, 0n, 10n)).toThrow(DivisionByZeroError);
    });

    it("should reject a leg that does not fit u64", () => {
      expect(() => depositAmounts(U64_MAX, 1n, 1n, 2n)).toThrow(ArithmeticOverflowError);
    });
  });

  describe("withdrawAmounts", () => {
    it("should round each leg down", () => {
      expect(withdrawAmounts(10n, 10n, 3n, 1n)).toEqual({ amountX: 3n, amountY: 3n });
    });

    it("should pay out everything for the whole supply", () => {
      expect(withdrawAmounts(1_234n, 5_678n, 100n, 100n)).toEqual({
        amountX: 1_234n,
        amountY: 5_678n,
      });
    });

    it("should reject burning more than the supply", () => {
      expect(() => withdrawAmounts(100n, 100n, 10n, 11n)).toThrow(InsufficientLiquidityError);
    });

    it("should never exceed the matching deposit", () => {
      const dep = depositAmounts(7_777n, 3_333n, 999n, 37n);
      const wd = withdrawAmounts(7_777n, 3_333n, 999n, 37n);
      expect(wd.amountX).toBeLessThanOrEqual(dep.amountX);
      expect(wd.amountY).toBeLessThanOrEqual(dep.amountY);
    });
  });

  describe("effectiveInput", () => {
    it("should deduct the fee and floor", () => {
      expect(effectiveInput(10_000n, 30)).toBe(9_970n);
      expect(effectiveInput(10_000n, 0)).toBe(10_000n);
      expect(effectiveInput(1n, 30)).toBe(0n);
      expect(effectiveInput(10_000n, 10_000)).toBe(0n);
    });

    it("should reject fees outside 0-10000 bps", () => {
      expect(() => effectiveInput(100n, 10_001)).toThrow(InvalidPoolStateError);
      expect(() => effectiveInput(100n, 2.5)).toThrow(InvalidPoolStateError);
    });
  });

  describe("swapOutput / swapAmounts", () => {
    it("should price against the pre-trade snapshot", () => {
      // effective = 9970; 10^12 / 1_009_970 = 990_128; 1_000_000 - 990_128 = 9_872
      expect(swapAmounts(Side.X, 10_000n, 9_000n, pool)).toEqual({
        deposit: 10_000n,
        withdraw: 9_872n,
      });
    });

    it("should be symmetric in a balanced pool", () => {
      expect(swapOutput(Side.Y, 10_000n, pool)).toEqual(swapOutput(Side.X, 10_000n, pool));
    });

    it("should use the opposite reserve for Y input", () => {
      const skewed = { ...pool, reserveX: 2_000_000n };
      // Y in: reserveIn = 1_000_000, reserveOut = 2_000_000
      // 2 * 10^12 / 1_009_970 = 1_980_256; 2_000_000 - 1_980_256 = 19_744
      expect(swapOutput(Side.Y, 10_000n, skewed).withdraw).toBe(19_744n);
    });

    it("should fail with slippage when output is below the minimum", () => {
      expect(() => swapAmounts(Side.X, 10_000n, 9_873n, pool)).toThrow(SlippageExceededError);
    });

    it("should reject an empty reserve", () => {
      expect(() => swapOutput(Side.X, 100n, { ...pool, reserveY: 0n })).toThrow(
        UndefinedPriceError
      );
      expect(() => swapOutput(Side.Y, 100n, { ...pool, reserveY: 0n })).toThrow(
        UndefinedPriceError
      );
    });

    it("should reject a trade the fee swallows entirely", () => {
      expect(() => swapOutput(Side.X, 1n, pool)).toThrow(InvalidAmountError);
    });

    it("should cap a fee-free payout so the product never shrinks", () => {
      const feeFree = { ...pool, feeBps: 0 };
      // curve gives 1_000; the product floor allows 999
      expect(swapOutput(Side.X, 1_000n, feeFree)).toEqual({ deposit: 1_000n, withdraw: 999n });
      expect(swapOutput(Side.X, 1n, feeFree).withdraw).toBe(0n);
    });

    it("should reject a trade that drains the output reserve", () => {
      const tiny = { ...pool, reserveX: 1n, reserveY: 1n, shareSupply: 1n, feeBps: 0 };
      expect(() => swapOutput(Side.X, 1_000n, tiny)).toThrow(InsufficientLiquidityError);
    });
  });

  describe("requiredInput", () => {
    it("should find the smallest input reaching the output", () => {
      const input = requiredInput(Side.X, 9_872n, pool);
      expect(input).toBe(10_000n);
      expect(swapOutput(Side.X, input, pool).withdraw).toBeGreaterThanOrEqual(9_872n);
      expect(swapOutput(Side.X, input - 1n, pool).withdraw).toBeLessThan(9_872n);
    });

    it("should account for the payout cap without a fee", () => {
      const feeFree = { ...pool, feeBps: 0 };
      const input = requiredInput(Side.X, 999n, feeFree);
      expect(input).toBe(1_000n);
      expect(swapOutput(Side.X, input - 1n, feeFree).withdraw).toBe(998n);
    });

    it("should reject outputs at or above the reserve", () => {
      expect(() => requiredInput(Side.X, 1_000_000n, pool)).toThrow(InsufficientLiquidityError);
    });

    it("should reject a 100% fee", () => {
      expect(() => requiredInput(Side.X, 10n, { ...pool, feeBps: 10_000 })).toThrow(
        InvalidAmountError
      );
    });
  });

  describe("spotPrice", () => {
    const skewed = { ...pool, reserveY: 2_000_000n };

    it("should scale the reserve ratio by 10^precision", () => {
      expect(spotPrice(Side.X, skewed)).toBe(2_000_000n);
      expect(spotPrice(Side.Y, skewed)).toBe(500_000n);
      expect(spotPrice(Side.X, skewed, 0)).toBe(2n);
    });

    it("should reject an unsupported precision", () => {
      expect(() => spotPrice(Side.X, skewed, 19)).toThrow(InvalidAmountError);
    });
  });

  describe("orientReserves", () => {
    it("should order reserves by input side", () => {
      const skewed = { ...pool, reserveY: 5n };
      expect(orientReserves(Side.X, skewed)).toEqual({ reserveIn: 1_000_000n, reserveOut: 5n });
      expect(orientReserves(Side.Y, skewed)).toEqual({ reserveIn: 5n, reserveOut: 1_000_000n });
    });
  });
});
