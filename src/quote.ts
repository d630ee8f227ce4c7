/**
 * Read-only quotes and request-building helpers.
 *
 * Nothing here enforces a caller bound; these functions tell a client what
 * bounds to put on a request before it is submitted.
 */

import {
  BPS_DENOMINATOR,
  DEFAULT_SLIPPAGE_BPS,
  LP_DECIMALS,
  MAX_SLIPPAGE_BPS,
  MIN_SLIPPAGE_BPS,
} from "./constants";
import {
  assertPrecision,
  depositAmounts,
  effectiveInput,
  spotPrice,
  swapOutput,
  withdrawAmounts,
} from "./curve";
import { InvalidAmountError, InvalidPoolStateError } from "./errors";
import { Rounding, checkedMul, integerSqrt, mulDiv } from "./fixed-point";
import { assertConsistentSnapshot } from "./guard";
import type { CurveAmounts, PoolSnapshot, Side } from "./types";

// ============================================
// Swap Quotes
// ============================================

/**
 * Full swap quote with all relevant information
 */
export interface SwapQuote {
  /** Output amount after fees */
  amountOut: bigint;
  /** Part of the input kept by the pool as fee */
  fee: bigint;
  /** Input that actually moves the curve */
  effectiveInput: bigint;
  /** Spot price before swap (scaled by 10^precision) */
  spotPrice: bigint;
  /** amountOut / amountIn (scaled by 10^precision) */
  effectivePrice: bigint;
  /** Price impact in basis points, fee included */
  priceImpactBps: bigint;
}

/**
 * Get complete swap quote with all details
 *
 * @param side - Side the input is paid into
 * @param inputAmount - Amount paid in
 * @param precision - Decimal scale for the price fields
 */
export function quoteSwap(
  snapshot: PoolSnapshot,
  side: Side,
  inputAmount: bigint,
  precision: number = LP_DECIMALS
): SwapQuote {
  assertPrecision(precision);
  const { withdraw: amountOut } = swapOutput(side, inputAmount, snapshot);
  const effective = effectiveInput(inputAmount, snapshot.feeBps);
  const scale = 10n ** BigInt(precision);

  const spot = spotPrice(side, snapshot, precision);
  const effectivePrice = mulDiv(amountOut, scale, inputAmount);
  const impact = spot > 0n ? ((spot - effectivePrice) * BPS_DENOMINATOR) / spot : 0n;

  return {
    amountOut,
    fee: inputAmount - effective,
    effectiveInput: effective,
    spotPrice: spot,
    effectivePrice,
    priceImpactBps: impact > 0n ? impact : 0n,
  };
}

// ============================================
// Liquidity Quotes
// ============================================

function assertFunded(snapshot: PoolSnapshot): void {
  assertConsistentSnapshot(snapshot);
  if (snapshot.shareSupply === 0n) {
    throw new InvalidPoolStateError("Empty pool has no price to quote against");
  }
}

/**
 * Token amounts a deposit of `shareAmount` shares would take.
 */
export function quoteDeposit(snapshot: PoolSnapshot, shareAmount: bigint): CurveAmounts {
  assertFunded(snapshot);
  return depositAmounts(snapshot.reserveX, snapshot.reserveY, snapshot.shareSupply, shareAmount);
}

/**
 * Token amounts a burn of `shareAmount` shares would pay out.
 */
export function quoteWithdraw(snapshot: PoolSnapshot, shareAmount: bigint): CurveAmounts {
  assertFunded(snapshot);
  return withdrawAmounts(snapshot.reserveX, snapshot.reserveY, snapshot.shareSupply, shareAmount);
}

/**
 * Largest share amount whose deposit stays within both budgets.
 * May be zero when a budget is smaller than one share's worth.
 */
export function maxSharesForDeposit(snapshot: PoolSnapshot, maxX: bigint, maxY: bigint): bigint {
  assertFunded(snapshot);
  const byX = mulDiv(maxX, snapshot.shareSupply, snapshot.reserveX);
  const byY = mulDiv(maxY, snapshot.shareSupply, snapshot.reserveY);
  return byX < byY ? byX : byY;
}

/**
 * Geometric mean of the bootstrap amounts, a neutral initial share count.
 *
 * @throws InvalidAmountError if either amount is zero
 */
export function suggestBootstrapShares(amountX: bigint, amountY: bigint): bigint {
  if (amountX <= 0n || amountY <= 0n) {
    throw new InvalidAmountError("Bootstrap amounts must both be greater than zero", {
      amountX,
      amountY,
    });
  }
  return integerSqrt(checkedMul(amountX, amountY));
}

/**
 * Value of one whole share (10^precision base units) in X and in Y.
 * An empty pool reports 1:1.
 */
export function sharePrice(
  snapshot: PoolSnapshot,
  precision: number = LP_DECIMALS
): CurveAmounts {
  assertPrecision(precision);
  assertConsistentSnapshot(snapshot);
  const scale = 10n ** BigInt(precision);
  if (snapshot.shareSupply === 0n) return { amountX: scale, amountY: scale };
  return {
    amountX: mulDiv(snapshot.reserveX, scale, snapshot.shareSupply),
    amountY: mulDiv(snapshot.reserveY, scale, snapshot.shareSupply),
  };
}

// ============================================
// Slippage Helpers
// ============================================

function assertSlippageBps(slippageBps: number): void {
  if (
    !Number.isInteger(slippageBps) ||
    slippageBps < MIN_SLIPPAGE_BPS ||
    slippageBps > MAX_SLIPPAGE_BPS
  ) {
    throw new InvalidAmountError(
      `Invalid slippage: ${slippageBps}. Must be ${MIN_SLIPPAGE_BPS}-${MAX_SLIPPAGE_BPS} bps`,
      { slippageBps }
    );
  }
}

/**
 * Calculate min output with slippage tolerance (rounded down)
 * @param expectedOutput - Output from quoteSwap or quoteWithdraw
 * @param slippageBps - Slippage in basis points (100 = 1%)
 */
export function calculateMinOutput(expectedOutput: bigint, slippageBps: number): bigint {
  assertSlippageBps(slippageBps);
  return mulDiv(expectedOutput, BPS_DENOMINATOR - BigInt(slippageBps), BPS_DENOMINATOR);
}

/**
 * Calculate max input with slippage tolerance (rounded up)
 * @param expectedInput - Amount from quoteDeposit or requiredInput
 * @param slippageBps - Slippage in basis points (100 = 1%)
 */
export function calculateMaxInput(expectedInput: bigint, slippageBps: number): bigint {
  assertSlippageBps(slippageBps);
  return mulDiv(
    expectedInput,
    BPS_DENOMINATOR + BigInt(slippageBps),
    BPS_DENOMINATOR,
    Rounding.UP
  );
}

/**
 * Validate slippage parameter
 * @param slippage - Slippage in basis points as string (100 = 1%)
 * @returns Validated slippage in basis points as number
 * @throws InvalidAmountError if slippage is invalid or out of range
 */
export function validateSlippage(slippage: string | undefined): number {
  const raw = slippage ?? String(DEFAULT_SLIPPAGE_BPS);
  if (!/^\d+$/.test(raw.trim())) {
    throw new InvalidAmountError(
      `Invalid slippage: ${slippage}. Must be ${MIN_SLIPPAGE_BPS}-${MAX_SLIPPAGE_BPS} bps`,
      { slippage }
    );
  }
  const bps = parseInt(raw, 10);
  assertSlippageBps(bps);
  return bps;
}
