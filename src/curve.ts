/**
 * Constant-Product Curve Math
 *
 * Stateless pricing for a two-asset x * y = k pool with a basis-point fee
 * taken from the input. Every function is exact integer arithmetic and
 * rounds in the pool's favour:
 * - deposits round each leg up, so new shares never dilute existing holders
 * - withdrawals round each leg down, so a burn never pays more than its share
 * - swaps price against the pre-trade reserves, evaluated once
 */

import {
  BPS_DENOMINATOR,
  LP_DECIMALS,
  MAX_PRECISION,
} from "./constants";
import {
  DivisionByZeroError,
  InsufficientLiquidityError,
  InvalidAmountError,
  UndefinedPriceError,
} from "./errors";
import {
  Rounding,
  ceilDiv,
  checkedAdd,
  checkedDiv,
  checkedMul,
  checkedSub,
  mulDiv,
  toU64,
} from "./fixed-point";
import { assertFeeBps, assertSwapBounds } from "./guard";
import { Side, type CurveAmounts, type PoolSnapshot, type SwapAmounts } from "./types";

// ============================================
// Liquidity
// ============================================

/**
 * Token amounts a depositor owes for `requestedShares` new shares.
 * x / reserveX == y / reserveY == requestedShares / shareSupply, each leg rounded up.
 *
 * Not used to bootstrap an empty pool; the first depositor sets the price.
 *
 * @throws DivisionByZeroError if shareSupply is zero
 * @throws ArithmeticOverflowError if a leg does not fit u64
 */
export function depositAmounts(
  reserveX: bigint,
  reserveY: bigint,
  shareSupply: bigint,
  requestedShares: bigint
): CurveAmounts {
  if (shareSupply === 0n) throw new DivisionByZeroError("depositAmounts");

  return {
    amountX: toU64(mulDiv(reserveX, requestedShares, shareSupply, Rounding.UP), "depositAmounts"),
    amountY: toU64(mulDiv(reserveY, requestedShares, shareSupply, Rounding.UP), "depositAmounts"),
  };
}

/**
 * Token amounts paid out for burning `burnedShares`, each leg rounded down.
 *
 * @throws InsufficientLiquidityError if more shares are burned than exist
 */
export function withdrawAmounts(
  reserveX: bigint,
  reserveY: bigint,
  shareSupply: bigint,
  burnedShares: bigint
): CurveAmounts {
  if (burnedShares > shareSupply) {
    throw new InsufficientLiquidityError(
      `Cannot burn ${burnedShares} shares from a supply of ${shareSupply}`,
      { burnedShares, shareSupply }
    );
  }

  return {
    amountX: mulDiv(reserveX, burnedShares, shareSupply, Rounding.DOWN),
    amountY: mulDiv(reserveY, burnedShares, shareSupply, Rounding.DOWN),
  };
}

// ============================================
// Swaps
// ============================================

/**
 * Order the reserves as (in, out) for a swap paying into `side`.
 */
export function orientReserves(
  side: Side,
  snapshot: PoolSnapshot
): { reserveIn: bigint; reserveOut: bigint } {
  return side === Side.X
    ? { reserveIn: snapshot.reserveX, reserveOut: snapshot.reserveY }
    : { reserveIn: snapshot.reserveY, reserveOut: snapshot.reserveX };
}

/**
 * Input left after the fee: floor(inputAmount * (10000 - feeBps) / 10000)
 */
export function effectiveInput(inputAmount: bigint, feeBps: number): bigint {
  assertFeeBps(feeBps);
  return mulDiv(inputAmount, BPS_DENOMINATOR - BigInt(feeBps), BPS_DENOMINATOR);
}

/**
 * Constant-product output for `inputAmount` paid into `side`, without any
 * slippage bound.
 *
 * output = reserveOut - floor(reserveIn * reserveOut / (reserveIn + effectiveInput))
 *
 * capped at reserveOut - ceil(reserveIn * reserveOut / (reserveIn + inputAmount)),
 * so the product of the next reserves is never below the current one.
 *
 * @throws UndefinedPriceError if either reserve is empty
 * @throws InvalidAmountError if the fee consumes the whole input
 * @throws InsufficientLiquidityError if the output would drain the reserve
 */
export function swapOutput(side: Side, inputAmount: bigint, snapshot: PoolSnapshot): SwapAmounts {
  const { reserveIn, reserveOut } = orientReserves(side, snapshot);
  if (reserveIn === 0n || reserveOut === 0n) {
    throw new UndefinedPriceError(reserveIn, reserveOut);
  }
  if (inputAmount <= 0n) {
    throw new InvalidAmountError("inputAmount must be greater than zero", { inputAmount });
  }

  const effective = effectiveInput(inputAmount, snapshot.feeBps);
  if (effective === 0n) {
    throw new InvalidAmountError("Fee consumes the entire input", {
      inputAmount,
      feeBps: snapshot.feeBps,
    });
  }

  const k = checkedMul(reserveIn, reserveOut);
  const remaining = checkedDiv(k, checkedAdd(reserveIn, effective));
  const curveOutput = checkedSub(reserveOut, remaining);

  if (curveOutput >= reserveOut) {
    throw new InsufficientLiquidityError("Swap would drain the output reserve", {
      output: curveOutput,
      reserveOut,
    });
  }

  // Never pay past the point where (reserveIn + inputAmount) * reserveOut' < k
  const minRemaining = ceilDiv(k, checkedAdd(reserveIn, inputAmount));
  const maxOutput = checkedSub(reserveOut, minRemaining);

  return { deposit: inputAmount, withdraw: curveOutput < maxOutput ? curveOutput : maxOutput };
}

/**
 * Swap pricing with the caller's minimum output applied.
 *
 * @throws SlippageExceededError if the output is below minOutput
 */
export function swapAmounts(
  side: Side,
  inputAmount: bigint,
  minOutput: bigint,
  snapshot: PoolSnapshot
): SwapAmounts {
  const amounts = swapOutput(side, inputAmount, snapshot);
  assertSwapBounds(amounts.withdraw, minOutput);
  return amounts;
}

/**
 * Smallest input paid into `side` whose swapOutput is at least `outputAmount`.
 *
 * @throws InsufficientLiquidityError if outputAmount is not below the output reserve
 * @throws InvalidAmountError if outputAmount is zero or the fee is 100%
 */
export function requiredInput(side: Side, outputAmount: bigint, snapshot: PoolSnapshot): bigint {
  const { reserveIn, reserveOut } = orientReserves(side, snapshot);
  if (reserveIn === 0n || reserveOut === 0n) {
    throw new UndefinedPriceError(reserveIn, reserveOut);
  }
  if (outputAmount <= 0n) {
    throw new InvalidAmountError("outputAmount must be greater than zero", { outputAmount });
  }
  if (outputAmount >= reserveOut) {
    throw new InsufficientLiquidityError("Requested output exceeds the reserve", {
      outputAmount,
      reserveOut,
    });
  }
  assertFeeBps(snapshot.feeBps);
  const feeFactor = BPS_DENOMINATOR - BigInt(snapshot.feeBps);
  if (feeFactor === 0n) {
    throw new InvalidAmountError("Fee consumes every input");
  }

  // floor(k / D) <= reserveOut - outputAmount  <=>  D >= floor(k / (reserveOut - outputAmount + 1)) + 1
  const k = checkedMul(reserveIn, reserveOut);
  const minDenominator = checkedDiv(k, reserveOut - outputAmount + 1n) + 1n;
  const minEffective = minDenominator - reserveIn;
  const curveInput = ceilDiv(checkedMul(minEffective, BPS_DENOMINATOR), feeFactor);

  // The payout cap in swapOutput needs reserveIn + input >= ceil(k / (reserveOut - outputAmount))
  const cappedInput = ceilDiv(k, reserveOut - outputAmount) - reserveIn;

  return toU64(curveInput > cappedInput ? curveInput : cappedInput, "requiredInput");
}

// ============================================
// Prices
// ============================================

/**
 * @throws InvalidAmountError unless precision is an integer in 0-18
 */
export function assertPrecision(precision: number): void {
  if (!Number.isInteger(precision) || precision < 0 || precision > MAX_PRECISION) {
    throw new InvalidAmountError(`Precision must be an integer in 0-${MAX_PRECISION}`, {
      precision,
    });
  }
}

/**
 * Marginal price of the input token in output-token units,
 * scaled by 10^precision and floored.
 *
 * @throws UndefinedPriceError if either reserve is empty
 */
export function spotPrice(
  side: Side,
  snapshot: PoolSnapshot,
  precision: number = LP_DECIMALS
): bigint {
  assertPrecision(precision);
  const { reserveIn, reserveOut } = orientReserves(side, snapshot);
  if (reserveIn === 0n || reserveOut === 0n) {
    throw new UndefinedPriceError(reserveIn, reserveOut);
  }
  return mulDiv(reserveOut, 10n ** BigInt(precision), reserveIn);
}
