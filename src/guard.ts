/**
 * Pool Invariant Guard
 *
 * Policy layer that turns raw curve output into an accept/reject decision.
 * Checks run in a fixed order (lock, request amounts, snapshot, bounds, legs,
 * invariant) and never mutate anything: each either returns or throws.
 */

import { MAX_FEE_BPS, U64_MAX } from "./constants";
import {
  InvalidAmountError,
  InvalidPoolStateError,
  InvariantViolationError,
  PoolLockedError,
  SlippageExceededError,
} from "./errors";
import {
  Side,
  type CurveAmounts,
  type DepositRequest,
  type PoolSnapshot,
  type SwapRequest,
  type WithdrawRequest,
} from "./types";

// ============================================
// Pre-checks
// ============================================

/**
 * @throws PoolLockedError if the administrative lock is engaged
 */
export function assertUnlocked(snapshot: PoolSnapshot): void {
  if (snapshot.locked) throw new PoolLockedError();
}

/**
 * Check that a request value is an unsigned 64-bit integer, optionally non-zero.
 * @throws InvalidAmountError otherwise
 */
export function assertAmount(field: string, value: bigint, nonZero: boolean): void {
  if (value < 0n || value > U64_MAX) {
    throw new InvalidAmountError(`${field} is outside the u64 range`, { field, value });
  }
  if (nonZero && value === 0n) {
    throw new InvalidAmountError(`${field} must be greater than zero`, { field });
  }
}

export function validateDepositRequest(request: DepositRequest): void {
  assertAmount("shareAmount", request.shareAmount, true);
  assertAmount("maxX", request.maxX, false);
  assertAmount("maxY", request.maxY, false);
}

/**
 * A withdrawal needs at least one floor, otherwise a zero-output burn would pass.
 */
export function validateWithdrawRequest(request: WithdrawRequest): void {
  assertAmount("shareAmount", request.shareAmount, true);
  assertAmount("minX", request.minX, false);
  assertAmount("minY", request.minY, false);
  if (request.minX === 0n && request.minY === 0n) {
    throw new InvalidAmountError("Withdrawal needs a non-zero minX or minY");
  }
}

export function validateSwapRequest(request: SwapRequest): void {
  if (request.inputSide !== Side.X && request.inputSide !== Side.Y) {
    throw new InvalidAmountError(`Unknown input side: ${String(request.inputSide)}`);
  }
  assertAmount("inputAmount", request.inputAmount, true);
  assertAmount("minOutput", request.minOutput, false);
}

/**
 * @throws InvalidPoolStateError if the fee is not an integer in 0-10000 bps
 */
export function assertFeeBps(feeBps: number): void {
  if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps > MAX_FEE_BPS) {
    throw new InvalidPoolStateError(`Fee must be an integer in 0-${MAX_FEE_BPS} bps`, { feeBps });
  }
}

/**
 * Structural checks on the snapshot itself: u64 fields, fee range, and the
 * coupling between an empty share supply and empty reserves.
 */
export function assertConsistentSnapshot(snapshot: PoolSnapshot): void {
  const fields = {
    reserveX: snapshot.reserveX,
    reserveY: snapshot.reserveY,
    shareSupply: snapshot.shareSupply,
  };
  for (const [field, value] of Object.entries(fields)) {
    if (value < 0n || value > U64_MAX) {
      throw new InvalidPoolStateError(`${field} is outside the u64 range`, { field, value });
    }
  }
  assertFeeBps(snapshot.feeBps);

  const emptyReserves = snapshot.reserveX === 0n && snapshot.reserveY === 0n;
  if ((snapshot.shareSupply === 0n) !== emptyReserves) {
    throw new InvalidPoolStateError("Share supply and reserves must be empty together", fields);
  }
  if (snapshot.shareSupply > 0n && (snapshot.reserveX === 0n || snapshot.reserveY === 0n)) {
    throw new InvalidPoolStateError("Funded pool has an empty reserve", fields);
  }
}

// ============================================
// Post-checks
// ============================================

/**
 * Deposit must not take more than the caller allowed.
 */
export function assertDepositBounds(amounts: CurveAmounts, request: DepositRequest): void {
  if (amounts.amountX > request.maxX) {
    throw new SlippageExceededError("amountX", request.maxX, amounts.amountX);
  }
  if (amounts.amountY > request.maxY) {
    throw new SlippageExceededError("amountY", request.maxY, amounts.amountY);
  }
}

/**
 * Withdrawal must pay at least the caller's floors.
 */
export function assertWithdrawBounds(amounts: CurveAmounts, request: WithdrawRequest): void {
  if (amounts.amountX < request.minX) {
    throw new SlippageExceededError("amountX", request.minX, amounts.amountX);
  }
  if (amounts.amountY < request.minY) {
    throw new SlippageExceededError("amountY", request.minY, amounts.amountY);
  }
}

export function assertSwapBounds(output: bigint, minOutput: bigint): void {
  if (output < minOutput) {
    throw new SlippageExceededError("output", minOutput, output);
  }
}

/**
 * A zero-value transfer is never a valid outcome of a user operation.
 */
export function assertNonZeroLegs(legs: Record<string, bigint>): void {
  for (const [leg, amount] of Object.entries(legs)) {
    if (amount === 0n) {
      throw new InvalidAmountError(`Operation would move zero on ${leg}`, { leg });
    }
  }
}

/**
 * reserveX * reserveY
 */
export function constantProduct(snapshot: PoolSnapshot): bigint {
  return snapshot.reserveX * snapshot.reserveY;
}

/**
 * @throws InvariantViolationError if the post-trade product is below the pre-trade one
 */
export function assertProductNonDecreasing(before: PoolSnapshot, after: PoolSnapshot): void {
  const k0 = constantProduct(before);
  const k1 = constantProduct(after);
  if (k1 < k0) throw new InvariantViolationError(k0, k1);
}
