/**
 * Pool Operations
 *
 * The three user operations (deposit, withdraw, swap) as single atomic
 * transitions: guard pre-checks, curve computation, guard post-checks, then
 * the ledger instructions and the resulting snapshot. Nothing here performs
 * an effect; a transition is either returned whole or an error is thrown and
 * no instruction exists.
 */

import { U64_MAX } from "./constants";
import { depositAmounts, swapOutput, withdrawAmounts } from "./curve";
import { InvalidPoolStateError } from "./errors";
import { checkedAdd, checkedSub } from "./fixed-point";
import {
  assertConsistentSnapshot,
  assertDepositBounds,
  assertFeeBps,
  assertNonZeroLegs,
  assertProductNonDecreasing,
  assertSwapBounds,
  assertUnlocked,
  assertWithdrawBounds,
  validateDepositRequest,
  validateSwapRequest,
  validateWithdrawRequest,
} from "./guard";
import {
  Side,
  type CurveAmounts,
  type DepositRequest,
  type PoolAccounts,
  type PoolSnapshot,
  type PoolTransition,
  type SwapAmounts,
  type SwapRequest,
  type WithdrawRequest,
} from "./types";

/**
 * State of a freshly initialized pool: empty reserves, no shares, unlocked.
 */
export function createPoolSnapshot(feeBps: number): PoolSnapshot {
  assertFeeBps(feeBps);
  return { reserveX: 0n, reserveY: 0n, shareSupply: 0n, feeBps, locked: false };
}

/**
 * The first deposit into an empty pool sets its price: the depositor's
 * maximums are taken as-is.
 *
 * @throws InvalidPoolStateError if the pool already has shares outstanding
 */
export function initializeBootstrapPrice(
  snapshot: PoolSnapshot,
  maxX: bigint,
  maxY: bigint
): CurveAmounts {
  if (snapshot.shareSupply !== 0n) {
    throw new InvalidPoolStateError("Bootstrap pricing needs an empty pool", {
      shareSupply: snapshot.shareSupply,
    });
  }
  return { amountX: maxX, amountY: maxY };
}

/**
 * Deposit both tokens and mint `shareAmount` shares to `user`.
 */
export function deposit(
  snapshot: PoolSnapshot,
  request: DepositRequest,
  accounts: PoolAccounts,
  user: string
): PoolTransition<CurveAmounts> {
  assertUnlocked(snapshot);
  validateDepositRequest(request);
  assertConsistentSnapshot(snapshot);

  const amounts =
    snapshot.shareSupply === 0n
      ? initializeBootstrapPrice(snapshot, request.maxX, request.maxY)
      : depositAmounts(snapshot.reserveX, snapshot.reserveY, snapshot.shareSupply, request.shareAmount);

  assertDepositBounds(amounts, request);
  assertNonZeroLegs({ amountX: amounts.amountX, amountY: amounts.amountY });

  const next: PoolSnapshot = {
    ...snapshot,
    reserveX: checkedAdd(snapshot.reserveX, amounts.amountX, U64_MAX),
    reserveY: checkedAdd(snapshot.reserveY, amounts.amountY, U64_MAX),
    shareSupply: checkedAdd(snapshot.shareSupply, request.shareAmount, U64_MAX),
  };
  assertProductNonDecreasing(snapshot, next);

  return {
    amounts,
    instructions: [
      { kind: "transfer", token: accounts.tokenX, from: user, to: accounts.vaultX, amount: amounts.amountX },
      { kind: "transfer", token: accounts.tokenY, from: user, to: accounts.vaultY, amount: amounts.amountY },
      { kind: "mint", token: accounts.shareToken, to: user, amount: request.shareAmount },
    ],
    next,
  };
}

/**
 * Burn `shareAmount` of the user's shares and pay out both tokens.
 */
export function withdraw(
  snapshot: PoolSnapshot,
  request: WithdrawRequest,
  accounts: PoolAccounts,
  user: string
): PoolTransition<CurveAmounts> {
  assertUnlocked(snapshot);
  validateWithdrawRequest(request);
  assertConsistentSnapshot(snapshot);

  const amounts = withdrawAmounts(
    snapshot.reserveX,
    snapshot.reserveY,
    snapshot.shareSupply,
    request.shareAmount
  );

  assertWithdrawBounds(amounts, request);
  assertNonZeroLegs({ amountX: amounts.amountX, amountY: amounts.amountY });

  // Burning the whole supply pays out the whole of both reserves
  const next: PoolSnapshot = {
    ...snapshot,
    reserveX: checkedSub(snapshot.reserveX, amounts.amountX, U64_MAX),
    reserveY: checkedSub(snapshot.reserveY, amounts.amountY, U64_MAX),
    shareSupply: checkedSub(snapshot.shareSupply, request.shareAmount, U64_MAX),
  };

  return {
    amounts,
    instructions: [
      { kind: "transfer", token: accounts.tokenX, from: accounts.vaultX, to: user, amount: amounts.amountX },
      { kind: "transfer", token: accounts.tokenY, from: accounts.vaultY, to: user, amount: amounts.amountY },
      { kind: "burn", token: accounts.shareToken, from: user, amount: request.shareAmount },
    ],
    next,
  };
}

/**
 * Pay `inputAmount` into one side and receive the opposite token.
 *
 * The curve is evaluated once against the pre-trade snapshot; the input does
 * not move the reserve used to price its own payout.
 */
export function swap(
  snapshot: PoolSnapshot,
  request: SwapRequest,
  accounts: PoolAccounts,
  user: string
): PoolTransition<SwapAmounts> {
  assertUnlocked(snapshot);
  validateSwapRequest(request);
  assertConsistentSnapshot(snapshot);

  const amounts = swapOutput(request.inputSide, request.inputAmount, snapshot);

  assertSwapBounds(amounts.withdraw, request.minOutput);
  assertNonZeroLegs({ deposit: amounts.deposit, withdraw: amounts.withdraw });

  const isX = request.inputSide === Side.X;
  const next: PoolSnapshot = isX
    ? {
        ...snapshot,
        reserveX: checkedAdd(snapshot.reserveX, amounts.deposit, U64_MAX),
        reserveY: checkedSub(snapshot.reserveY, amounts.withdraw, U64_MAX),
      }
    : {
        ...snapshot,
        reserveX: checkedSub(snapshot.reserveX, amounts.withdraw, U64_MAX),
        reserveY: checkedAdd(snapshot.reserveY, amounts.deposit, U64_MAX),
      };
  assertProductNonDecreasing(snapshot, next);

  return {
    amounts,
    instructions: [
      {
        kind: "transfer",
        token: isX ? accounts.tokenX : accounts.tokenY,
        from: user,
        to: isX ? accounts.vaultX : accounts.vaultY,
        amount: amounts.deposit,
      },
      {
        kind: "transfer",
        token: isX ? accounts.tokenY : accounts.tokenX,
        from: isX ? accounts.vaultY : accounts.vaultX,
        to: user,
        amount: amounts.withdraw,
      },
    ],
    next,
  };
}
