/**
 * Data model shared by the curve, guard, orchestrator and ledger layers.
 */

import type { PoolErrorCode } from "./errors";

/**
 * Side of the pool a swap pays into.
 */
export enum Side {
  X = "X",
  Y = "Y",
}

/**
 * Read-only view of pool state, owned by the account layer.
 */
export interface PoolSnapshot {
  /** Token X held by the pool vault */
  reserveX: bigint;
  /** Token Y held by the pool vault */
  reserveY: bigint;
  /** Outstanding LP shares */
  shareSupply: bigint;
  /** Swap fee in basis points (0-10000) */
  feeBps: number;
  /** Administrative lock; every operation rejects while set */
  locked: boolean;
}

export interface DepositRequest {
  /** LP shares the user wants to receive */
  shareAmount: bigint;
  maxX: bigint;
  maxY: bigint;
}

export interface WithdrawRequest {
  /** LP shares to burn */
  shareAmount: bigint;
  minX: bigint;
  minY: bigint;
}

export interface SwapRequest {
  inputSide: Side;
  inputAmount: bigint;
  minOutput: bigint;
}

/**
 * Token amounts moved by a deposit or withdrawal.
 */
export interface CurveAmounts {
  amountX: bigint;
  amountY: bigint;
}

/**
 * Token amounts moved by a swap.
 */
export interface SwapAmounts {
  /** Amount taken in on the input side */
  deposit: bigint;
  /** Amount paid out on the opposite side, after fee */
  withdraw: bigint;
}

/**
 * Identifiers of the token mints and vaults a pool instance uses.
 * Opaque to the core; only the ledger interprets them.
 */
export interface PoolAccounts {
  tokenX: string;
  tokenY: string;
  shareToken: string;
  vaultX: string;
  vaultY: string;
}

export interface TransferInstruction {
  kind: "transfer";
  token: string;
  from: string;
  to: string;
  amount: bigint;
}

export interface MintInstruction {
  kind: "mint";
  token: string;
  to: string;
  amount: bigint;
}

export interface BurnInstruction {
  kind: "burn";
  token: string;
  from: string;
  amount: bigint;
}

/**
 * Effect the custody layer must perform for an accepted operation.
 */
export type LedgerInstruction = TransferInstruction | MintInstruction | BurnInstruction;

/**
 * Outcome of one accepted operation: the amounts, the effects that move them,
 * and the snapshot that results once every effect has been applied.
 */
export interface PoolTransition<A = CurveAmounts> {
  amounts: A;
  instructions: LedgerInstruction[];
  next: PoolSnapshot;
}

/**
 * Structured error surfaced across the engine boundary.
 */
export interface PoolFailure {
  code: PoolErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Result wrapper for engine operations.
 */
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: PoolFailure };

/**
 * Logger interface for engine instrumentation.
 *
 * Defaults to undefined (no logging). The pure curve and guard layers never log.
 */
export interface Logger {
  /** Debug-level log for computed transitions. */
  debug(msg: string, data?: unknown): void;
  /** Info-level log for committed operations. */
  info(msg: string, data?: unknown): void;
  /** Error-level log for rejected operations and ledger failures. */
  error(msg: string, err?: unknown): void;
}
