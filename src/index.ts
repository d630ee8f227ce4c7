/**
 * constant-product-pool
 *
 * Pricing and accounting core for a two-asset x * y = k liquidity pool with a
 * basis-point swap fee. Exact bigint arithmetic throughout.
 *
 * @example Pure transitions
 * ```typescript
 * import { pool, Side } from 'constant-product-pool';
 *
 * const accounts = { tokenX: 'X', tokenY: 'Y', shareToken: 'LP', vaultX: 'vault-x', vaultY: 'vault-y' };
 * const snapshot = { reserveX: 1_000_000n, reserveY: 1_000_000n, shareSupply: 1_000_000n, feeBps: 30, locked: false };
 *
 * const { amounts, instructions, next } = pool.swap(
 *   snapshot,
 *   { inputSide: Side.X, inputAmount: 10_000n, minOutput: 9_000n },
 *   accounts,
 *   'alice',
 * );
 * // amounts => { deposit: 10000n, withdraw: 9872n }
 * ```
 *
 * @example Settling through a ledger
 * ```typescript
 * import { MemoryLedger, PoolEngine, readSnapshot } from 'constant-product-pool';
 *
 * const ledger = new MemoryLedger();
 * const engine = new PoolEngine(
 *   () => readSnapshot(ledger, accounts, { feeBps: 30, locked: false }),
 *   ledger,
 *   accounts,
 *   { logger: console },
 * );
 * const result = engine.deposit('alice', { shareAmount: 1_000n, maxX: 1_000n, maxY: 1_000n });
 * ```
 *
 * @packageDocumentation
 */

export * as fixedPoint from "./fixed-point";
export * as curve from "./curve";
export * as guard from "./guard";
export * as pool from "./pool";
export * as quote from "./quote";

export {
  createPoolSnapshot,
  initializeBootstrapPrice,
  deposit,
  withdraw,
  swap,
} from "./pool";
export { quoteSwap, quoteDeposit, quoteWithdraw, sharePrice } from "./quote";
export type { SwapQuote } from "./quote";

export { PoolEngine } from "./engine";
export type { PoolEngineConfig, PoolStateReader } from "./engine";

export { MemoryLedger, executeInstructions, readSnapshot } from "./ledger";
export type { LedgerReader, PoolSettings, TokenLedger } from "./ledger";

export * from "./errors";
export * from "./constants";
export { Side } from "./types";
export type {
  BurnInstruction,
  CurveAmounts,
  DepositRequest,
  LedgerInstruction,
  Logger,
  MintInstruction,
  PoolAccounts,
  PoolFailure,
  PoolSnapshot,
  PoolTransition,
  Result,
  SwapAmounts,
  SwapRequest,
  TransferInstruction,
  WithdrawRequest,
} from "./types";
