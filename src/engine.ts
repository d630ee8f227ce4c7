/**
 * PoolEngine -- runs pool operations against a live state source and settles
 * them through a TokenLedger.
 *
 * Each call reads one consistent snapshot, computes the transition, and hands
 * every instruction to the ledger in a single atomic unit. A rejection at any
 * step leaves the ledger untouched. Nothing is retried: the caller decides
 * whether to resubmit with a fresh snapshot or new bounds.
 */

import { LP_DECIMALS } from "./constants";
import { toPoolError } from "./errors";
import { executeInstructions, type TokenLedger } from "./ledger";
import { deposit, swap, withdraw } from "./pool";
import { quoteSwap, sharePrice, type SwapQuote } from "./quote";
import type {
  CurveAmounts,
  DepositRequest,
  Logger,
  PoolAccounts,
  PoolFailure,
  PoolSnapshot,
  PoolTransition,
  Result,
  Side,
  SwapAmounts,
  SwapRequest,
  WithdrawRequest,
} from "./types";

/**
 * Returns the current, consistent pool state.
 */
export type PoolStateReader = () => PoolSnapshot;

/**
 * Engine configuration.
 */
export interface PoolEngineConfig {
  /** Optional logger for operation instrumentation. */
  logger?: Logger;
  /** Decimal scale for quoted prices (defaults to LP_DECIMALS) */
  precision?: number;
}

export class PoolEngine {
  readonly config: PoolEngineConfig;
  private readonly readState: PoolStateReader;
  private readonly ledger: TokenLedger;
  private readonly accounts: PoolAccounts;

  constructor(
    readState: PoolStateReader,
    ledger: TokenLedger,
    accounts: PoolAccounts,
    config: PoolEngineConfig = {},
  ) {
    this.readState = readState;
    this.ledger = ledger;
    this.accounts = accounts;
    this.config = config;
  }

  private get precision(): number {
    return this.config.precision ?? LP_DECIMALS;
  }

  deposit(user: string, request: DepositRequest): Result<PoolTransition<CurveAmounts>> {
    return this.settle("deposit", user, (snapshot) =>
      deposit(snapshot, request, this.accounts, user),
    );
  }

  withdraw(user: string, request: WithdrawRequest): Result<PoolTransition<CurveAmounts>> {
    return this.settle("withdraw", user, (snapshot) =>
      withdraw(snapshot, request, this.accounts, user),
    );
  }

  swap(user: string, request: SwapRequest): Result<PoolTransition<SwapAmounts>> {
    return this.settle("swap", user, (snapshot) =>
      swap(snapshot, request, this.accounts, user),
    );
  }

  /**
   * Quote a swap against the current state without settling anything.
   */
  quoteSwap(side: Side, inputAmount: bigint): Result<SwapQuote> {
    return this.read("quoteSwap", (snapshot) =>
      quoteSwap(snapshot, side, inputAmount, this.precision),
    );
  }

  /**
   * Value of one whole share in each token.
   */
  sharePrice(): Result<CurveAmounts> {
    return this.read("sharePrice", (snapshot) => sharePrice(snapshot, this.precision));
  }

  private read<T>(operation: string, compute: (snapshot: PoolSnapshot) => T): Result<T> {
    try {
      return { success: true, data: compute(this.readState()) };
    } catch (err) {
      return this.fail(operation, err);
    }
  }

  private settle<A>(
    operation: string,
    user: string,
    compute: (snapshot: PoolSnapshot) => PoolTransition<A>,
  ): Result<PoolTransition<A>> {
    try {
      const transition = compute(this.readState());
      this.config.logger?.debug(`${operation}: transition computed`, {
        user,
        amounts: transition.amounts,
      });

      executeInstructions(this.ledger, transition.instructions);

      this.config.logger?.info(`${operation}: committed`, {
        user,
        instructions: transition.instructions.length,
      });
      return { success: true, data: transition };
    } catch (err) {
      return this.fail(operation, err);
    }
  }

  private fail(operation: string, err: unknown): { success: false; error: PoolFailure } {
    const poolError = toPoolError(err);
    this.config.logger?.error(`${operation}: rejected (${poolError.code})`, poolError);
    return {
      success: false,
      error: { code: poolError.code, message: poolError.message, details: poolError.details },
    };
  }
}
