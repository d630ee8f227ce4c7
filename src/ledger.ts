/**
 * Token custody boundary.
 *
 * The core decides what moves and in which direction; a TokenLedger performs
 * it. MemoryLedger is an in-process implementation for simulations and tests.
 */

import { U64_MAX } from "./constants";
import { LedgerError } from "./errors";
import type { LedgerInstruction, PoolAccounts, PoolSnapshot } from "./types";

/**
 * Effect primitives the custody layer provides.
 */
export interface TokenLedger {
  transfer(token: string, from: string, to: string, amount: bigint): void;
  mint(token: string, to: string, amount: bigint): void;
  burn(token: string, from: string, amount: bigint): void;
  /**
   * Run `fn` so that every primitive it calls commits together, or none does
   * if it throws.
   */
  atomic<T>(fn: () => T): T;
}

/**
 * Balance queries needed to rebuild a pool snapshot.
 */
export interface LedgerReader {
  balanceOf(token: string, owner: string): bigint;
  totalSupply(token: string): bigint;
}

/**
 * Pool parameters that live outside token balances.
 */
export interface PoolSettings {
  feeBps: number;
  locked: boolean;
}

/**
 * Apply every instruction of a transition as one unit.
 */
export function executeInstructions(
  ledger: TokenLedger,
  instructions: readonly LedgerInstruction[]
): void {
  ledger.atomic(() => {
    for (const instruction of instructions) {
      switch (instruction.kind) {
        case "transfer":
          ledger.transfer(instruction.token, instruction.from, instruction.to, instruction.amount);
          break;
        case "mint":
          ledger.mint(instruction.token, instruction.to, instruction.amount);
          break;
        case "burn":
          ledger.burn(instruction.token, instruction.from, instruction.amount);
          break;
      }
    }
  });
}

/**
 * Build a snapshot from vault balances and share supply.
 */
export function readSnapshot(
  ledger: LedgerReader,
  accounts: PoolAccounts,
  settings: PoolSettings
): PoolSnapshot {
  return {
    reserveX: ledger.balanceOf(accounts.tokenX, accounts.vaultX),
    reserveY: ledger.balanceOf(accounts.tokenY, accounts.vaultY),
    shareSupply: ledger.totalSupply(accounts.shareToken),
    feeBps: settings.feeBps,
    locked: settings.locked,
  };
}

function assertLedgerAmount(operation: string, amount: bigint): void {
  if (amount < 0n || amount > U64_MAX) {
    throw new LedgerError(`${operation} amount is outside the u64 range`, { operation, amount });
  }
}

/**
 * In-memory ledger with per-token balances and supplies.
 */
export class MemoryLedger implements TokenLedger, LedgerReader {
  private balances = new Map<string, bigint>();
  private supplies = new Map<string, bigint>();

  private static key(token: string, owner: string): string {
    return `${token}/${owner}`;
  }

  balanceOf(token: string, owner: string): bigint {
    return this.balances.get(MemoryLedger.key(token, owner)) ?? 0n;
  }

  totalSupply(token: string): bigint {
    return this.supplies.get(token) ?? 0n;
  }

  transfer(token: string, from: string, to: string, amount: bigint): void {
    assertLedgerAmount("transfer", amount);
    const fromBalance = this.balanceOf(token, from);
    if (fromBalance < amount) {
      throw new LedgerError(`Insufficient ${token} balance for ${from}`, {
        token,
        owner: from,
        balance: fromBalance,
        amount,
      });
    }
    this.balances.set(MemoryLedger.key(token, from), fromBalance - amount);
    this.balances.set(MemoryLedger.key(token, to), this.balanceOf(token, to) + amount);
  }

  mint(token: string, to: string, amount: bigint): void {
    assertLedgerAmount("mint", amount);
    const supply = this.totalSupply(token) + amount;
    if (supply > U64_MAX) {
      throw new LedgerError(`Minting would overflow ${token} supply`, { token, amount });
    }
    this.supplies.set(token, supply);
    this.balances.set(MemoryLedger.key(token, to), this.balanceOf(token, to) + amount);
  }

  burn(token: string, from: string, amount: bigint): void {
    assertLedgerAmount("burn", amount);
    const balance = this.balanceOf(token, from);
    if (balance < amount) {
      throw new LedgerError(`Insufficient ${token} balance to burn for ${from}`, {
        token,
        owner: from,
        balance,
        amount,
      });
    }
    this.balances.set(MemoryLedger.key(token, from), balance - amount);
    this.supplies.set(token, this.totalSupply(token) - amount);
  }

  atomic<T>(fn: () => T): T {
    const balances = new Map(this.balances);
    const supplies = new Map(this.supplies);
    try {
      return fn();
    } catch (err) {
      this.balances = balances;
      this.supplies = supplies;
      throw err;
    }
  }
}
