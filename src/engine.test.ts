import { describe, it, expect, vi, beforeEach } from "vitest";
import { PoolEngine } from "./engine";
import { MemoryLedger, readSnapshot, type PoolSettings } from "./ledger";
import { Side, type Logger, type PoolAccounts } from "./types";

const accounts: PoolAccounts = {
  tokenX: "token-x",
  tokenY: "token-y",
  shareToken: "lp",
  vaultX: "vault-x",
  vaultY: "vault-y",
};

/**
 * Create a mock Logger where every method is a vi.fn().
 */
function createMockLogger() {
  return {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    error: vi.fn<Logger["error"]>(),
  };
}

describe("PoolEngine", () => {
  let ledger: MemoryLedger;
  let settings: PoolSettings;
  let logger: ReturnType<typeof createMockLogger>;
  let engine: PoolEngine;

  beforeEach(() => {
    ledger = new MemoryLedger();
    settings = { feeBps: 30, locked: false };
    logger = createMockLogger();
    engine = new PoolEngine(() => readSnapshot(ledger, accounts, settings), ledger, accounts, {
      logger,
    });

    ledger.mint("token-x", "alice", 10_000_000n);
    ledger.mint("token-y", "alice", 10_000_000n);
  });

  function bootstrap(): void {
    const result = engine.deposit("alice", {
      shareAmount: 1_000_000n,
      maxX: 1_000_000n,
      maxY: 1_000_000n,
    });
    expect(result.success).toBe(true);
  }

  it("should settle a bootstrap deposit into the vaults", () => {
    bootstrap();

    expect(ledger.balanceOf("token-x", "vault-x")).toBe(1_000_000n);
    expect(ledger.balanceOf("token-y", "vault-y")).toBe(1_000_000n);
    expect(ledger.balanceOf("lp", "alice")).toBe(1_000_000n);
    expect(logger.info).toHaveBeenCalledWith("deposit: committed", {
      user: "alice",
      instructions: 3,
    });
  });

  it("should settle a swap against the live reserves", () => {
    bootstrap();
    const result = engine.swap("alice", { inputSide: Side.X, inputAmount: 10_000n, minOutput: 9_000n });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.amounts).toEqual({ deposit: 10_000n, withdraw: 9_872n });
    expect(ledger.balanceOf("token-x", "vault-x")).toBe(1_010_000n);
    expect(ledger.balanceOf("token-y", "vault-y")).toBe(990_128n);
    expect(ledger.balanceOf("token-y", "alice")).toBe(9_009_872n);
    expect(logger.debug).toHaveBeenCalledWith("swap: transition computed", {
      user: "alice",
      amounts: { deposit: 10_000n, withdraw: 9_872n },
    });
  });

  it("should withdraw back to the user and burn shares", () => {
    bootstrap();
    const result = engine.withdraw("alice", { shareAmount: 500_000n, minX: 1n, minY: 1n });

    expect(result.success).toBe(true);
    expect(ledger.balanceOf("token-x", "alice")).toBe(9_500_000n);
    expect(ledger.totalSupply("lp")).toBe(500_000n);
  });

  it("should surface the lock as a failed result", () => {
    bootstrap();
    settings.locked = true;
    const result = engine.swap("alice", { inputSide: Side.X, inputAmount: 10_000n, minOutput: 0n });

    expect(result).toEqual({
      success: false,
      error: { code: "POOL_LOCKED", message: "Pool is locked", details: undefined },
    });
    expect(logger.error).toHaveBeenCalledWith("swap: rejected (POOL_LOCKED)", expect.anything());
    expect(ledger.balanceOf("token-x", "vault-x")).toBe(1_000_000n);
  });

  it("should report slippage with its bounds", () => {
    bootstrap();
    const result = engine.swap("alice", { inputSide: Side.X, inputAmount: 10_000n, minOutput: 9_900n });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe("SLIPPAGE_EXCEEDED");
    expect(result.error.details).toEqual({ field: "output", bound: "9900", actual: "9872" });
  });

  it("should roll back every leg when the ledger rejects one", () => {
    bootstrap();
    // bob can pay X but holds no Y
    ledger.mint("token-x", "bob", 1_000n);
    const result = engine.deposit("bob", { shareAmount: 1_000n, maxX: 1_000n, maxY: 1_000n });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe("LEDGER_ERROR");
    expect(ledger.balanceOf("token-x", "bob")).toBe(1_000n);
    expect(ledger.balanceOf("token-x", "vault-x")).toBe(1_000_000n);
    expect(ledger.totalSupply("lp")).toBe(1_000_000n);
  });

  it("should quote without settling", () => {
    bootstrap();
    const result = engine.quoteSwap(Side.X, 10_000n);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.amountOut).toBe(9_872n);
    expect(ledger.balanceOf("token-x", "vault-x")).toBe(1_000_000n);
  });

  it("should price shares at the configured precision", () => {
    bootstrap();
    const precise = new PoolEngine(() => readSnapshot(ledger, accounts, settings), ledger, accounts, {
      precision: 2,
    });

    expect(engine.sharePrice()).toEqual({
      success: true,
      data: { amountX: 1_000_000n, amountY: 1_000_000n },
    });
    expect(precise.sharePrice()).toEqual({ success: true, data: { amountX: 100n, amountY: 100n } });
  });

  it("should run silently without a logger", () => {
    const silent = new PoolEngine(() => readSnapshot(ledger, accounts, settings), ledger, accounts);
    expect(silent.config.logger).toBeUndefined();

    const result = silent.deposit("alice", { shareAmount: 0n, maxX: 1n, maxY: 1n });
    expect(result.success).toBe(false);
  });
});
