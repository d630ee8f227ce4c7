/**
 * Typed error hierarchy for the pool core.
 *
 * Every rejection carries a machine-readable code so the custody layer can
 * decide whether to resubmit with new bounds or abort.
 */

export type PoolErrorCode =
  | "POOL_LOCKED"
  | "INVALID_AMOUNT"
  | "SLIPPAGE_EXCEEDED"
  | "ARITHMETIC_OVERFLOW"
  | "DIVISION_BY_ZERO"
  | "UNDEFINED_PRICE"
  | "INSUFFICIENT_LIQUIDITY"
  | "INVARIANT_VIOLATION"
  | "INVALID_POOL_STATE"
  | "LEDGER_ERROR"
  | "UNKNOWN_ERROR";

type Details = Record<string, unknown>;

/**
 * bigint values do not survive JSON.stringify, so details keep them as strings.
 */
function normalizeDetails(details?: Details): Details | undefined {
  if (!details) return undefined;
  const out: Details = {};
  for (const [key, value] of Object.entries(details)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}

/**
 * Base error class for all pool errors.
 */
export class PoolError extends Error {
  readonly code: PoolErrorCode;
  readonly details?: Details;

  constructor(code: PoolErrorCode, message: string, details?: Details) {
    super(message);
    this.name = "PoolError";
    this.code = code;
    this.details = normalizeDetails(details);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Administrative lock is engaged.
 */
export class PoolLockedError extends PoolError {
  constructor() {
    super("POOL_LOCKED", "Pool is locked");
    this.name = "PoolLockedError";
  }
}

/**
 * Zero or out-of-domain request value.
 */
export class InvalidAmountError extends PoolError {
  constructor(message: string, details?: Details) {
    super("INVALID_AMOUNT", message, details);
    this.name = "InvalidAmountError";
  }
}

/**
 * A computed amount falls outside a caller-supplied bound.
 */
export class SlippageExceededError extends PoolError {
  readonly bound: bigint;
  readonly actual: bigint;

  constructor(field: string, bound: bigint, actual: bigint) {
    super(
      "SLIPPAGE_EXCEEDED",
      `Slippage exceeded on ${field}: bound ${bound}, actual ${actual}`,
      { field, bound, actual },
    );
    this.name = "SlippageExceededError";
    this.bound = bound;
    this.actual = actual;
  }
}

export class ArithmeticOverflowError extends PoolError {
  constructor(operation: string, details?: Details) {
    super("ARITHMETIC_OVERFLOW", `Arithmetic overflow in ${operation}`, {
      operation,
      ...details,
    });
    this.name = "ArithmeticOverflowError";
  }
}

export class DivisionByZeroError extends PoolError {
  constructor(operation: string) {
    super("DIVISION_BY_ZERO", `Division by zero in ${operation}`, { operation });
    this.name = "DivisionByZeroError";
  }
}

/**
 * A reserve on the priced side is empty, so no exchange rate exists.
 */
export class UndefinedPriceError extends PoolError {
  constructor(reserveIn: bigint, reserveOut: bigint) {
    super(
      "UNDEFINED_PRICE",
      `Price is undefined for reserves ${reserveIn} / ${reserveOut}`,
      { reserveIn, reserveOut },
    );
    this.name = "UndefinedPriceError";
  }
}

/**
 * The operation needs more than the pool holds.
 */
export class InsufficientLiquidityError extends PoolError {
  constructor(message: string, details?: Details) {
    super("INSUFFICIENT_LIQUIDITY", message, details);
    this.name = "InsufficientLiquidityError";
  }
}

/**
 * Constant product would shrink.
 */
export class InvariantViolationError extends PoolError {
  constructor(productBefore: bigint, productAfter: bigint) {
    super(
      "INVARIANT_VIOLATION",
      `Constant product would decrease from ${productBefore} to ${productAfter}`,
      { productBefore, productAfter },
    );
    this.name = "InvariantViolationError";
  }
}

/**
 * The snapshot handed in breaks a structural pool invariant.
 */
export class InvalidPoolStateError extends PoolError {
  constructor(message: string, details?: Details) {
    super("INVALID_POOL_STATE", message, details);
    this.name = "InvalidPoolStateError";
  }
}

/**
 * A transfer, mint or burn could not be executed by the ledger.
 */
export class LedgerError extends PoolError {
  constructor(message: string, details?: Details) {
    super("LEDGER_ERROR", message, details);
    this.name = "LedgerError";
  }
}

/**
 * Map a raw throwable to a PoolError, keeping typed errors intact.
 */
export function toPoolError(err: unknown): PoolError {
  if (err instanceof PoolError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new PoolError("UNKNOWN_ERROR", message, { originalError: err });
}

/**
 * True when resubmitting with adjusted bounds can succeed against the same pool.
 * Lock, liquidity and arithmetic failures call for aborting instead.
 */
export function isRetryableWithNewBounds(err: unknown): boolean {
  return err instanceof SlippageExceededError;
}
