/**
 * Overflow-checked unsigned integer arithmetic.
 *
 * bigint never wraps, so every helper here bounds its result explicitly
 * against the target width and throws instead of producing a value the
 * pool accounts could not store. No floating point is used anywhere.
 */

import { U64_MAX, U128_MAX } from "./constants";
import { ArithmeticOverflowError, DivisionByZeroError } from "./errors";

export { U64_MAX, U128_MAX };

/**
 * Direction to round a non-exact quotient.
 */
export enum Rounding {
  DOWN = "down",
  UP = "up",
}

function assertOperand(operation: string, value: bigint, max: bigint): void {
  if (value < 0n || value > max) {
    throw new ArithmeticOverflowError(operation, { value, max });
  }
}

function bound(operation: string, result: bigint, max: bigint): bigint {
  if (result < 0n || result > max) {
    throw new ArithmeticOverflowError(operation, { result, max });
  }
  return result;
}

/**
 * @param max - Width of the result (defaults to u128)
 * @throws ArithmeticOverflowError if a + b exceeds max
 */
export function checkedAdd(a: bigint, b: bigint, max: bigint = U128_MAX): bigint {
  assertOperand("checkedAdd", a, max);
  assertOperand("checkedAdd", b, max);
  return bound("checkedAdd", a + b, max);
}

/**
 * @throws ArithmeticOverflowError if b > a (unsigned underflow)
 */
export function checkedSub(a: bigint, b: bigint, max: bigint = U128_MAX): bigint {
  assertOperand("checkedSub", a, max);
  assertOperand("checkedSub", b, max);
  return bound("checkedSub", a - b, max);
}

/**
 * @param max - Width of the result (defaults to u128)
 * @throws ArithmeticOverflowError if a * b exceeds max
 */
export function checkedMul(a: bigint, b: bigint, max: bigint = U128_MAX): bigint {
  assertOperand("checkedMul", a, max);
  assertOperand("checkedMul", b, max);
  return bound("checkedMul", a * b, max);
}

/**
 * Floor division.
 * @throws DivisionByZeroError if b is zero
 */
export function checkedDiv(a: bigint, b: bigint, max: bigint = U128_MAX): bigint {
  assertOperand("checkedDiv", a, max);
  assertOperand("checkedDiv", b, max);
  if (b === 0n) throw new DivisionByZeroError("checkedDiv");
  return a / b;
}

/**
 * Ceiling division: smallest q with q * b >= a.
 * @throws DivisionByZeroError if b is zero
 */
export function ceilDiv(a: bigint, b: bigint, max: bigint = U128_MAX): bigint {
  const q = checkedDiv(a, b, max);
  return a % b === 0n ? q : q + 1n;
}

/**
 * Compute a * b / d with a u128 intermediate.
 *
 * @param rounding - Round the quotient down (floor) or up (ceiling)
 * @throws ArithmeticOverflowError if a * b does not fit u128
 * @throws DivisionByZeroError if d is zero
 */
export function mulDiv(
  a: bigint,
  b: bigint,
  d: bigint,
  rounding: Rounding = Rounding.DOWN
): bigint {
  const product = checkedMul(a, b);
  return rounding === Rounding.UP ? ceilDiv(product, d) : checkedDiv(product, d);
}

/**
 * Narrow a value to u64.
 * @throws ArithmeticOverflowError if value is negative or above 2^64 - 1
 */
export function toU64(value: bigint, operation: string = "toU64"): bigint {
  return bound(operation, value, U64_MAX);
}

/**
 * Floor of the square root, by Newton's method.
 *
 * Monotonic: larger input never yields a smaller root.
 *
 * @throws ArithmeticOverflowError if n is negative
 */
export function integerSqrt(n: bigint): bigint {
  if (n < 0n) throw new ArithmeticOverflowError("integerSqrt", { value: n });
  if (n < 2n) return n;

  // Start above the root so the iteration decreases monotonically
  let x = 1n << (BigInt(n.toString(2).length + 1) >> 1n);
  while (true) {
    const y = (x + n / x) >> 1n;
    if (y >= x) return x;
    x = y;
  }
}
