/**
 * Shared constants used across the pool core.
 *
 * Widths mirror the unsigned integer types the pool accounts store.
 */

// ============================================
// Integer Widths
// ============================================

/** Largest value a reserve, share supply or request amount may take (2^64 - 1) */
export const U64_MAX = (1n << 64n) - 1n;

/** Largest intermediate product allowed in curve math (2^128 - 1) */
export const U128_MAX = (1n << 128n) - 1n;

// ============================================
// Fees
// ============================================

/** Basis points denominator (10000 = 100%) */
export const BPS_DENOMINATOR = 10000n;

/** Highest fee a pool may charge, in basis points */
export const MAX_FEE_BPS = 10000;

// ============================================
// Precision
// ============================================

/** Decimals of the share token; token X and Y amounts use the same scale */
export const LP_DECIMALS = 6;

/** Upper bound accepted for any precision argument */
export const MAX_PRECISION = 18;

// ============================================
// Slippage
// ============================================

/** Default slippage in basis points (50 = 0.5%) */
export const DEFAULT_SLIPPAGE_BPS = 50;

/** Minimum allowed slippage in basis points (0 = exact) */
export const MIN_SLIPPAGE_BPS = 0;

/** Maximum allowed slippage in basis points (5000 = 50%) */
export const MAX_SLIPPAGE_BPS = 5000;
