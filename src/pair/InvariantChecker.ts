/**
 * Pure checks guarding every reserve write.
 * Each returns false instead of throwing; the pair maps failures to errors.
 */

import { MAX_UINT112 } from '../math/uint.js';

// 0.3% aggregate fee retained in the pool: balance * 1000 - amountIn * 3
export const SWAP_FEE_NUMERATOR = 3n;
export const SWAP_FEE_DENOMINATOR = 1000n;

export function adjustedBalance(balance: bigint, amountIn: bigint): bigint {
    return balance * SWAP_FEE_DENOMINATOR - amountIn * SWAP_FEE_NUMERATOR;
}

/**
 * Fee-adjusted constant product must not fall below the pre-swap product.
 */
export function validateSwap(
    balance0: bigint,
    balance1: bigint,
    amount0In: bigint,
    amount1In: bigint,
    reserve0: bigint,
    reserve1: bigint
): boolean {
    const balance0Adjusted = adjustedBalance(balance0, amount0In);
    const balance1Adjusted = adjustedBalance(balance1, amount1In);
    if (balance0Adjusted < 0n || balance1Adjusted < 0n) return false;
    return balance0Adjusted * balance1Adjusted >= reserve0 * reserve1 * SWAP_FEE_DENOMINATOR * SWAP_FEE_DENOMINATOR;
}

/** A side can never be fully drained. */
export function validateOutputAmounts(amount0Out: bigint, amount1Out: bigint, reserve0: bigint, reserve1: bigint): boolean {
    return amount0Out >= 0n && amount1Out >= 0n && amount0Out < reserve0 && amount1Out < reserve1;
}

export function validateReserveOverflow(balance0: bigint, balance1: bigint): boolean {
    return balance0 >= 0n && balance1 >= 0n && balance0 <= MAX_UINT112 && balance1 <= MAX_UINT112;
}

/** Balances must be positive and cover the fees already carved out. */
export function validateSync(balance0: bigint, balance1: bigint, accumulatedFee0: bigint, accumulatedFee1: bigint): boolean {
    return balance0 > 0n && balance1 > 0n && balance0 >= accumulatedFee0 && balance1 >= accumulatedFee1;
}

export const InvariantChecker = {
    validateSwap,
    validateOutputAmounts,
    validateReserveOverflow,
    validateSync,
} as const;
