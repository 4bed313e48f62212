/**
 * Quote helpers for callers that talk to a pair directly.
 * Mirrors the pair's 0.3% fee-adjusted invariant, so an output computed here
 * is the largest one `swap` accepts.
 */

import { PairError } from '../errors/index.js';
import { isZeroAddress, normalizeAddress, sameAddress, type Address } from '../utils/address.js';
import { SWAP_FEE_DENOMINATOR, SWAP_FEE_NUMERATOR } from './InvariantChecker.js';

const FEE_MULTIPLIER = SWAP_FEE_DENOMINATOR - SWAP_FEE_NUMERATOR; // 997

/** Canonical ordering: lower lowercase hex address first. */
export function sortTokens(tokenA: Address, tokenB: Address): [Address, Address] {
    if (sameAddress(tokenA, tokenB)) {
        throw new PairError('IdenticalAddresses', `Identical token addresses: ${tokenA}`);
    }
    const a = normalizeAddress(tokenA);
    const b = normalizeAddress(tokenB);
    const [token0, token1] = a < b ? [a, b] : [b, a];
    if (isZeroAddress(token0)) {
        throw new PairError('ZeroAddress', 'Token address must be a non-zero address');
    }
    return [token0, token1];
}

/** Amount of the other asset with equal value at the current reserve ratio. */
export function quote(amountA: bigint, reserveA: bigint, reserveB: bigint): bigint {
    if (amountA <= 0n) throw new PairError('InsufficientInputAmount');
    if (reserveA <= 0n || reserveB <= 0n) throw new PairError('InsufficientLiquidity');
    return (amountA * reserveB) / reserveA;
}

export function getAmountOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
    if (amountIn <= 0n) throw new PairError('InsufficientInputAmount');
    if (reserveIn <= 0n || reserveOut <= 0n) throw new PairError('InsufficientLiquidity');
    const amountInWithFee = amountIn * FEE_MULTIPLIER;
    const numerator = amountInWithFee * reserveOut;
    const denominator = reserveIn * SWAP_FEE_DENOMINATOR + amountInWithFee;
    return numerator / denominator;
}

export function getAmountIn(amountOut: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
    if (amountOut <= 0n) throw new PairError('InsufficientOutputAmount');
    if (reserveIn <= 0n || reserveOut <= 0n || amountOut >= reserveOut) {
        throw new PairError('InsufficientLiquidity');
    }
    const numerator = reserveIn * amountOut * SWAP_FEE_DENOMINATOR;
    const denominator = (reserveOut - amountOut) * FEE_MULTIPLIER;
    return numerator / denominator + 1n;
}
