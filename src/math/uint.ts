/**
 * Unsigned integer helpers over bigint.
 * Bounds mirror the storage widths the pair keeps its fields in.
 */

import { MathError } from '../errors/index.js';

export const Q112 = 1n << 112n;
export const MAX_UINT32 = (1n << 32n) - 1n;
export const MAX_UINT112 = (1n << 112n) - 1n;
export const MAX_UINT224 = (1n << 224n) - 1n;
export const MAX_UINT256 = (1n << 256n) - 1n;

export function isUint(value: bigint, max: bigint = MAX_UINT256): boolean {
    return value >= 0n && value <= max;
}

export function assertUint(value: bigint, max: bigint = MAX_UINT256, label: string = 'value'): bigint {
    if (value < 0n || value > max) {
        throw new MathError('ArithmeticOverflow', `${label} out of range: ${value}`);
    }
    return value;
}

/** Truncates to 32 bits, wrapping like a uint32 cast. */
export function toUint32(value: bigint | number): bigint {
    return BigInt(value) & MAX_UINT32;
}

/** uint32 subtraction that wraps instead of underflowing. */
export function wrappingSub32(a: bigint, b: bigint): bigint {
    return (a - b) & MAX_UINT32;
}

/** uint256 addition that wraps instead of overflowing. */
export function wrappingAdd256(a: bigint, b: bigint): bigint {
    return (a + b) & MAX_UINT256;
}

/** uint256 subtraction that wraps instead of underflowing. */
export function wrappingSub256(a: bigint, b: bigint): bigint {
    return (a - b) & MAX_UINT256;
}

export function min(a: bigint, b: bigint): bigint {
    return a < b ? a : b;
}

// babylonian method
export function sqrt(value: bigint): bigint {
    if (value < 0n) throw new MathError('ArithmeticOverflow', 'Square root of negative number');
    if (value > 3n) {
        let z = value;
        let x = value / 2n + 1n;
        while (x < z) {
            z = x;
            x = (value / x + x) / 2n;
        }
        return z;
    }
    return value === 0n ? 0n : 1n;
}
