/**
 * 112.112 binary fixed point.
 *
 * A UQ112x112 value is a bigint holding `real * 2^112`. Range [0, 2^112 - 1]
 * with resolution 1 / 2^112. Products against a uint are UQ144x112 values.
 */

import { MathError } from '../errors/index.js';
import { MAX_UINT112, MAX_UINT224, MAX_UINT256, Q112 } from './uint.js';

export const RESOLUTION = 112n;

export type UQ112x112 = bigint;
export type UQ144x112 = bigint;

export function encode(y: bigint): UQ112x112 {
    if (y < 0n || y > MAX_UINT112) {
        throw new MathError('ArithmeticOverflow', `encode: ${y} does not fit in 112 bits`);
    }
    return y * Q112;
}

export function decode(x: UQ112x112): bigint {
    return x >> RESOLUTION;
}

export function decode144(x: UQ144x112): bigint {
    return x >> RESOLUTION;
}

/** Divides a UQ112x112 by a uint112, returning a UQ112x112. */
export function uqdiv(x: UQ112x112, y: bigint): UQ112x112 {
    if (y === 0n) {
        throw new MathError('DivisionByZero', 'uqdiv: division by zero');
    }
    return x / y;
}

export const div = uqdiv;

/**
 * Multiplies a UQ112x112 by a uint, returning a UQ144x112.
 * The product is taken modulo 2^256 and must divide back to `x`.
 */
export function mul(x: UQ112x112, y: bigint): UQ144x112 {
    const z = (x * y) & MAX_UINT256;
    if (y !== 0n && z / y !== x) {
        throw new MathError('ArithmeticOverflow', 'mul: overflow', { x: x.toString(), y: y.toString() });
    }
    return z;
}

/** Builds a UQ112x112 directly from numerator / denominator. */
export function fraction(numerator: bigint, denominator: bigint): UQ112x112 {
    if (denominator === 0n) {
        throw new MathError('DivisionByZero', 'fraction: division by zero');
    }
    const result = (numerator << RESOLUTION) / denominator;
    if (result > MAX_UINT224) {
        throw new MathError('ArithmeticOverflow', 'fraction: overflow');
    }
    return result;
}

/** Lossy conversion for display only. */
export function toNumber(x: UQ112x112): number {
    const whole = x >> RESOLUTION;
    const frac = x & (Q112 - 1n);
    return Number(whole) + Number(frac) / Number(Q112);
}

export const UQ112x112 = {
    RESOLUTION,
    encode,
    decode,
    decode144,
    uqdiv,
    div,
    mul,
    fraction,
    toNumber,
} as const;
