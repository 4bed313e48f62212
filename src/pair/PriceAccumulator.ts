/**
 * Cumulative price bookkeeping for TWAP consumers.
 *
 * Accumulates the price that prevailed since the last update, so it must run
 * once per state-mutating entry point BEFORE reserves change.
 */

import { encode, uqdiv } from '../math/UQ112x112.js';
import { toUint32, wrappingAdd256, wrappingSub32, wrappingSub256 } from '../math/uint.js';

export interface AccumulatorState {
    price0CumulativeLast: bigint;
    price1CumulativeLast: bigint;
    blockTimestampLast: number;
}

export interface PriceObservation {
    price0Cumulative: bigint;
    price1Cumulative: bigint;
    blockTimestamp: number;
}

/** Block time truncated to 32 bits. */
export function blockTimestamp32(now: number): number {
    return Number(toUint32(now));
}

/** Seconds between two 32-bit timestamps, correct across the 2^32 wrap. */
export function elapsedSince(blockTimestamp: number, blockTimestampLast: number): number {
    return Number(wrappingSub32(BigInt(blockTimestamp), BigInt(blockTimestampLast)));
}

/**
 * Returns the accumulator after the interval ending at `now`.
 * `reserve0` / `reserve1` are the reserves BEFORE the pending update.
 */
export function accumulate(state: AccumulatorState, reserve0: bigint, reserve1: bigint, now: number): AccumulatorState {
    const blockTimestamp = blockTimestamp32(now);
    const timeElapsed = elapsedSince(blockTimestamp, state.blockTimestampLast);

    let { price0CumulativeLast, price1CumulativeLast } = state;
    if (timeElapsed > 0 && reserve0 !== 0n && reserve1 !== 0n) {
        const elapsed = BigInt(timeElapsed);
        // overflow is desired
        price0CumulativeLast = wrappingAdd256(price0CumulativeLast, uqdiv(encode(reserve1), reserve0) * elapsed);
        price1CumulativeLast = wrappingAdd256(price1CumulativeLast, uqdiv(encode(reserve0), reserve1) * elapsed);
    }

    return { price0CumulativeLast, price1CumulativeLast, blockTimestampLast: blockTimestamp };
}

/**
 * Cumulative prices as of `now` without writing anything: the stored value
 * plus the counterfactual accumulation since the last update.
 */
export function currentCumulativePrices(
    state: AccumulatorState,
    reserve0: bigint,
    reserve1: bigint,
    now: number
): PriceObservation {
    const next = accumulate(state, reserve0, reserve1, now);
    return {
        price0Cumulative: next.price0CumulativeLast,
        price1Cumulative: next.price1CumulativeLast,
        blockTimestamp: next.blockTimestampLast,
    };
}

/**
 * Average price between two observations as a UQ112x112.
 */
export function averagePrice(cumulativeStart: bigint, cumulativeEnd: bigint, timeElapsed: number): bigint {
    return wrappingSub256(cumulativeEnd, cumulativeStart) / BigInt(timeElapsed);
}

export const PriceAccumulator = {
    blockTimestamp32,
    elapsedSince,
    accumulate,
    currentCumulativePrices,
    averagePrice,
} as const;
