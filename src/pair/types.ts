import type { Address } from '../utils/address.js';

export type CallbackData = Uint8Array;

export const EMPTY_DATA: CallbackData = new Uint8Array(0);

/**
 * What a pair needs from the factory that created it. Read-only.
 */
export interface PairHost {
    readonly address: Address;
    /** Canonical protocol token used to tell protocol-token pairs from base-asset pairs. */
    getProtocolToken(): Address;
    /** Launcher whose tokens get the launch fee schedule. */
    getLauncher(): Address;
    /** Collector of accumulated protocol fees. */
    getFeeTo(): Address;
    /** Recipient of the liquidity-growth fee for `pair`, or undefined while it is off. */
    feeToFor(pair: Address): Address | undefined;
}

/**
 * Flash-swap receiver. Called mid-swap after the optimistic transfer and
 * must leave the owed input in the pair before returning.
 */
export interface PonderCallee {
    readonly address: Address;
    ponderCall(initiator: Address, amount0: bigint, amount1: bigint, data: CallbackData): void;
}

export function isPonderCallee(value: unknown): value is PonderCallee {
    if (typeof value !== 'object' || value === null) return false;
    return 'ponderCall' in value && typeof value.ponderCall === 'function';
}

export interface Reserves {
    reserve0: bigint;
    reserve1: bigint;
    blockTimestampLast: number;
}

export interface SwapResult {
    amount0In: bigint;
    amount1In: bigint;
    amount0Out: bigint;
    amount1Out: bigint;
    protocolFee0: bigint;
    protocolFee1: bigint;
    creatorFee0: bigint;
    creatorFee1: bigint;
}

export interface BurnResult {
    amount0: bigint;
    amount1: bigint;
}

export interface PairState {
    address: Address;
    factory: Address;
    token0: Address;
    token1: Address;
    reserve0: string;
    reserve1: string;
    blockTimestampLast: number;
    price0CumulativeLast: string;
    price1CumulativeLast: string;
    kLast: string;
    accumulatedFee0: string;
    accumulatedFee1: string;
}
