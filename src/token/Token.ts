import type { Address } from '../utils/address.js';

/**
 * Optional classification a token may expose when it was issued through the
 * launch platform. Each query answers `false` / `undefined` when the token
 * cannot vouch for the value.
 */
export interface LaunchTokenCapability {
    isLaunchToken(): boolean;
    launcher(): Address | undefined;
    creator(): Address | undefined;
}

/**
 * Fungible token as seen by a pair. Transfers move funds out of the
 * current caller (`chain.sender`) and signal failure by returning `false`
 * or by throwing.
 */
export interface Token {
    readonly address: Address;
    readonly name: string;
    readonly symbol: string;
    readonly decimals: number;
    readonly launch?: LaunchTokenCapability;

    totalSupply(): bigint;
    balanceOf(owner: Address): bigint;
    allowance(owner: Address, spender: Address): bigint;
    transfer(to: Address, amount: bigint): boolean;
    transferFrom(from: Address, to: Address, amount: bigint): boolean;
    approve(spender: Address, amount: bigint): boolean;
}

export function hasLaunchCapability(token: Token): token is Token & { launch: LaunchTokenCapability } {
    return token.launch !== undefined;
}

export function isToken(value: unknown): value is Token {
    if (typeof value !== 'object' || value === null) return false;
    return 'address' in value && typeof value.address === 'string'
        && 'balanceOf' in value && typeof value.balanceOf === 'function'
        && 'transfer' in value && typeof value.transfer === 'function';
}
