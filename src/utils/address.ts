import { PairError } from '../errors/index.js';
import { sha256 } from './crypto.js';

/** 20-byte hex account or contract identifier, lowercase, `0x` prefixed. */
export type Address = string;

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: unknown): value is Address {
    return typeof value === 'string' && ADDRESS_RE.test(value);
}

export function normalizeAddress(value: string): Address {
    if (!isAddress(value)) {
        throw new PairError('InvalidAddress', `Invalid address: ${value}`);
    }
    return value.toLowerCase();
}

export function isZeroAddress(value: Address | undefined): boolean {
    return value === undefined || value.toLowerCase() === ZERO_ADDRESS;
}

export function sameAddress(a: Address | undefined, b: Address | undefined): boolean {
    return a !== undefined && b !== undefined && a.toLowerCase() === b.toLowerCase();
}

/**
 * Deterministic contract address from a deployer and a salt.
 */
export function deriveAddress(deployer: Address, salt: string): Address {
    return '0x' + sha256(`${deployer.toLowerCase()}:${salt}`).substring(0, 40);
}

export function shortAddress(address: Address): string {
    return `${address.slice(0, 8)}...${address.slice(-4)}`;
}
