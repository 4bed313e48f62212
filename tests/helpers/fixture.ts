import { expect } from 'vitest';
import { Chain } from '../../src/chain/Chain.js';
import type { PairErrorCode } from '../../src/errors/index.js';
import { PairFactory } from '../../src/factory/PairFactory.js';
import type { Pair } from '../../src/pair/Pair.js';
import { LaunchToken } from '../../src/token/LaunchToken.js';
import { StandardToken } from '../../src/token/StandardToken.js';
import type { Address } from '../../src/utils/address.js';

export const START_TIME = 1_700_000_000;

export const ADMIN = '0x00000000000000000000000000000000000000a1';
export const ALICE = '0x00000000000000000000000000000000000000a2';
export const BOB = '0x00000000000000000000000000000000000000a3';
export const CREATOR = '0x00000000000000000000000000000000000000a4';
export const LAUNCHER = '0x00000000000000000000000000000000000000a5';
export const FEE_TO = '0x00000000000000000000000000000000000000a6';

export interface Env {
    chain: Chain;
    factory: PairFactory;
    protocolToken: StandardToken;
    tokenA: StandardToken;
    tokenB: StandardToken;
}

export interface EnvOptions {
    feeTo?: Address;
    retroactiveProtocolFee?: boolean;
}

export function setup(options: EnvOptions = {}): Env {
    const chain = new Chain({ timestamp: START_TIME });
    const protocolToken = chain.call(ADMIN, () => new StandardToken(chain, { name: 'Protocol', symbol: 'PROTO' }));
    const factory = chain.call(ADMIN, () => new PairFactory(chain, {
        protocolToken: protocolToken.address,
        feeToSetter: ADMIN,
        launcher: LAUNCHER,
        feeTo: options.feeTo,
        retroactiveProtocolFee: options.retroactiveProtocolFee,
    }));
    const tokenA = chain.call(ADMIN, () => new StandardToken(chain, { name: 'Token A', symbol: 'TKA' }));
    const tokenB = chain.call(ADMIN, () => new StandardToken(chain, { name: 'Token B', symbol: 'TKB' }));
    return { chain, factory, protocolToken, tokenA, tokenB };
}

export function launchToken(chain: Chain, symbol: string, creator?: Address, launcher: Address = LAUNCHER): LaunchToken {
    return chain.call(ADMIN, () => new LaunchToken(chain, { name: `Launch ${symbol}`, symbol }, { launcher, creator }));
}

export function mintTo(chain: Chain, token: StandardToken, to: Address, amount: bigint): void {
    chain.call(token.owner, () => token.mint(to, amount));
}

export interface PairHandle<T extends StandardToken = StandardToken> {
    pair: Pair;
    token0: T;
    token1: T;
}

/** Creates the pair and returns its tokens in canonical order. */
export function createPair<T extends StandardToken>(env: Env, a: T, b: T): PairHandle<T> {
    const pair = env.chain.call(ADMIN, () => env.factory.createPair(a.address, b.address));
    const [token0, token1] = pair.token0 === a.address ? [a, b] : [b, a];
    return { pair, token0, token1 };
}

/** Mints the amounts to `from`, deposits them and mints LP to `from`. */
export function addLiquidity(env: Env, handle: PairHandle, from: Address, amount0: bigint, amount1: bigint): bigint {
    const { pair, token0, token1 } = handle;
    mintTo(env.chain, token0, from, amount0);
    mintTo(env.chain, token1, from, amount1);
    return env.chain.call(from, () => {
        token0.transfer(pair.address, amount0);
        token1.transfer(pair.address, amount1);
        return pair.mint(from);
    });
}

export function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected function to throw');
}

export function expectPairError(fn: () => unknown, code: PairErrorCode): void {
    expect(catchError(fn)).toMatchObject({ name: 'PairError', code });
}
