/**
 * JSON-safe read models shared by the HTTP API and the CLI.
 * Bigints are rendered as decimal strings.
 */

import type { Chain } from '../chain/Chain.js';
import type { LoggedEvent } from '../chain/events.js';
import { PairError } from '../errors/index.js';
import type { PairFactory } from '../factory/PairFactory.js';
import { fraction, toNumber } from '../math/UQ112x112.js';
import type { Pair } from '../pair/Pair.js';
import { getAmountOut } from '../pair/library.js';
import { isToken } from '../token/Token.js';
import { sameAddress, type Address } from '../utils/address.js';

export interface TokenRef {
    address: Address;
    symbol: string;
    decimals: number;
}

export interface PairView {
    address: Address;
    token0: TokenRef;
    token1: TokenRef;
    reserve0: string;
    reserve1: string;
    blockTimestampLast: number;
    price0CumulativeLast: string;
    price1CumulativeLast: string;
    kLast: string;
    totalSupply: string;
    accumulatedFee0: string;
    accumulatedFee1: string;
    /** token1 per token0 at current reserves; null while a reserve is zero. */
    price0: number | null;
    price1: number | null;
}

export interface QuoteView {
    pair: Address;
    tokenIn: Address;
    tokenOut: Address;
    amountIn: string;
    amountOut: string;
    reserveIn: string;
    reserveOut: string;
}

export type EventView = Record<string, string | number>;

function tokenRef(chain: Chain, address: Address): TokenRef {
    const token = chain.getContract(address);
    if (!isToken(token)) {
        return { address, symbol: '?', decimals: 18 };
    }
    return { address: token.address, symbol: token.symbol, decimals: token.decimals };
}

export function pairView(chain: Chain, pair: Pair): PairView {
    const { reserve0, reserve1, blockTimestampLast } = pair.getReserves();
    const { accumulatedFee0, accumulatedFee1 } = pair.accumulatedFees();
    const priced = reserve0 > 0n && reserve1 > 0n;
    return {
        address: pair.address,
        token0: tokenRef(chain, pair.token0),
        token1: tokenRef(chain, pair.token1),
        reserve0: reserve0.toString(),
        reserve1: reserve1.toString(),
        blockTimestampLast,
        price0CumulativeLast: pair.price0CumulativeLast.toString(),
        price1CumulativeLast: pair.price1CumulativeLast.toString(),
        kLast: pair.kLast.toString(),
        totalSupply: pair.totalSupply().toString(),
        accumulatedFee0: accumulatedFee0.toString(),
        accumulatedFee1: accumulatedFee1.toString(),
        price0: priced ? toNumber(fraction(reserve1, reserve0)) : null,
        price1: priced ? toNumber(fraction(reserve0, reserve1)) : null,
    };
}

export function pairsView(chain: Chain, factory: PairFactory): PairView[] {
    return factory.getPairs().map((pair) => pairView(chain, pair));
}

/** Exact-input quote at current reserves, as `swap` would accept it. */
export function quoteView(pair: Pair, tokenIn: Address, amountIn: bigint): QuoteView {
    const { reserve0, reserve1 } = pair.getReserves();
    let zeroForOne: boolean;
    if (sameAddress(tokenIn, pair.token0)) {
        zeroForOne = true;
    } else if (sameAddress(tokenIn, pair.token1)) {
        zeroForOne = false;
    } else {
        throw new PairError('InvalidAddress', `${tokenIn} is not a token of pair ${pair.address}`);
    }
    const [reserveIn, reserveOut] = zeroForOne ? [reserve0, reserve1] : [reserve1, reserve0];
    return {
        pair: pair.address,
        tokenIn: zeroForOne ? pair.token0 : pair.token1,
        tokenOut: zeroForOne ? pair.token1 : pair.token0,
        amountIn: amountIn.toString(),
        amountOut: getAmountOut(amountIn, reserveIn, reserveOut).toString(),
        reserveIn: reserveIn.toString(),
        reserveOut: reserveOut.toString(),
    };
}

export function eventView(event: LoggedEvent): EventView {
    return Object.fromEntries(
        Object.entries(event).map(([key, value]): [string, string | number] => [
            key,
            typeof value === 'number' ? value : String(value),
        ])
    );
}

export function eventsView(chain: Chain, address: Address, fromIndex?: number): EventView[] {
    return chain.getLogs({ address, fromIndex }).map(eventView);
}
