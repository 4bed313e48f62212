/**
 * Price Oracle
 * Time-weighted average prices read from pair accumulators.
 *
 * Keeps a bounded ring of cumulative-price observations per pair. A
 * consult compares the pair's current cumulative price with an observation
 * at least `period` seconds old, so a price moved within one block barely
 * shifts the average.
 *
 * With a stablecoin configured, spot values can be expressed in it either
 * through a direct token/stablecoin pair or routed through the base token.
 */

import type { Chain, Snapshottable } from '../chain/Chain.js';
import { PairError } from '../errors/index.js';
import type { PairFactory } from '../factory/PairFactory.js';
import { decode144, mul } from '../math/UQ112x112.js';
import type { Pair } from '../pair/Pair.js';
import { averagePrice, elapsedSince } from '../pair/PriceAccumulator.js';
import { quote } from '../pair/library.js';
import { isZeroAddress, normalizeAddress, sameAddress, shortAddress, type Address } from '../utils/address.js';
import { logger } from '../utils/logger.js';

const log = logger.child('Oracle');

export const DEFAULT_PERIOD = 30 * 60; // 30 minutes
export const MAX_PERIOD = 24 * 60 * 60;
export const MIN_UPDATE_DELAY = 5 * 60;
export const MAX_OBSERVATIONS = 24;
export const STALE_AFTER = 2 * 60 * 60;

export interface Observation {
    /** Full chain time of the observation, seconds. */
    timestamp: number;
    /** 32-bit block timestamp matching the accumulator values. */
    blockTimestamp: number;
    price0Cumulative: bigint;
    price1Cumulative: bigint;
}

export interface OracleOptions {
    /** Intermediate token for stablecoin routes; defaults to the factory's protocol token. */
    baseToken?: Address;
    stablecoin?: Address;
    minUpdateDelay?: number;
    maxObservations?: number;
    staleAfter?: number;
    address?: Address;
}

export interface SerializedObservation {
    timestamp: number;
    blockTimestamp: number;
    price0Cumulative: string;
    price1Cumulative: string;
}

export interface OracleState {
    address: Address;
    baseToken: Address;
    stablecoin?: Address;
    observations: Record<string, SerializedObservation[]>;
}

export class PriceOracle implements Snapshottable {
    readonly address: Address;
    readonly baseToken: Address;
    readonly stablecoin?: Address;
    readonly minUpdateDelay: number;
    readonly maxObservations: number;
    readonly staleAfter: number;

    private readonly chain: Chain;
    private readonly factory: PairFactory;
    private observations = new Map<Address, Observation[]>();

    constructor(chain: Chain, factory: PairFactory, options: OracleOptions = {}) {
        this.chain = chain;
        this.factory = factory;
        this.address = options.address ? normalizeAddress(options.address) : chain.nextAddress(chain.sender);
        this.baseToken = normalizeAddress(options.baseToken ?? factory.getProtocolToken());
        this.stablecoin = options.stablecoin && !isZeroAddress(options.stablecoin)
            ? normalizeAddress(options.stablecoin)
            : undefined;
        this.minUpdateDelay = options.minUpdateDelay ?? MIN_UPDATE_DELAY;
        this.maxObservations = options.maxObservations ?? MAX_OBSERVATIONS;
        this.staleAfter = options.staleAfter ?? STALE_AFTER;
        chain.deploy(this, this);
    }

    // ========== OBSERVATIONS ==========

    isPairInitialized(pairAddress: Address): boolean {
        return this.observations.has(pairAddress.toLowerCase());
    }

    observationLength(pairAddress: Address): number {
        return this.observations.get(pairAddress.toLowerCase())?.length ?? 0;
    }

    getObservations(pairAddress: Address): Observation[] {
        return [...(this.observations.get(pairAddress.toLowerCase()) ?? [])];
    }

    lastUpdateTime(pairAddress: Address): number | undefined {
        const list = this.observations.get(pairAddress.toLowerCase());
        return list?.[list.length - 1]?.timestamp;
    }

    /**
     * Starts tracking a pair with its current cumulative prices.
     */
    initializePair(pairAddress: Address): void {
        this.chain.call(this.chain.sender, () => {
            const pair = this.requirePair(pairAddress);
            if (this.observations.has(pair.address)) {
                throw new PairError('AlreadyInitialized', `Oracle already tracks ${pair.address}`);
            }
            const { reserve0, reserve1 } = pair.getReserves();
            if (reserve0 === 0n || reserve1 === 0n) {
                throw new PairError('InsufficientLiquidity', `Pair ${pair.address} has no reserves`);
            }
            this.observations.set(pair.address, [this.observe(pair)]);
            log.info(`📈 Tracking pair ${shortAddress(pair.address)}`);
        });
    }

    /**
     * Records a new observation. At most one per `minUpdateDelay` seconds.
     */
    update(pairAddress: Address): Observation {
        return this.chain.call(this.chain.sender, () => {
            const pair = this.requirePair(pairAddress);
            const list = this.observations.get(pair.address);
            if (!list) {
                throw new PairError('NotInitialized', `Oracle does not track ${pair.address}`);
            }
            const last = list[list.length - 1];
            if (last && this.chain.now - last.timestamp < this.minUpdateDelay) {
                throw new PairError('UpdateTooFrequent', undefined, {
                    pair: pair.address,
                    lastUpdate: last.timestamp,
                    minUpdateDelay: this.minUpdateDelay,
                });
            }

            const observation = this.observe(pair);
            const next = [...list, observation];
            this.observations.set(pair.address, next.length > this.maxObservations ? next.slice(-this.maxObservations) : next);

            this.chain.emit({
                name: 'OracleUpdated',
                address: this.address,
                pair: pair.address,
                price0Cumulative: observation.price0Cumulative,
                price1Cumulative: observation.price1Cumulative,
                blockTimestamp: observation.blockTimestamp,
            });
            log.debug(`Observation recorded for ${shortAddress(pair.address)} at ${observation.timestamp}`);
            return observation;
        });
    }

    // ========== PRICES ==========

    /**
     * Amount of the other token `amountIn` of `tokenIn` is worth at the
     * time-weighted average price over at least `period` seconds.
     */
    consult(pairAddress: Address, tokenIn: Address, amountIn: bigint, period: number = DEFAULT_PERIOD): bigint {
        if (!Number.isInteger(period) || period <= 0 || period > MAX_PERIOD) {
            throw new PairError('InvalidPeriod', `Period must be within 1..${MAX_PERIOD} seconds`, { period });
        }
        if (amountIn < 0n) {
            throw new PairError('InvalidAmount', 'amountIn must not be negative');
        }
        const pair = this.requirePair(pairAddress);
        const list = this.observations.get(pair.address);
        if (!list || list.length === 0) {
            throw new PairError('NotInitialized', `Oracle does not track ${pair.address}`);
        }

        const latest = list[list.length - 1];
        if (this.chain.now - latest.timestamp > this.staleAfter) {
            throw new PairError('StalePrice', undefined, { pair: pair.address, lastUpdate: latest.timestamp });
        }

        const now = this.chain.now;
        let start: Observation | undefined;
        for (let i = list.length - 1; i >= 0; i--) {
            if (now - list[i].timestamp >= period) {
                start = list[i];
                break;
            }
        }
        if (!start) {
            throw new PairError('InsufficientData', undefined, { pair: pair.address, period });
        }

        const current = pair.currentCumulativePrices();
        const elapsed = elapsedSince(current.blockTimestamp, start.blockTimestamp);
        if (elapsed === 0) {
            throw new PairError('InsufficientData', 'No time elapsed since the start observation');
        }

        if (sameAddress(tokenIn, pair.token0)) {
            const price0Average = averagePrice(start.price0Cumulative, current.price0Cumulative, elapsed);
            return decode144(mul(price0Average, amountIn));
        }
        if (sameAddress(tokenIn, pair.token1)) {
            const price1Average = averagePrice(start.price1Cumulative, current.price1Cumulative, elapsed);
            return decode144(mul(price1Average, amountIn));
        }
        throw new PairError('InvalidAddress', `${tokenIn} is not a token of pair ${pair.address}`);
    }

    /** Spot value of `amountIn` at the pair's current reserves. */
    getCurrentPrice(pairAddress: Address, tokenIn: Address, amountIn: bigint): bigint {
        const pair = this.requirePair(pairAddress);
        const { reserve0, reserve1 } = pair.getReserves();
        if (reserve0 === 0n || reserve1 === 0n) {
            throw new PairError('InsufficientData', `Pair ${pair.address} has no reserves`);
        }
        if (sameAddress(tokenIn, pair.token0)) return quote(amountIn, reserve0, reserve1);
        if (sameAddress(tokenIn, pair.token1)) return quote(amountIn, reserve1, reserve0);
        throw new PairError('InvalidAddress', `${tokenIn} is not a token of pair ${pair.address}`);
    }

    /**
     * Spot value of `amountIn` in the stablecoin. Uses the token/stablecoin
     * pair when it has liquidity, otherwise token -> base -> stablecoin.
     */
    getPriceInStablecoin(tokenIn: Address, amountIn: bigint): bigint {
        const stablecoin = this.stablecoin;
        if (stablecoin === undefined) {
            throw new PairError('NotInitialized', 'Oracle has no stablecoin configured');
        }
        const token = normalizeAddress(tokenIn);
        if (token === stablecoin) return amountIn;

        const direct = this.liquidPair(token, stablecoin);
        if (direct) return this.getCurrentPrice(direct.address, token, amountIn);

        const toBase = this.liquidPair(token, this.baseToken);
        const baseToStable = this.liquidPair(this.baseToken, stablecoin);
        if (!toBase || !baseToStable) {
            throw new PairError('PairNotFound', `No route from ${token} to stablecoin ${stablecoin}`);
        }
        const baseAmount = this.getCurrentPrice(toBase.address, token, amountIn);
        return this.getCurrentPrice(baseToStable.address, this.baseToken, baseAmount);
    }

    // ========== INTERNALS ==========

    private liquidPair(tokenA: Address, tokenB: Address): Pair | undefined {
        if (tokenA === tokenB) return undefined;
        const pair = this.factory.getPair(tokenA, tokenB);
        if (!pair) return undefined;
        const { reserve0, reserve1 } = pair.getReserves();
        return reserve0 > 0n && reserve1 > 0n ? pair : undefined;
    }

    private requirePair(pairAddress: Address): Pair {
        const address = normalizeAddress(pairAddress);
        const pair = this.factory.getPairs().find((p) => p.address === address);
        if (!pair) {
            throw new PairError('PairNotFound', `No pair at ${pairAddress}`);
        }
        return pair;
    }

    private observe(pair: Pair): Observation {
        const current = pair.currentCumulativePrices();
        return {
            timestamp: this.chain.now,
            blockTimestamp: current.blockTimestamp,
            price0Cumulative: current.price0Cumulative,
            price1Cumulative: current.price1Cumulative,
        };
    }

    // ========== SNAPSHOT / SERIALIZATION ==========

    snapshot(): () => void {
        const saved = new Map(this.observations);
        return () => {
            this.observations = saved;
        };
    }

    exportObservations(): OracleState {
        return {
            address: this.address,
            baseToken: this.baseToken,
            stablecoin: this.stablecoin,
            observations: Object.fromEntries(
                Array.from(this.observations.entries()).map(([pair, list]) => [
                    pair,
                    list.map((o) => ({
                        timestamp: o.timestamp,
                        blockTimestamp: o.blockTimestamp,
                        price0Cumulative: o.price0Cumulative.toString(),
                        price1Cumulative: o.price1Cumulative.toString(),
                    })),
                ])
            ),
        };
    }

    loadObservations(state: OracleState): void {
        this.observations = new Map(
            Object.entries(state.observations).map(([pair, list]) => [
                pair,
                list.map((o) => ({
                    timestamp: o.timestamp,
                    blockTimestamp: o.blockTimestamp,
                    price0Cumulative: BigInt(o.price0Cumulative),
                    price1Cumulative: BigInt(o.price1Cumulative),
                })),
            ])
        );
        log.debug(`Loaded observations for ${this.observations.size} pairs`);
    }
}
