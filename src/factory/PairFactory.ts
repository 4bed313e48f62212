/**
 * Pair Factory
 *
 * Creates one pair per unordered token couple at a deterministic address and
 * holds the protocol-wide settings pairs read: protocol token, launcher,
 * fee collector and the account allowed to change them.
 */

import type { Chain, Snapshottable } from '../chain/Chain.js';
import { PairError } from '../errors/index.js';
import { Pair } from '../pair/Pair.js';
import { sortTokens } from '../pair/library.js';
import type { PairHost, PairState } from '../pair/types.js';
import { isToken } from '../token/Token.js';
import {
    ZERO_ADDRESS,
    deriveAddress,
    isZeroAddress,
    normalizeAddress,
    sameAddress,
    shortAddress,
    type Address,
} from '../utils/address.js';
import { logger } from '../utils/logger.js';

const log = logger.child('Factory');

export interface PairFactoryOptions {
    protocolToken: Address;
    feeToSetter: Address;
    launcher?: Address;
    feeTo?: Address;
    /** Charge the liquidity-growth fee on pairs created before feeTo was set. Default true. */
    retroactiveProtocolFee?: boolean;
    address?: Address;
}

export interface FactoryState {
    address: Address;
    protocolToken: Address;
    launcher: Address;
    feeTo: Address;
    feeToSetter: Address;
    retroactiveProtocolFee: boolean;
    feeStartIndex: number | null;
    pairs: Address[];
}

export class PairFactory implements PairHost, Snapshottable {
    readonly address: Address;
    readonly retroactiveProtocolFee: boolean;

    private readonly chain: Chain;
    private protocolToken: Address;
    private launcher: Address;
    private feeTo: Address;
    private feeToSetter: Address;
    private feeStartIndex: number | null = null;
    private pairsByKey = new Map<string, Pair>();
    private pairList: Pair[] = [];

    constructor(chain: Chain, options: PairFactoryOptions) {
        this.chain = chain;
        this.address = options.address ? normalizeAddress(options.address) : chain.nextAddress(chain.sender);
        this.protocolToken = normalizeAddress(options.protocolToken);
        this.feeToSetter = normalizeAddress(options.feeToSetter);
        this.launcher = options.launcher ? normalizeAddress(options.launcher) : ZERO_ADDRESS;
        this.feeTo = options.feeTo ? normalizeAddress(options.feeTo) : ZERO_ADDRESS;
        this.retroactiveProtocolFee = options.retroactiveProtocolFee ?? true;
        if (!isZeroAddress(this.feeTo)) this.feeStartIndex = 0;
        chain.deploy(this, this);
    }

    // ========== PAIR HOST ==========

    getProtocolToken(): Address {
        return this.protocolToken;
    }

    getLauncher(): Address {
        return this.launcher;
    }

    getFeeTo(): Address {
        return this.feeTo;
    }

    getFeeToSetter(): Address {
        return this.feeToSetter;
    }

    /**
     * Recipient of the liquidity-growth fee for `pair`. Non-retroactive
     * factories only charge pairs created after the fee was switched on.
     */
    feeToFor(pair: Address): Address | undefined {
        if (isZeroAddress(this.feeTo)) return undefined;
        if (this.retroactiveProtocolFee) return this.feeTo;
        const index = this.pairList.findIndex((p) => sameAddress(p.address, pair));
        if (index < 0 || this.feeStartIndex === null || index < this.feeStartIndex) return undefined;
        return this.feeTo;
    }

    // ========== REGISTRY ==========

    getPair(tokenA: Address, tokenB: Address): Pair | undefined {
        return this.pairsByKey.get(pairKey(tokenA, tokenB));
    }

    allPairs(index: number): Pair | undefined {
        return this.pairList[index];
    }

    get allPairsLength(): number {
        return this.pairList.length;
    }

    getPairs(): Pair[] {
        return [...this.pairList];
    }

    /** Address a pair for the couple would get, whether or not it exists. */
    pairAddressFor(tokenA: Address, tokenB: Address): Address {
        const [token0, token1] = sortTokens(tokenA, tokenB);
        return deriveAddress(this.address, `${token0}:${token1}`);
    }

    createPair(tokenA: Address, tokenB: Address): Pair {
        return this.chain.call(this.chain.sender, () => {
            const [token0, token1] = sortTokens(tokenA, tokenB);
            if (this.getPair(token0, token1)) {
                throw new PairError('PairExists', `Pair already exists for ${token0}/${token1}`);
            }
            for (const token of [token0, token1]) {
                if (!isToken(this.chain.getContract(token))) {
                    throw new PairError('InvalidAddress', `No token deployed at ${token}`);
                }
            }

            const pair = this.deployPair(token0, token1);
            this.chain.emit({
                name: 'PairCreated',
                address: this.address,
                token0,
                token1,
                pair: pair.address,
                index: this.pairList.length,
            });
            log.info(`🆕 Pair created: ${shortAddress(token0)}/${shortAddress(token1)} at ${pair.address}`);
            return pair;
        });
    }

    /** Recreates a persisted pair at its original address. */
    restorePair(state: PairState): Pair {
        const pair = this.deployPair(state.token0, state.token1);
        if (!sameAddress(pair.address, state.address)) {
            throw new PairError('InvalidAddress', `Persisted pair ${state.address} does not match derived ${pair.address}`);
        }
        pair.loadState(state);
        return pair;
    }

    private deployPair(token0: Address, token1: Address): Pair {
        const pair = new Pair(this.chain, this, this.pairAddressFor(token0, token1));
        this.chain.call(this.address, () => pair.initialize(token0, token1));
        this.pairsByKey.set(pairKey(token0, token1), pair);
        this.pairList.push(pair);
        return pair;
    }

    // ========== SETTINGS ==========

    setFeeTo(feeTo: Address): void {
        this.chain.call(this.chain.sender, () => {
            this.requireFeeToSetter();
            const previous = this.feeTo;
            const next = normalizeAddress(feeTo);
            if (isZeroAddress(previous) && !isZeroAddress(next)) {
                this.feeStartIndex = this.pairList.length;
            }
            this.feeTo = next;
            this.chain.emit({ name: 'FeeToUpdated', address: this.address, previous, current: next });
            log.info(`Fee collector set to ${next}`);
        });
    }

    setFeeToSetter(feeToSetter: Address): void {
        this.chain.call(this.chain.sender, () => {
            this.requireFeeToSetter();
            const next = normalizeAddress(feeToSetter);
            if (isZeroAddress(next)) {
                throw new PairError('ZeroAddress', 'feeToSetter cannot be the zero address');
            }
            const previous = this.feeToSetter;
            this.feeToSetter = next;
            this.chain.emit({ name: 'FeeToSetterUpdated', address: this.address, previous, current: next });
        });
    }

    setLauncher(launcher: Address): void {
        this.chain.call(this.chain.sender, () => {
            this.requireFeeToSetter();
            const previous = this.launcher;
            const next = normalizeAddress(launcher);
            this.launcher = next;
            this.chain.emit({ name: 'LauncherUpdated', address: this.address, previous, current: next });
            log.info(`Launcher set to ${next}`);
        });
    }

    private requireFeeToSetter(): void {
        if (!sameAddress(this.chain.sender, this.feeToSetter)) {
            throw new PairError('Forbidden', 'Only feeToSetter can change factory settings');
        }
    }

    // ========== SNAPSHOT / SERIALIZATION ==========

    snapshot(): () => void {
        const saved = {
            protocolToken: this.protocolToken,
            launcher: this.launcher,
            feeTo: this.feeTo,
            feeToSetter: this.feeToSetter,
            feeStartIndex: this.feeStartIndex,
            pairsByKey: new Map(this.pairsByKey),
            pairList: [...this.pairList],
        };
        return () => {
            this.protocolToken = saved.protocolToken;
            this.launcher = saved.launcher;
            this.feeTo = saved.feeTo;
            this.feeToSetter = saved.feeToSetter;
            this.feeStartIndex = saved.feeStartIndex;
            this.pairsByKey = saved.pairsByKey;
            this.pairList = saved.pairList;
        };
    }

    getState(): FactoryState {
        return {
            address: this.address,
            protocolToken: this.protocolToken,
            launcher: this.launcher,
            feeTo: this.feeTo,
            feeToSetter: this.feeToSetter,
            retroactiveProtocolFee: this.retroactiveProtocolFee,
            feeStartIndex: this.feeStartIndex,
            pairs: this.pairList.map((pair) => pair.address),
        };
    }

    /** Restores settings only; pairs are restored through `restorePair`. */
    loadSettings(state: FactoryState): void {
        this.protocolToken = state.protocolToken;
        this.launcher = state.launcher;
        this.feeTo = state.feeTo;
        this.feeToSetter = state.feeToSetter;
        this.feeStartIndex = state.feeStartIndex;
    }
}

function pairKey(tokenA: Address, tokenB: Address): string {
    const a = tokenA.toLowerCase();
    const b = tokenB.toLowerCase();
    return a < b ? `${a}:${b}` : `${b}:${a}`;
}
