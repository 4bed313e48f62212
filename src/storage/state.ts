/**
 * Whole-deployment snapshot: clock, event log, tokens, factory, pairs and
 * oracle. Ledgers and pair fields keep bigints as decimal strings; event
 * payloads keep native bigints and are tagged by the JSON codec in Storage.
 */

import { Chain } from '../chain/Chain.js';
import type { LoggedEvent } from '../chain/events.js';
import { PairError } from '../errors/index.js';
import { PairFactory, type FactoryState } from '../factory/PairFactory.js';
import { PriceOracle, type OracleState } from '../oracle/PriceOracle.js';
import { Pair } from '../pair/Pair.js';
import type { PairState } from '../pair/types.js';
import type { ERC20State } from '../token/ERC20.js';
import { LaunchToken, type LaunchInfo } from '../token/LaunchToken.js';
import { StandardToken } from '../token/StandardToken.js';
import type { Address } from '../utils/address.js';

export const SNAPSHOT_VERSION = 1;

export interface Deployment {
    chain: Chain;
    factory?: PairFactory;
    oracle?: PriceOracle;
}

export interface TokenSnapshot {
    kind: 'standard' | 'launch';
    owner: Address;
    launch?: LaunchInfo;
    ledger: ERC20State;
}

export interface PairSnapshot {
    state: PairState;
    ledger: ERC20State;
}

export interface ChainSnapshot {
    version: number;
    chain: {
        timestamp: number;
        nonces: Record<string, number>;
        events: LoggedEvent[];
    };
    tokens: TokenSnapshot[];
    factory: FactoryState | null;
    pairs: PairSnapshot[];
    oracle: OracleState | null;
}

/** Tokens deployed on the chain, in deployment order. */
export function listTokens(chain: Chain): StandardToken[] {
    return chain.getContracts().filter((c): c is StandardToken => c instanceof StandardToken);
}

export function findToken(chain: Chain, address: Address): StandardToken | undefined {
    const contract = chain.getContract(address);
    return contract instanceof StandardToken ? contract : undefined;
}

export function findPair(chain: Chain, address: Address): Pair | undefined {
    const contract = chain.getContract(address);
    return contract instanceof Pair ? contract : undefined;
}

export function serializeChain(deployment: Deployment): ChainSnapshot {
    const { chain, factory, oracle } = deployment;
    const tokens = listTokens(chain).map((token): TokenSnapshot => {
        if (token instanceof LaunchToken) {
            return { kind: 'launch', owner: token.owner, launch: { ...token.launchInfo }, ledger: token.exportLedger() };
        }
        return { kind: 'standard', owner: token.owner, ledger: token.exportLedger() };
    });

    return {
        version: SNAPSHOT_VERSION,
        chain: chain.exportState(),
        tokens,
        factory: factory ? factory.getState() : null,
        pairs: (factory?.getPairs() ?? []).map((pair) => ({ state: pair.getState(), ledger: pair.exportLedger() })),
        oracle: oracle ? oracle.exportObservations() : null,
    };
}

export function restoreChain(snapshot: ChainSnapshot): Deployment {
    if (snapshot.version !== SNAPSHOT_VERSION) {
        throw new PairError('InvalidReserveState', `Unsupported snapshot version ${snapshot.version}`);
    }
    const chain = new Chain({ timestamp: snapshot.chain.timestamp });
    chain.importState(snapshot.chain);

    for (const token of snapshot.tokens) {
        const meta = {
            name: token.ledger.name,
            symbol: token.ledger.symbol,
            decimals: token.ledger.decimals,
            address: token.ledger.address,
        };
        const restored = token.kind === 'launch' && token.launch
            ? new LaunchToken(chain, meta, token.launch, token.owner)
            : new StandardToken(chain, meta, token.owner);
        restored.importLedger(token.ledger);
    }

    let factory: PairFactory | undefined;
    if (snapshot.factory) {
        const settings = snapshot.factory;
        factory = new PairFactory(chain, {
            address: settings.address,
            protocolToken: settings.protocolToken,
            feeToSetter: settings.feeToSetter,
            launcher: settings.launcher,
            feeTo: settings.feeTo,
            retroactiveProtocolFee: settings.retroactiveProtocolFee,
        });
        factory.loadSettings(settings);
        for (const { state, ledger } of snapshot.pairs) {
            factory.restorePair(state).importLedger(ledger);
        }
    }

    let oracle: PriceOracle | undefined;
    if (snapshot.oracle && factory) {
        oracle = new PriceOracle(chain, factory, {
            address: snapshot.oracle.address,
            baseToken: snapshot.oracle.baseToken,
            stablecoin: snapshot.oracle.stablecoin,
        });
        oracle.loadObservations(snapshot.oracle);
    }

    return { chain, factory, oracle };
}
