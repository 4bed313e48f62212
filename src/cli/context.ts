/**
 * Shared plumbing for CLI commands: load and persist the deployment,
 * resolve contracts from addresses, parse amounts, report failures.
 */

import { PairError, errorMessage } from '../errors/index.js';
import type { PairFactory } from '../factory/PairFactory.js';
import type { PriceOracle } from '../oracle/PriceOracle.js';
import type { Pair } from '../pair/Pair.js';
import { findPair, findToken, storage, type Deployment } from '../storage/index.js';
import type { StandardToken } from '../token/StandardToken.js';
import { normalizeAddress, type Address } from '../utils/address.js';
import * as ui from '../utils/cli.js';
import { logger } from '../utils/logger.js';

const log = logger.child('CLI');

export interface InitializedDeployment extends Deployment {
    factory: PairFactory;
    oracle: PriceOracle;
}

export function loadDeployment(): InitializedDeployment {
    const deployment = storage.load();
    if (!deployment || !deployment.factory || !deployment.oracle) {
        throw new PairError('NotInitialized', `No deployment at ${storage.path}. Run 'amm init' first`);
    }
    return { chain: deployment.chain, factory: deployment.factory, oracle: deployment.oracle };
}

export function persist(deployment: Deployment): void {
    storage.save(deployment);
}

export function requirePair(deployment: Deployment, address: string): Pair {
    const pair = findPair(deployment.chain, parseAddress(address, 'pair'));
    if (!pair) throw new PairError('PairNotFound', `No pair at ${address}`);
    return pair;
}

export function requireToken(deployment: Deployment, address: string): StandardToken {
    const token = findToken(deployment.chain, parseAddress(address, 'token'));
    if (!token) throw new PairError('InvalidAddress', `No token at ${address}`);
    return token;
}

export function parseAddress(raw: string, label: string): Address {
    try {
        return normalizeAddress(raw.trim());
    } catch {
        throw new PairError('InvalidAddress', `Invalid ${label} address: ${raw}`);
    }
}

/** Integer amount in base units. */
export function parseAmount(raw: string, label: string): bigint {
    if (!/^\d+$/.test(raw.trim())) {
        throw new PairError('InvalidAmount', `Invalid ${label}: ${raw}`);
    }
    return BigInt(raw.trim());
}

export function parseSeconds(raw: string, label: string): number {
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
        throw new PairError('InvalidAmount', `Invalid ${label}: ${raw}`);
    }
    return value;
}

/**
 * Runs a command body. Failures are printed and set a non-zero exit code.
 */
export function runAction(fn: () => void): void {
    try {
        fn();
    } catch (err) {
        ui.error(errorMessage(err));
        if (err instanceof Error && err.stack) log.debug(err.stack);
        process.exitCode = 1;
    }
}
