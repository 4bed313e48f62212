/**
 * Fee Engine
 *
 * Splits the retained part of a swap input between the protocol and the
 * creator of a launch token. Pure: never transfers, never throws for
 * tokens that lack the launch capability or whose capability queries fail.
 *
 * Schedule (basis points of amountIn):
 *   launch token, protocol-token pair:  protocol 1, creator 4
 *   launch token, base-asset pair:      protocol 4, creator 1
 *   any other token:                    protocol 5, creator 0
 */

import { hasLaunchCapability, type Token } from '../token/Token.js';
import { isAddress, isZeroAddress, sameAddress, type Address } from '../utils/address.js';
import { logger } from '../utils/logger.js';

const log = logger.child('FeeEngine');

export const FEE_DENOMINATOR = 10000n;

export const STANDARD_PROTOCOL_FEE_BPS = 5n;
export const LAUNCH_PROTOCOL_TOKEN_PAIR = { protocol: 1n, creator: 4n } as const;
export const LAUNCH_BASE_ASSET_PAIR = { protocol: 4n, creator: 1n } as const;

export interface FeeSplit {
    protocolFee: bigint;
    creatorFee: bigint;
}

export type TokenClassification =
    | { kind: 'launch'; launcher: Address; creator?: Address }
    | { kind: 'standard' };

export type FeeRecipient =
    | { kind: 'creator'; creator: Address; amount: bigint }
    | { kind: 'protocol'; amount: bigint };

/** Runs one capability query; a failing query reads as no answer. */
function query<T>(token: Token, name: string, fn: () => T): T | undefined {
    try {
        return fn();
    } catch (error) {
        log.debug(`${token.symbol}.launch.${name}() failed: ${error instanceof Error ? error.message : String(error)}`);
        return undefined;
    }
}

/**
 * Classifies `token` relative to `launcherAddress`. Only a token that says it
 * is a launch token AND names this launcher gets the launch schedule.
 */
export function classifyToken(token: Token, launcherAddress: Address | undefined): TokenClassification {
    if (!hasLaunchCapability(token) || isZeroAddress(launcherAddress)) {
        return { kind: 'standard' };
    }
    const capability = token.launch;
    if (query(token, 'isLaunchToken', () => capability.isLaunchToken()) !== true) {
        return { kind: 'standard' };
    }
    const launcher = query(token, 'launcher', () => capability.launcher());
    if (!isAddress(launcher) || !sameAddress(launcher, launcherAddress)) {
        return { kind: 'standard' };
    }
    const creator = query(token, 'creator', () => capability.creator());
    return {
        kind: 'launch',
        launcher: launcher.toLowerCase(),
        creator: isAddress(creator) && !isZeroAddress(creator) ? creator.toLowerCase() : undefined,
    };
}

export function calculateFees(
    token: Token,
    amountIn: bigint,
    isProtocolTokenPair: boolean,
    launcherAddress: Address | undefined
): FeeSplit {
    if (amountIn === 0n) {
        return { protocolFee: 0n, creatorFee: 0n };
    }

    const classification = classifyToken(token, launcherAddress);
    if (classification.kind === 'launch') {
        const rates = isProtocolTokenPair ? LAUNCH_PROTOCOL_TOKEN_PAIR : LAUNCH_BASE_ASSET_PAIR;
        return {
            protocolFee: (amountIn * rates.protocol) / FEE_DENOMINATOR,
            creatorFee: (amountIn * rates.creator) / FEE_DENOMINATOR,
        };
    }

    return {
        protocolFee: (amountIn * STANDARD_PROTOCOL_FEE_BPS) / FEE_DENOMINATOR,
        creatorFee: 0n,
    };
}

/**
 * Where the creator share goes. When the creator cannot be resolved the
 * amount is reported as protocol fee for the caller to accumulate.
 */
export function resolveFeeRecipient(
    token: Token,
    creatorFee: bigint,
    launcherAddress: Address | undefined
): FeeRecipient {
    const classification = classifyToken(token, launcherAddress);
    if (classification.kind === 'launch' && classification.creator !== undefined) {
        return { kind: 'creator', creator: classification.creator, amount: creatorFee };
    }
    return { kind: 'protocol', amount: creatorFee };
}

export const FeeEngine = {
    classifyToken,
    calculateFees,
    resolveFeeRecipient,
} as const;
