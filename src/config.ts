import path from 'path';

const isTestnet = process.env.NETWORK_MODE !== 'mainnet';

function envFlag(name: string, fallback: boolean): boolean {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;
    return raw === 'true' || raw === '1';
}

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;
    const parsed = parseInt(raw, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

// Protocol fee on liquidity growth.
// When true, the factory's current feeTo applies to every pair on its next
// mint/burn, including pairs created before feeTo was set. Growth that happened
// while the fee was off is never charged because kLast is cleared in that period.
const PROTOCOL_FEE_CONFIG = {
    feeTo: process.env.FEE_TO || undefined,
    feeToSetter: process.env.FEE_TO_SETTER || undefined,
    retroactive: envFlag('RETROACTIVE_PROTOCOL_FEE', true),
};

const dataDir = process.env.DATA_DIR || (isTestnet ? './data/testnet' : './data/mainnet');

export const config = {
    network_mode: isTestnet ? 'testnet' : 'mainnet',
    isTestnet,
    log: {
        level: process.env.LOG_LEVEL || 'info',
    },
    storage: {
        dataDir,
        stateFile: process.env.STATE_FILE || 'state.json',
        statePath: path.join(dataDir, process.env.STATE_FILE || 'state.json'),
    },
    api: {
        port: envInt('API_PORT', 3001),
        rateLimit: {
            windowMs: envInt('RATE_LIMIT_WINDOW_MS', 60000),
            maxRequests: envInt('RATE_LIMIT_MAX', 100),
        },
        cors: {
            origin: process.env.CORS_ORIGIN || '*',
        },
    },
    protocolFee: PROTOCOL_FEE_CONFIG,
};
export type Config = typeof config;
