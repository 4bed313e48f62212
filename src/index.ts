export { Chain } from './chain/Chain.js';
export type { ChainOptions, Contract, EventFilter, Snapshottable } from './chain/Chain.js';
export type { ChainEvent, ChainEventName, EventOf, LoggedEvent } from './chain/events.js';

export { AmmError, MathError, PairError, errorMessage, isPairError } from './errors/index.js';
export type { MathErrorCode, PairErrorCode } from './errors/index.js';

export * as uint from './math/uint.js';
export { UQ112x112 } from './math/UQ112x112.js';

export { FeeEngine, calculateFees, classifyToken, resolveFeeRecipient } from './fees/FeeEngine.js';
export type { FeeRecipient, FeeSplit, TokenClassification } from './fees/FeeEngine.js';

export * from './pair/index.js';

export { PairFactory } from './factory/PairFactory.js';
export type { FactoryState, PairFactoryOptions } from './factory/PairFactory.js';

export { PriceOracle } from './oracle/PriceOracle.js';
export type { Observation, OracleOptions } from './oracle/PriceOracle.js';

export { ERC20 } from './token/ERC20.js';
export { StandardToken } from './token/StandardToken.js';
export { LaunchToken } from './token/LaunchToken.js';
export { hasLaunchCapability, isToken } from './token/Token.js';
export type { LaunchTokenCapability, Token } from './token/Token.js';

export { Storage, restoreChain, serializeChain } from './storage/index.js';
export type { ChainSnapshot, Deployment } from './storage/index.js';

export { ZERO_ADDRESS, isAddress, normalizeAddress, sameAddress } from './utils/address.js';
export type { Address } from './utils/address.js';
