import type { Address } from '../utils/address.js';

// ========== TOKEN EVENTS ==========

export interface TransferEvent {
    name: 'Transfer';
    address: Address;
    from: Address;
    to: Address;
    value: bigint;
}

export interface ApprovalEvent {
    name: 'Approval';
    address: Address;
    owner: Address;
    spender: Address;
    value: bigint;
}

// ========== PAIR EVENTS ==========

export interface MintEvent {
    name: 'Mint';
    address: Address;
    sender: Address;
    amount0: bigint;
    amount1: bigint;
}

export interface BurnEvent {
    name: 'Burn';
    address: Address;
    sender: Address;
    amount0: bigint;
    amount1: bigint;
    to: Address;
}

export interface SwapEvent {
    name: 'Swap';
    address: Address;
    sender: Address;
    amount0In: bigint;
    amount1In: bigint;
    amount0Out: bigint;
    amount1Out: bigint;
    to: Address;
}

export interface SyncEvent {
    name: 'Sync';
    address: Address;
    reserve0: bigint;
    reserve1: bigint;
}

export interface CreatorFeeEvent {
    name: 'CreatorFee';
    address: Address;
    token: Address;
    creator: Address;
    amount: bigint;
}

export interface FeesCollectedEvent {
    name: 'FeesCollected';
    address: Address;
    to: Address;
    amount0: bigint;
    amount1: bigint;
}

// ========== FACTORY / ORACLE EVENTS ==========

export interface PairCreatedEvent {
    name: 'PairCreated';
    address: Address;
    token0: Address;
    token1: Address;
    pair: Address;
    index: number;
}

export interface FactorySettingEvent {
    name: 'FeeToUpdated' | 'FeeToSetterUpdated' | 'LauncherUpdated';
    address: Address;
    previous: Address;
    current: Address;
}

export interface OracleUpdatedEvent {
    name: 'OracleUpdated';
    address: Address;
    pair: Address;
    price0Cumulative: bigint;
    price1Cumulative: bigint;
    blockTimestamp: number;
}

export type TokenEvent = TransferEvent | ApprovalEvent;
export type PairEvent = MintEvent | BurnEvent | SwapEvent | SyncEvent | CreatorFeeEvent | FeesCollectedEvent;
export type FactoryEvent = PairCreatedEvent | FactorySettingEvent;

export type ChainEvent = TokenEvent | PairEvent | FactoryEvent | OracleUpdatedEvent;
export type ChainEventName = ChainEvent['name'];

export type LoggedEvent = ChainEvent & {
    logIndex: number;
    timestamp: number;
};

export type EventOf<N extends ChainEventName> = Extract<LoggedEvent, { name: N }>;
