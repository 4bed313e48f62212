/**
 * In-process execution environment.
 *
 * Provides what contracts on a real chain get from the host: the current
 * caller, a block clock, contract lookup by address, an event log, and
 * call frames that are all-or-nothing. Any error thrown inside `call`
 * restores every registered participant and the event log to the state
 * they had when the frame was entered.
 */

import { ZERO_ADDRESS, deriveAddress, sameAddress, type Address } from '../utils/address.js';
import { PairError } from '../errors/index.js';
import type { ChainEvent, ChainEventName, EventOf, LoggedEvent } from './events.js';
import { logger } from '../utils/logger.js';

const log = logger.child('Chain');

/** State that must roll back when a call frame fails. */
export interface Snapshottable {
    /** Captures current state and returns a function that restores it. */
    snapshot(): () => void;
}

export interface Contract {
    readonly address: Address;
}

export interface ChainOptions {
    /** Initial block timestamp in seconds. */
    timestamp?: number;
}

export interface EventFilter<N extends ChainEventName = ChainEventName> {
    name?: N;
    address?: Address;
    fromIndex?: number;
}

export class Chain {
    private timestamp: number;
    private readonly callStack: Address[] = [];
    private readonly contracts = new Map<Address, Contract>();
    private readonly participants: Snapshottable[] = [];
    private readonly nonces = new Map<Address, number>();
    private events: LoggedEvent[] = [];

    constructor(options: ChainOptions = {}) {
        this.timestamp = options.timestamp ?? Math.floor(Date.now() / 1000);
    }

    // ========== CLOCK ==========

    /** Current block time in seconds. */
    get now(): number {
        return this.timestamp;
    }

    setTime(timestamp: number): void {
        if (!Number.isInteger(timestamp) || timestamp < 0) {
            throw new PairError('InvalidAmount', `Invalid timestamp: ${timestamp}`);
        }
        this.timestamp = timestamp;
    }

    advanceTime(seconds: number): number {
        this.setTime(this.timestamp + seconds);
        return this.timestamp;
    }

    // ========== CALL FRAMES ==========

    /** Address that made the current call (`msg.sender`). */
    get sender(): Address {
        return this.callStack[this.callStack.length - 1] ?? ZERO_ADDRESS;
    }

    get depth(): number {
        return this.callStack.length;
    }

    /**
     * Runs `fn` as a call made by `sender`.
     * ATOMIC: on throw, all participants and the event log are restored.
     */
    call<T>(sender: Address, fn: () => T): T {
        const restores = this.participants.map((participant) => participant.snapshot());
        const eventCount = this.events.length;
        const contractCount = this.contracts.size;
        const participantCount = this.participants.length;

        this.callStack.push(sender.toLowerCase());
        try {
            return fn();
        } catch (error) {
            for (let i = restores.length - 1; i >= 0; i--) {
                restores[i]();
            }
            this.events.length = eventCount;
            this.dropDeploymentsAfter(contractCount, participantCount);
            if (this.callStack.length === 1) {
                log.debug(`Call from ${sender} reverted: ${error instanceof Error ? error.message : String(error)}`);
            }
            throw error;
        } finally {
            this.callStack.pop();
        }
    }

    // ========== CONTRACTS ==========

    /** Next deterministic address for a contract deployed by `deployer`. */
    nextAddress(deployer: Address): Address {
        const key = deployer.toLowerCase();
        const nonce = this.nonces.get(key) ?? 0;
        this.nonces.set(key, nonce + 1);
        return deriveAddress(key, `nonce:${nonce}`);
    }

    deploy<T extends Contract>(contract: T, participant?: Snapshottable): T {
        const key = contract.address.toLowerCase();
        if (this.contracts.has(key)) {
            throw new PairError('PairExists', `Contract already deployed at ${contract.address}`);
        }
        this.contracts.set(key, contract);
        if (participant) this.participants.push(participant);
        return contract;
    }

    getContract(address: Address): Contract | undefined {
        return this.contracts.get(address.toLowerCase());
    }

    isContract(address: Address): boolean {
        return this.contracts.has(address.toLowerCase());
    }

    getContracts(): Contract[] {
        return Array.from(this.contracts.values());
    }

    private dropDeploymentsAfter(contractCount: number, participantCount: number): void {
        if (this.contracts.size > contractCount) {
            const added = Array.from(this.contracts.keys()).slice(contractCount);
            for (const key of added) this.contracts.delete(key);
        }
        this.participants.length = participantCount;
    }

    // ========== EVENTS ==========

    emit(event: ChainEvent): void {
        this.events.push({ ...event, logIndex: this.events.length, timestamp: this.timestamp });
    }

    getLogs<N extends ChainEventName>(filter: EventFilter<N> & { name: N }): EventOf<N>[];
    getLogs(filter?: EventFilter): LoggedEvent[];
    getLogs(filter: EventFilter = {}): LoggedEvent[] {
        return this.events.filter((event) =>
            (filter.name === undefined || event.name === filter.name)
            && (filter.address === undefined || sameAddress(event.address, filter.address))
            && (filter.fromIndex === undefined || event.logIndex >= filter.fromIndex)
        );
    }

    get eventCount(): number {
        return this.events.length;
    }

    // ========== PERSISTENCE ==========

    exportState(): { timestamp: number; nonces: Record<string, number>; events: LoggedEvent[] } {
        return {
            timestamp: this.timestamp,
            nonces: Object.fromEntries(this.nonces),
            events: [...this.events],
        };
    }

    importState(data: { timestamp: number; nonces: Record<string, number>; events: LoggedEvent[] }): void {
        this.timestamp = data.timestamp;
        this.nonces.clear();
        for (const [key, value] of Object.entries(data.nonces)) this.nonces.set(key, value);
        this.events = [...data.events];
    }
}
