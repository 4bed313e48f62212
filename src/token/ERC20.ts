/**
 * In-memory ERC20 ledger bound to a Chain.
 * Balances and allowances roll back with the chain's call frames.
 */

import type { Chain, Snapshottable } from '../chain/Chain.js';
import { PairError } from '../errors/index.js';
import { ZERO_ADDRESS, normalizeAddress, type Address } from '../utils/address.js';
import type { LaunchTokenCapability, Token } from './Token.js';

export interface TokenMetadata {
    name: string;
    symbol: string;
    decimals?: number;
    address?: Address;
}

export interface ERC20State {
    address: Address;
    name: string;
    symbol: string;
    decimals: number;
    totalSupply: string;
    balances: Record<string, string>;
    allowances: Record<string, Record<string, string>>;
}

export class ERC20 implements Token, Snapshottable {
    readonly address: Address;
    readonly name: string;
    readonly symbol: string;
    readonly decimals: number;
    readonly launch?: LaunchTokenCapability;

    protected readonly chain: Chain;
    protected supply: bigint = 0n;
    protected balances = new Map<Address, bigint>();
    protected allowances = new Map<Address, Map<Address, bigint>>();

    constructor(chain: Chain, meta: TokenMetadata, deployer: Address = chain.sender) {
        this.chain = chain;
        this.address = meta.address ? normalizeAddress(meta.address) : chain.nextAddress(deployer);
        this.name = meta.name;
        this.symbol = meta.symbol;
        this.decimals = meta.decimals ?? 18;
    }

    // ========== VIEWS ==========

    totalSupply(): bigint {
        return this.supply;
    }

    balanceOf(owner: Address): bigint {
        return this.balances.get(owner.toLowerCase()) ?? 0n;
    }

    allowance(owner: Address, spender: Address): bigint {
        return this.allowances.get(owner.toLowerCase())?.get(spender.toLowerCase()) ?? 0n;
    }

    // ========== MUTATIONS ==========

    transfer(to: Address, amount: bigint): boolean {
        this._transfer(this.chain.sender, to, amount);
        return true;
    }

    transferFrom(from: Address, to: Address, amount: bigint): boolean {
        const spender = this.chain.sender;
        const allowed = this.allowance(from, spender);
        if (allowed < amount) {
            throw new PairError('InsufficientAllowance', `${this.symbol}: allowance ${allowed} < ${amount}`);
        }
        this.setAllowance(from, spender, allowed - amount);
        this._transfer(from, to, amount);
        return true;
    }

    approve(spender: Address, amount: bigint): boolean {
        if (amount < 0n) throw new PairError('InvalidAmount', 'Approval must not be negative');
        const owner = this.chain.sender;
        this.setAllowance(owner, spender, amount);
        this.chain.emit({ name: 'Approval', address: this.address, owner, spender: spender.toLowerCase(), value: amount });
        return true;
    }

    protected _transfer(from: Address, to: Address, amount: bigint): void {
        if (amount < 0n) throw new PairError('InvalidAmount', 'Transfer amount must not be negative');
        const sender = from.toLowerCase();
        const recipient = to.toLowerCase();
        const balance = this.balanceOf(sender);
        if (balance < amount) {
            throw new PairError('InsufficientBalance', `${this.symbol}: balance ${balance} < ${amount}`);
        }
        this.balances.set(sender, balance - amount);
        this.balances.set(recipient, this.balanceOf(recipient) + amount);
        this.chain.emit({ name: 'Transfer', address: this.address, from: sender, to: recipient, value: amount });
    }

    protected _mint(to: Address, amount: bigint): void {
        if (amount < 0n) throw new PairError('InvalidAmount', 'Mint amount must not be negative');
        const recipient = to.toLowerCase();
        this.supply += amount;
        this.balances.set(recipient, this.balanceOf(recipient) + amount);
        this.chain.emit({ name: 'Transfer', address: this.address, from: ZERO_ADDRESS, to: recipient, value: amount });
    }

    protected _burn(from: Address, amount: bigint): void {
        const owner = from.toLowerCase();
        const balance = this.balanceOf(owner);
        if (balance < amount) {
            throw new PairError('InsufficientBalance', `${this.symbol}: burn ${amount} exceeds balance ${balance}`);
        }
        this.balances.set(owner, balance - amount);
        this.supply -= amount;
        this.chain.emit({ name: 'Transfer', address: this.address, from: owner, to: ZERO_ADDRESS, value: amount });
    }

    private setAllowance(owner: Address, spender: Address, amount: bigint): void {
        const key = owner.toLowerCase();
        const entry = this.allowances.get(key) ?? new Map<Address, bigint>();
        entry.set(spender.toLowerCase(), amount);
        this.allowances.set(key, entry);
    }

    // ========== SNAPSHOT / SERIALIZATION ==========

    snapshot(): () => void {
        const supply = this.supply;
        const balances = new Map(this.balances);
        const allowances = new Map(
            Array.from(this.allowances.entries()).map(([owner, spenders]) => [owner, new Map(spenders)] as const)
        );
        return () => {
            this.supply = supply;
            this.balances = balances;
            this.allowances = allowances;
        };
    }

    exportLedger(): ERC20State {
        return {
            address: this.address,
            name: this.name,
            symbol: this.symbol,
            decimals: this.decimals,
            totalSupply: this.supply.toString(),
            balances: Object.fromEntries(
                Array.from(this.balances.entries()).map(([k, v]) => [k, v.toString()])
            ),
            allowances: Object.fromEntries(
                Array.from(this.allowances.entries()).map(([owner, spenders]) => [
                    owner,
                    Object.fromEntries(Array.from(spenders.entries()).map(([k, v]) => [k, v.toString()])),
                ])
            ),
        };
    }

    importLedger(data: ERC20State): void {
        this.supply = BigInt(data.totalSupply);
        this.balances = new Map(Object.entries(data.balances).map(([k, v]) => [k, BigInt(v)]));
        this.allowances = new Map(
            Object.entries(data.allowances).map(([owner, spenders]) => [
                owner,
                new Map(Object.entries(spenders).map(([k, v]) => [k, BigInt(v)])),
            ])
        );
    }
}
