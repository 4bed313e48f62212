/**
 * Pair - Constant Product AMM with launch-token fee split
 *
 * STATE MACHINE: Uninitialized -> Active (initialize is called once by the factory)
 *
 * GUARANTEES:
 * - Every entry point runs inside one chain call frame: it either lands
 *   completely or every balance, field and event is rolled back
 * - Every entry point holds the pair lock; reentry fails with `Locked`
 * - reserve_i == balance_i - accumulatedFee_i after mint/burn/swap/sync
 * - Cumulative prices are advanced with the OLD reserves before any write
 *
 * Formula: (b0 * 1000 - in0 * 3) * (b1 * 1000 - in1 * 3) >= r0 * r1 * 1000^2
 */

import type { Chain } from '../chain/Chain.js';
import { PairError } from '../errors/index.js';
import { calculateFees, resolveFeeRecipient } from '../fees/FeeEngine.js';
import { min, sqrt } from '../math/uint.js';
import { ERC20 } from '../token/ERC20.js';
import { isToken, type Token } from '../token/Token.js';
import { ZERO_ADDRESS, isZeroAddress, sameAddress, shortAddress, type Address } from '../utils/address.js';
import { logger } from '../utils/logger.js';
import {
    validateOutputAmounts,
    validateReserveOverflow,
    validateSwap,
    validateSync,
} from './InvariantChecker.js';
import { PairLock } from './PairLock.js';
import { accumulate, currentCumulativePrices, type PriceObservation } from './PriceAccumulator.js';
import {
    EMPTY_DATA,
    isPonderCallee,
    type BurnResult,
    type CallbackData,
    type PairHost,
    type PairState,
    type Reserves,
    type SwapResult,
} from './types.js';

const log = logger.child('Pair');

/** LP tokens locked at the zero address on the first mint. */
export const MINIMUM_LIQUIDITY = 1000n;

// Protocol share of liquidity growth: 1/6 of sqrt(k) growth
const PROTOCOL_GROWTH_SHARE_DENOMINATOR = 5n;

export class Pair extends ERC20 {
    readonly factory: PairHost;

    private readonly lock: PairLock;
    private tokens?: [Token, Token];

    private reserve0: bigint = 0n;
    private reserve1: bigint = 0n;
    private blockTimestampLast: number = 0;
    private price0Cumulative: bigint = 0n;
    private price1Cumulative: bigint = 0n;
    private k: bigint = 0n;
    private accumulatedFee0: bigint = 0n;
    private accumulatedFee1: bigint = 0n;

    constructor(chain: Chain, factory: PairHost, address: Address) {
        super(chain, { name: 'AMM Liquidity', symbol: 'AMM-LP', decimals: 18, address });
        this.factory = factory;
        this.lock = new PairLock(this.address);
        chain.deploy(this, this);
    }

    // ========== INITIALIZATION ==========

    /**
     * Binds the two token addresses. Factory only, exactly once.
     */
    initialize(token0: Address, token1: Address): void {
        if (!sameAddress(this.chain.sender, this.factory.address)) {
            throw new PairError('Forbidden', 'Only the factory can initialize a pair');
        }
        if (this.tokens) {
            throw new PairError('AlreadyInitialized', `Pair ${this.address} already initialized`);
        }
        const t0 = this.chain.getContract(token0);
        const t1 = this.chain.getContract(token1);
        if (!isToken(t0) || !isToken(t1)) {
            throw new PairError('InvalidAddress', `Pair tokens must be deployed tokens: ${token0}, ${token1}`);
        }
        this.tokens = [t0, t1];
    }

    isInitialized(): boolean {
        return this.tokens !== undefined;
    }

    get token0(): Address {
        return this.tokens?.[0].address ?? ZERO_ADDRESS;
    }

    get token1(): Address {
        return this.tokens?.[1].address ?? ZERO_ADDRESS;
    }

    // ========== VIEWS ==========

    getReserves(): Reserves {
        return { reserve0: this.reserve0, reserve1: this.reserve1, blockTimestampLast: this.blockTimestampLast };
    }

    get price0CumulativeLast(): bigint {
        return this.price0Cumulative;
    }

    get price1CumulativeLast(): bigint {
        return this.price1Cumulative;
    }

    get kLast(): bigint {
        return this.k;
    }

    get locked(): boolean {
        return this.lock.locked;
    }

    accumulatedFees(): { accumulatedFee0: bigint; accumulatedFee1: bigint } {
        return { accumulatedFee0: this.accumulatedFee0, accumulatedFee1: this.accumulatedFee1 };
    }

    /** Cumulative prices as they would read if updated now. */
    currentCumulativePrices(): PriceObservation {
        return currentCumulativePrices(
            {
                price0CumulativeLast: this.price0Cumulative,
                price1CumulativeLast: this.price1Cumulative,
                blockTimestampLast: this.blockTimestampLast,
            },
            this.reserve0,
            this.reserve1,
            this.chain.now
        );
    }

    // ========== LIQUIDITY ==========

    /**
     * Mints LP tokens for whatever was deposited since the last reserve write.
     * Returns the liquidity minted to `to`.
     */
    mint(to: Address): bigint {
        return this.enter(() => {
            const [token0, token1] = this.requireTokens();
            const reserve0 = this.reserve0;
            const reserve1 = this.reserve1;
            const [balance0, balance1] = this.tradeableBalances(token0, token1);
            const amount0 = balance0 - reserve0;
            const amount1 = balance1 - reserve1;

            const feeOn = this.mintFee(reserve0, reserve1);
            const totalSupply = this.supply; // must be read after mintFee
            let liquidity: bigint;

            if (totalSupply === 0n) {
                const root = amount0 > 0n && amount1 > 0n ? sqrt(amount0 * amount1) : 0n;
                if (root <= MINIMUM_LIQUIDITY) {
                    throw new PairError('InsufficientInitialLiquidity', undefined, {
                        amount0: amount0.toString(),
                        amount1: amount1.toString(),
                        minimum: MINIMUM_LIQUIDITY.toString(),
                    });
                }
                liquidity = root - MINIMUM_LIQUIDITY;
                this._mint(ZERO_ADDRESS, MINIMUM_LIQUIDITY); // permanently lock the first MINIMUM_LIQUIDITY tokens
            } else {
                liquidity = amount0 < 0n || amount1 < 0n
                    ? 0n
                    : min((amount0 * totalSupply) / reserve0, (amount1 * totalSupply) / reserve1);
            }

            if (liquidity <= 0n) {
                throw new PairError('InsufficientLiquidityMinted');
            }
            this._mint(to, liquidity);

            this.update(balance0, balance1, reserve0, reserve1);
            if (feeOn) this.k = this.reserve0 * this.reserve1;

            this.chain.emit({ name: 'Mint', address: this.address, sender: this.chain.sender, amount0, amount1 });
            log.debug(`➕ Mint ${amount0}/${amount1} -> ${liquidity} LP to ${shortAddress(to)}`);
            return liquidity;
        });
    }

    /**
     * Burns the LP tokens held by the pair itself and pays out both tokens pro-rata.
     */
    burn(to: Address): BurnResult {
        return this.enter(() => {
            const [token0, token1] = this.requireTokens();
            const reserve0 = this.reserve0;
            const reserve1 = this.reserve1;
            const [balance0, balance1] = this.tradeableBalances(token0, token1);
            const liquidity = this.balanceOf(this.address);

            const feeOn = this.mintFee(reserve0, reserve1);
            const totalSupply = this.supply;
            if (totalSupply === 0n) {
                throw new PairError('InsufficientLiquidityBurned');
            }
            // pro-rata distribution over tradeable balances
            const amount0 = (liquidity * balance0) / totalSupply;
            const amount1 = (liquidity * balance1) / totalSupply;
            if (amount0 <= 0n || amount1 <= 0n) {
                throw new PairError('InsufficientLiquidityBurned', undefined, { liquidity: liquidity.toString() });
            }

            this._burn(this.address, liquidity);
            this.safeTransfer(token0, to, amount0);
            this.safeTransfer(token1, to, amount1);

            const [after0, after1] = this.tradeableBalances(token0, token1);
            this.update(after0, after1, reserve0, reserve1);
            if (feeOn) this.k = this.reserve0 * this.reserve1;

            this.chain.emit({ name: 'Burn', address: this.address, sender: this.chain.sender, amount0, amount1, to: to.toLowerCase() });
            log.debug(`➖ Burn ${liquidity} LP -> ${amount0}/${amount1} to ${shortAddress(to)}`);
            return { amount0, amount1 };
        });
    }

    // ========== SWAP ==========

    /**
     * Sends the requested outputs first, optionally lets `to` source the input
     * through `ponderCall`, then checks the fee-adjusted invariant.
     */
    swap(amount0Out: bigint, amount1Out: bigint, to: Address, data: CallbackData = EMPTY_DATA): SwapResult {
        return this.enter(() => {
            const [token0, token1] = this.requireTokens();
            if (amount0Out < 0n || amount1Out < 0n) {
                throw new PairError('InvalidAmount', 'Output amounts must not be negative');
            }
            if (amount0Out === 0n && amount1Out === 0n) {
                throw new PairError('InsufficientOutputAmount');
            }
            if (sameAddress(to, token0.address) || sameAddress(to, token1.address)) {
                throw new PairError('InvalidRecipient', `Swap recipient cannot be a pair token: ${to}`);
            }
            const reserve0 = this.reserve0;
            const reserve1 = this.reserve1;
            if (!validateOutputAmounts(amount0Out, amount1Out, reserve0, reserve1)) {
                throw new PairError('InsufficientLiquidity', undefined, {
                    pairAddress: this.address,
                    reserve0: reserve0.toString(),
                    reserve1: reserve1.toString(),
                });
            }

            const initiator = this.chain.sender;
            if (amount0Out > 0n) this.safeTransfer(token0, to, amount0Out); // optimistically transfer tokens
            if (amount1Out > 0n) this.safeTransfer(token1, to, amount1Out);
            if (data.length > 0) {
                const callee = this.chain.getContract(to);
                if (!isPonderCallee(callee)) {
                    throw new PairError('InvalidCallee', `${to} does not implement ponderCall`);
                }
                this.chain.call(this.address, () => callee.ponderCall(initiator, amount0Out, amount1Out, data));
            }

            const [balance0, balance1] = this.tradeableBalances(token0, token1);
            const amount0In = balance0 > reserve0 - amount0Out ? balance0 - (reserve0 - amount0Out) : 0n;
            const amount1In = balance1 > reserve1 - amount1Out ? balance1 - (reserve1 - amount1Out) : 0n;
            if (amount0In === 0n && amount1In === 0n) {
                throw new PairError('InsufficientInputAmount');
            }
            if (!validateSwap(balance0, balance1, amount0In, amount1In, reserve0, reserve1)) {
                throw new PairError('KInvariant', undefined, {
                    amount0In: amount0In.toString(),
                    amount1In: amount1In.toString(),
                });
            }

            const fees0 = this.takeFees(0, token0, amount0In);
            const fees1 = this.takeFees(1, token1, amount1In);

            const [final0, final1] = this.tradeableBalances(token0, token1);
            this.update(final0, final1, reserve0, reserve1);

            this.chain.emit({
                name: 'Swap',
                address: this.address,
                sender: initiator,
                amount0In,
                amount1In,
                amount0Out,
                amount1Out,
                to: to.toLowerCase(),
            });
            log.debug(`💱 Swap in ${amount0In}/${amount1In} out ${amount0Out}/${amount1Out} to ${shortAddress(to)}`);

            return {
                amount0In,
                amount1In,
                amount0Out,
                amount1Out,
                protocolFee0: fees0.protocolFee,
                protocolFee1: fees1.protocolFee,
                creatorFee0: fees0.creatorFee,
                creatorFee1: fees1.creatorFee,
            };
        });
    }

    // ========== RECONCILIATION ==========

    /**
     * Sends out anything above reserve + accumulated fee. Reserves are untouched.
     */
    skim(to: Address): { amount0: bigint; amount1: bigint } {
        return this.enter(() => {
            const [token0, token1] = this.requireTokens();
            const excess0 = token0.balanceOf(this.address) - (this.reserve0 + this.accumulatedFee0);
            const excess1 = token1.balanceOf(this.address) - (this.reserve1 + this.accumulatedFee1);
            const amount0 = excess0 > 0n ? excess0 : 0n;
            const amount1 = excess1 > 0n ? excess1 : 0n;

            if (amount0 > 0n) this.safeTransfer(token0, to, amount0);
            if (amount1 > 0n) this.safeTransfer(token1, to, amount1);

            log.debug(`🧹 Skim ${amount0}/${amount1} to ${shortAddress(to)}`);
            return { amount0, amount1 };
        });
    }

    /**
     * Forces reserves to match balances net of accumulated fees.
     */
    sync(): Reserves {
        return this.enter(() => {
            const [token0, token1] = this.requireTokens();
            const balance0 = token0.balanceOf(this.address);
            const balance1 = token1.balanceOf(this.address);
            if (!validateSync(balance0, balance1, this.accumulatedFee0, this.accumulatedFee1)) {
                throw new PairError('InvalidReserveState', undefined, {
                    balance0: balance0.toString(),
                    balance1: balance1.toString(),
                });
            }
            this.update(balance0 - this.accumulatedFee0, balance1 - this.accumulatedFee1, this.reserve0, this.reserve1);
            return this.getReserves();
        });
    }

    /**
     * Pays the accumulated protocol fees to the factory's fee collector.
     */
    collectProtocolFees(): { amount0: bigint; amount1: bigint } {
        return this.enter(() => {
            const [token0, token1] = this.requireTokens();
            const feeTo = this.factory.getFeeTo();
            if (isZeroAddress(feeTo) || !sameAddress(this.chain.sender, feeTo)) {
                throw new PairError('Forbidden', 'Only the fee collector can collect protocol fees');
            }
            const amount0 = this.accumulatedFee0;
            const amount1 = this.accumulatedFee1;
            this.accumulatedFee0 = 0n;
            this.accumulatedFee1 = 0n;
            if (amount0 > 0n) this.safeTransfer(token0, feeTo, amount0);
            if (amount1 > 0n) this.safeTransfer(token1, feeTo, amount1);

            this.chain.emit({ name: 'FeesCollected', address: this.address, to: feeTo.toLowerCase(), amount0, amount1 });
            log.info(`💰 Protocol fees collected: ${amount0}/${amount1} to ${shortAddress(feeTo)}`);
            return { amount0, amount1 };
        });
    }

    // ========== INTERNALS ==========

    private enter<T>(fn: () => T): T {
        return this.chain.call(this.chain.sender, () => this.lock.run(fn));
    }

    private requireTokens(): [Token, Token] {
        if (!this.tokens) {
            throw new PairError('NotInitialized', `Pair ${this.address} is not initialized`);
        }
        return this.tokens;
    }

    /** Balances excluding fees that are already owed to the protocol. */
    private tradeableBalances(token0: Token, token1: Token): [bigint, bigint] {
        const balance0 = token0.balanceOf(this.address) - this.accumulatedFee0;
        const balance1 = token1.balanceOf(this.address) - this.accumulatedFee1;
        if (balance0 < 0n || balance1 < 0n) {
            throw new PairError('InvalidReserveState', 'Balance below accumulated fees');
        }
        return [balance0, balance1];
    }

    private safeTransfer(token: Token, to: Address, amount: bigint): void {
        let ok: boolean;
        try {
            ok = this.chain.call(this.address, () => token.transfer(to, amount));
        } catch (error) {
            throw new PairError('TransferFailed', `${token.symbol} transfer failed: ${error instanceof Error ? error.message : String(error)}`, {
                token: token.address,
                cause: error,
            });
        }
        if (ok !== true) {
            throw new PairError('TransferFailed', `${token.symbol} transfer returned false`, { token: token.address });
        }
    }

    /**
     * Applies the fee schedule to one input. The protocol share stays in the
     * pair as accumulated fee; the creator share is paid out, or accumulated
     * when no creator can be resolved.
     */
    private takeFees(index: 0 | 1, token: Token, amountIn: bigint): { protocolFee: bigint; creatorFee: bigint } {
        if (amountIn === 0n) return { protocolFee: 0n, creatorFee: 0n };

        const launcher = this.factory.getLauncher();
        const protocolToken = this.factory.getProtocolToken();
        const isProtocolTokenPair = sameAddress(this.token0, protocolToken) || sameAddress(this.token1, protocolToken);
        const { protocolFee, creatorFee } = calculateFees(token, amountIn, isProtocolTokenPair, launcher);

        let retained = protocolFee;
        if (creatorFee > 0n) {
            const recipient = resolveFeeRecipient(token, creatorFee, launcher);
            if (recipient.kind === 'creator') {
                this.safeTransfer(token, recipient.creator, recipient.amount);
                this.chain.emit({ name: 'CreatorFee', address: this.address, token: token.address, creator: recipient.creator, amount: recipient.amount });
            } else {
                retained += recipient.amount;
            }
        }

        if (index === 0) {
            this.accumulatedFee0 += retained;
        } else {
            this.accumulatedFee1 += retained;
        }
        return { protocolFee, creatorFee };
    }

    /**
     * Writes reserves. Cumulative prices advance first, using the old reserves.
     */
    private update(balance0: bigint, balance1: bigint, reserve0: bigint, reserve1: bigint): void {
        if (!validateReserveOverflow(balance0, balance1)) {
            throw new PairError('ReserveOverflow', undefined, { balance0: balance0.toString(), balance1: balance1.toString() });
        }
        const next = accumulate(
            {
                price0CumulativeLast: this.price0Cumulative,
                price1CumulativeLast: this.price1Cumulative,
                blockTimestampLast: this.blockTimestampLast,
            },
            reserve0,
            reserve1,
            this.chain.now
        );
        this.price0Cumulative = next.price0CumulativeLast;
        this.price1Cumulative = next.price1CumulativeLast;
        this.blockTimestampLast = next.blockTimestampLast;
        this.reserve0 = balance0;
        this.reserve1 = balance1;
        this.chain.emit({ name: 'Sync', address: this.address, reserve0: balance0, reserve1: balance1 });
    }

    /**
     * If the liquidity-growth fee is on, mints the protocol's share of the
     * growth in sqrt(k) since kLast. Clears kLast while it is off.
     */
    private mintFee(reserve0: bigint, reserve1: bigint): boolean {
        const feeTo = this.factory.feeToFor(this.address);
        const feeOn = feeTo !== undefined && !isZeroAddress(feeTo);
        if (feeOn && feeTo !== undefined) {
            if (this.k !== 0n) {
                const rootK = sqrt(reserve0 * reserve1);
                const rootKLast = sqrt(this.k);
                if (rootK > rootKLast) {
                    const numerator = this.supply * (rootK - rootKLast);
                    const denominator = rootK * PROTOCOL_GROWTH_SHARE_DENOMINATOR + rootKLast;
                    const liquidity = numerator / denominator;
                    if (liquidity > 0n) this._mint(feeTo, liquidity);
                }
            }
        } else if (this.k !== 0n) {
            this.k = 0n;
        }
        return feeOn;
    }

    // ========== SNAPSHOT / SERIALIZATION ==========

    snapshot(): () => void {
        const restoreLedger = super.snapshot();
        const saved = {
            reserve0: this.reserve0,
            reserve1: this.reserve1,
            blockTimestampLast: this.blockTimestampLast,
            price0Cumulative: this.price0Cumulative,
            price1Cumulative: this.price1Cumulative,
            k: this.k,
            accumulatedFee0: this.accumulatedFee0,
            accumulatedFee1: this.accumulatedFee1,
            tokens: this.tokens,
        };
        return () => {
            restoreLedger();
            this.reserve0 = saved.reserve0;
            this.reserve1 = saved.reserve1;
            this.blockTimestampLast = saved.blockTimestampLast;
            this.price0Cumulative = saved.price0Cumulative;
            this.price1Cumulative = saved.price1Cumulative;
            this.k = saved.k;
            this.accumulatedFee0 = saved.accumulatedFee0;
            this.accumulatedFee1 = saved.accumulatedFee1;
            this.tokens = saved.tokens;
        };
    }

    getState(): PairState {
        return {
            address: this.address,
            factory: this.factory.address,
            token0: this.token0,
            token1: this.token1,
            reserve0: this.reserve0.toString(),
            reserve1: this.reserve1.toString(),
            blockTimestampLast: this.blockTimestampLast,
            price0CumulativeLast: this.price0Cumulative.toString(),
            price1CumulativeLast: this.price1Cumulative.toString(),
            kLast: this.k.toString(),
            accumulatedFee0: this.accumulatedFee0.toString(),
            accumulatedFee1: this.accumulatedFee1.toString(),
        };
    }

    loadState(data: PairState): void {
        this.reserve0 = BigInt(data.reserve0);
        this.reserve1 = BigInt(data.reserve1);
        this.blockTimestampLast = data.blockTimestampLast;
        this.price0Cumulative = BigInt(data.price0CumulativeLast);
        this.price1Cumulative = BigInt(data.price1CumulativeLast);
        this.k = BigInt(data.kLast);
        this.accumulatedFee0 = BigInt(data.accumulatedFee0);
        this.accumulatedFee1 = BigInt(data.accumulatedFee1);
    }
}
