import { describe, it, expect } from 'vitest';
import type { Chain } from '../../src/chain/Chain.js';
import { PairError } from '../../src/errors/index.js';
import { MAX_UINT112 } from '../../src/math/uint.js';
import { MINIMUM_LIQUIDITY, type Pair } from '../../src/pair/Pair.js';
import { getAmountOut } from '../../src/pair/library.js';
import type { CallbackData, PonderCallee } from '../../src/pair/types.js';
import { StandardToken } from '../../src/token/StandardToken.js';
import type { LaunchTokenCapability } from '../../src/token/Token.js';
import { ZERO_ADDRESS, type Address } from '../../src/utils/address.js';
import {
    ADMIN,
    ALICE,
    BOB,
    CREATOR,
    FEE_TO,
    LAUNCHER,
    addLiquidity,
    catchError,
    createPair,
    expectPairError,
    launchToken,
    mintTo,
    setup,
    type Env,
    type PairHandle,
} from '../helpers/fixture.js';

const BORROWER = '0x00000000000000000000000000000000000000b1';
const FLAG = new Uint8Array([1]);

class Borrower implements PonderCallee {
    readonly address: Address = BORROWER;
    calls = 0;
    private readonly onCall: (amount0: bigint, amount1: bigint, data: CallbackData) => void;

    constructor(chain: Chain, onCall: (amount0: bigint, amount1: bigint, data: CallbackData) => void) {
        this.onCall = onCall;
        chain.deploy(this);
    }

    ponderCall(_initiator: Address, amount0: bigint, amount1: bigint, data: CallbackData): void {
        this.calls++;
        this.onCall(amount0, amount1, data);
    }
}

/** Returns `false` or throws from transfer once switched on. */
class FaultyToken extends StandardToken {
    mode: 'ok' | 'false' | 'throw' = 'ok';

    transfer(to: Address, amount: bigint): boolean {
        if (this.mode === 'false') return false;
        if (this.mode === 'throw') throw new Error('token paused');
        return super.transfer(to, amount);
    }
}

/** Claims the launch capability but reverts when asked whether it is a launch token. */
class BrokenLaunchToken extends StandardToken {
    readonly launch: LaunchTokenCapability = {
        isLaunchToken: () => {
            throw new Error('revert');
        },
        launcher: () => LAUNCHER,
        creator: () => CREATOR,
    };
}

function seeded(env: Env, amount0: bigint = 10_000n, amount1: bigint = 10_000n): PairHandle {
    const handle = createPair(env, env.tokenA, env.tokenB);
    addLiquidity(env, handle, ALICE, amount0, amount1);
    return handle;
}

function swapExactIn(env: Env, handle: PairHandle, from: Address, zeroForOne: boolean, amountIn: bigint) {
    const { pair, token0, token1 } = handle;
    const tokenIn = zeroForOne ? token0 : token1;
    mintTo(env.chain, tokenIn, from, amountIn);
    const { reserve0, reserve1 } = pair.getReserves();
    const amountOut = zeroForOne
        ? getAmountOut(amountIn, reserve0, reserve1)
        : getAmountOut(amountIn, reserve1, reserve0);
    return env.chain.call(from, () => {
        tokenIn.transfer(pair.address, amountIn);
        return zeroForOne ? pair.swap(0n, amountOut, from) : pair.swap(amountOut, 0n, from);
    });
}

function product(pair: Pair): bigint {
    const { reserve0, reserve1 } = pair.getReserves();
    return reserve0 * reserve1;
}

describe('Pair', () => {
    describe('initialize', () => {
        it('binds the sorted token addresses', () => {
            const env = setup();
            const { pair } = createPair(env, env.tokenA, env.tokenB);
            expect(pair.isInitialized()).toBe(true);
            expect(pair.token0 < pair.token1).toBe(true);
        });

        it('rejects callers other than the factory', () => {
            const env = setup();
            const { pair } = createPair(env, env.tokenA, env.tokenB);
            expectPairError(() => env.chain.call(ALICE, () => pair.initialize(env.tokenA.address, env.tokenB.address)), 'Forbidden');
        });

        it('rejects a second initialization', () => {
            const env = setup();
            const { pair } = createPair(env, env.tokenA, env.tokenB);
            expectPairError(
                () => env.chain.call(env.factory.address, () => pair.initialize(env.tokenA.address, env.tokenB.address)),
                'AlreadyInitialized'
            );
        });
    });

    describe('mint', () => {
        it('locks MINIMUM_LIQUIDITY on the first deposit', () => {
            const env = setup();
            const handle = createPair(env, env.tokenA, env.tokenB);
            const liquidity = addLiquidity(env, handle, ALICE, 10_000n, 10_000n);

            expect(liquidity).toBe(9_000n);
            expect(handle.pair.balanceOf(ALICE)).toBe(9_000n);
            expect(handle.pair.balanceOf(ZERO_ADDRESS)).toBe(MINIMUM_LIQUIDITY);
            expect(handle.pair.totalSupply()).toBe(10_000n);
            expect(handle.pair.getReserves()).toMatchObject({ reserve0: 10_000n, reserve1: 10_000n });
        });

        it('rejects a first deposit of 500/500', () => {
            const env = setup();
            const handle = createPair(env, env.tokenA, env.tokenB);
            expectPairError(() => addLiquidity(env, handle, ALICE, 500n, 500n), 'InsufficientInitialLiquidity');
            expect(handle.pair.totalSupply()).toBe(0n);
        });

        it('mints the smaller of the two ratios on later deposits', () => {
            const env = setup();
            const handle = seeded(env);
            expect(addLiquidity(env, handle, BOB, 5_000n, 2_500n)).toBe(2_500n);
            expect(handle.pair.getReserves()).toMatchObject({ reserve0: 15_000n, reserve1: 12_500n });
        });

        it('rejects a deposit that would overflow the reserves and changes nothing', () => {
            const env = setup();
            const handle = seeded(env);
            const { pair, token0 } = handle;
            const before = pair.getReserves();

            expectPairError(() => addLiquidity(env, handle, BOB, MAX_UINT112, 1n), 'ReserveOverflow');

            expect(pair.getReserves()).toEqual(before);
            expect(pair.totalSupply()).toBe(10_000n);
            expect(pair.balanceOf(BOB)).toBe(0n);
            expect(token0.balanceOf(pair.address)).toBe(10_000n);
        });

        it('rejects a deposit that mints nothing', () => {
            const env = setup();
            const handle = seeded(env);
            expectPairError(() => addLiquidity(env, handle, BOB, 1n, 0n), 'InsufficientLiquidityMinted');
        });

        it('emits Mint and Sync', () => {
            const env = setup();
            const handle = createPair(env, env.tokenA, env.tokenB);
            const from = env.chain.eventCount;
            addLiquidity(env, handle, ALICE, 10_000n, 10_000n);
            const names = env.chain.getLogs({ address: handle.pair.address, fromIndex: from }).map((e) => e.name);
            expect(names).toEqual(['Transfer', 'Transfer', 'Sync', 'Mint']);
        });
    });

    describe('burn', () => {
        it('returns deposits minus the locked liquidity', () => {
            const env = setup();
            const handle = seeded(env);
            const { pair, token0, token1 } = handle;

            const result = env.chain.call(ALICE, () => {
                pair.transfer(pair.address, 9_000n);
                return pair.burn(ALICE);
            });

            expect(result).toEqual({ amount0: 9_000n, amount1: 9_000n });
            expect(token0.balanceOf(ALICE)).toBe(9_000n);
            expect(token1.balanceOf(ALICE)).toBe(9_000n);
            expect(pair.totalSupply()).toBe(MINIMUM_LIQUIDITY);
            expect(pair.getReserves()).toMatchObject({ reserve0: 1_000n, reserve1: 1_000n });
        });

        it('returns a second provider exactly what they deposited', () => {
            const env = setup();
            const handle = seeded(env);
            const { pair, token0, token1 } = handle;

            expect(addLiquidity(env, handle, BOB, 3_333n, 3_333n)).toBe(3_333n);
            const result = env.chain.call(BOB, () => {
                pair.transfer(pair.address, 3_333n);
                return pair.burn(BOB);
            });

            expect(result).toEqual({ amount0: 3_333n, amount1: 3_333n });
            expect(pair.getReserves()).toMatchObject({ reserve0: 10_000n, reserve1: 10_000n });
            expect(pair.totalSupply()).toBe(10_000n);
            expect(token0.balanceOf(BOB)).toBe(3_333n);
            expect(token1.balanceOf(BOB)).toBe(3_333n);
        });

        it('rejects a burn with no LP held by the pair', () => {
            const env = setup();
            const handle = seeded(env);
            expectPairError(() => env.chain.call(ALICE, () => handle.pair.burn(ALICE)), 'InsufficientLiquidityBurned');
        });

        it('rejects a burn before any liquidity exists', () => {
            const env = setup();
            const { pair } = createPair(env, env.tokenA, env.tokenB);
            expectPairError(() => env.chain.call(ALICE, () => pair.burn(ALICE)), 'InsufficientLiquidityBurned');
        });
    });

    describe('swap', () => {
        function pairAt1000(): { env: Env; handle: PairHandle } {
            const env = setup();
            const handle = createPair(env, env.tokenA, env.tokenB);
            mintTo(env.chain, handle.token0, handle.pair.address, 1_000n);
            mintTo(env.chain, handle.token1, handle.pair.address, 1_000n);
            env.chain.call(ALICE, () => handle.pair.sync());
            mintTo(env.chain, handle.token0, ALICE, 100n);
            return { env, handle };
        }

        it('accepts the quoted output for 100 in at (1000, 1000)', () => {
            const { env, handle } = pairAt1000();
            const { pair, token0, token1 } = handle;
            expect(getAmountOut(100n, 1_000n, 1_000n)).toBe(90n);

            const result = env.chain.call(ALICE, () => {
                token0.transfer(pair.address, 100n);
                return pair.swap(0n, 90n, ALICE);
            });

            expect(result.amount0In).toBe(100n);
            expect(result.amount1In).toBe(0n);
            expect(result.protocolFee0).toBe(0n);
            expect(token1.balanceOf(ALICE)).toBe(90n);
            expect(pair.getReserves()).toMatchObject({ reserve0: 1_100n, reserve1: 910n });
        });

        it('rejects one unit more than the quote and rolls back the deposit', () => {
            const { env, handle } = pairAt1000();
            const { pair, token0, token1 } = handle;
            const events = env.chain.eventCount;

            expectPairError(() => env.chain.call(ALICE, () => {
                token0.transfer(pair.address, 100n);
                pair.swap(0n, 91n, ALICE);
            }), 'KInvariant');

            expect(token0.balanceOf(ALICE)).toBe(100n);
            expect(token1.balanceOf(ALICE)).toBe(0n);
            expect(pair.getReserves()).toMatchObject({ reserve0: 1_000n, reserve1: 1_000n });
            expect(env.chain.eventCount).toBe(events);
        });

        it('validates outputs and recipient', () => {
            const { env, handle } = pairAt1000();
            const { pair, token0 } = handle;
            expectPairError(() => env.chain.call(ALICE, () => pair.swap(0n, 0n, ALICE)), 'InsufficientOutputAmount');
            expectPairError(() => env.chain.call(ALICE, () => pair.swap(0n, 1_000n, ALICE)), 'InsufficientLiquidity');
            expectPairError(() => env.chain.call(ALICE, () => pair.swap(0n, 10n, token0.address)), 'InvalidRecipient');
            expectPairError(() => env.chain.call(ALICE, () => pair.swap(0n, 10n, ALICE)), 'InsufficientInputAmount');
        });

        it('keeps the reserve product from decreasing across many swaps', () => {
            const env = setup();
            const handle = seeded(env, 1_000_000n, 2_000_000n);
            let seed = 7n;
            let previous = product(handle.pair);
            for (let i = 0; i < 25; i++) {
                seed = (seed * 1_103_515_245n + 12_345n) % 2_147_483_648n;
                const amountIn = 1_000n + (seed % 200_000n);
                swapExactIn(env, handle, BOB, i % 2 === 0, amountIn);
                const current = product(handle.pair);
                expect(current >= previous).toBe(true);
                previous = current;
            }
        });

        it('charges the 5 bp protocol fee on standard inputs', () => {
            const env = setup();
            const handle = seeded(env, 1_000_000n, 1_000_000n);
            const result = swapExactIn(env, handle, BOB, true, 100_000n);

            expect(result.protocolFee0).toBe(50n);
            expect(result.creatorFee0).toBe(0n);
            expect(handle.pair.accumulatedFees()).toEqual({ accumulatedFee0: 50n, accumulatedFee1: 0n });
            expect(handle.pair.getReserves()).toMatchObject({ reserve0: 1_099_950n, reserve1: 909_339n });
            expect(handle.token0.balanceOf(handle.pair.address)).toBe(1_100_000n);
        });
    });

    describe('launch token fees', () => {
        function launchPair(env: Env, creator: Address | undefined, quote: StandardToken) {
            const launch = launchToken(env.chain, 'LNCH', creator);
            const handle = createPair(env, launch, quote);
            addLiquidity(env, handle, ALICE, 1_000_000n, 1_000_000n);
            const zeroForOne = handle.token0 === launch;
            const result = swapExactIn(env, handle, BOB, zeroForOne, 100_000n);
            const fees = handle.pair.accumulatedFees();
            return {
                launch,
                handle,
                protocolFee: zeroForOne ? result.protocolFee0 : result.protocolFee1,
                creatorFee: zeroForOne ? result.creatorFee0 : result.creatorFee1,
                accumulated: zeroForOne ? fees.accumulatedFee0 : fees.accumulatedFee1,
            };
        }

        it('splits 1/4 bp on protocol-token pairs and pays the creator', () => {
            const env = setup();
            const { launch, handle, protocolFee, creatorFee, accumulated } = launchPair(env, CREATOR, env.protocolToken);

            expect(protocolFee).toBe(10n);
            expect(creatorFee).toBe(40n);
            expect(accumulated).toBe(10n);
            expect(launch.balanceOf(CREATOR)).toBe(40n);

            const [event] = env.chain.getLogs({ name: 'CreatorFee', address: handle.pair.address });
            expect(event).toMatchObject({ token: launch.address, creator: CREATOR, amount: 40n });
        });

        it('splits 4/1 bp on base-asset pairs', () => {
            const env = setup();
            const { launch, protocolFee, creatorFee, accumulated } = launchPair(env, CREATOR, env.tokenA);

            expect(protocolFee).toBe(40n);
            expect(creatorFee).toBe(10n);
            expect(accumulated).toBe(40n);
            expect(launch.balanceOf(CREATOR)).toBe(10n);
        });

        it('folds the creator share into protocol fees when no creator is known', () => {
            const env = setup();
            const { protocolFee, creatorFee, accumulated } = launchPair(env, undefined, env.protocolToken);

            expect(protocolFee).toBe(10n);
            expect(creatorFee).toBe(40n);
            expect(accumulated).toBe(50n);
        });

        it('charges the standard fee when the launch capability reverts', () => {
            const env = setup();
            const broken = env.chain.call(ADMIN, () => new BrokenLaunchToken(env.chain, { name: 'Broken', symbol: 'BRKN' }));
            const handle = createPair(env, broken, env.protocolToken);
            addLiquidity(env, handle, ALICE, 1_000_000n, 1_000_000n);
            const zeroForOne = handle.token0 === broken;
            const result = swapExactIn(env, handle, BOB, zeroForOne, 100_000n);

            expect(zeroForOne ? result.protocolFee0 : result.protocolFee1).toBe(50n);
            expect(zeroForOne ? result.creatorFee0 : result.creatorFee1).toBe(0n);
            expect(broken.balanceOf(CREATOR)).toBe(0n);
            expect(env.chain.getLogs({ name: 'CreatorFee' })).toHaveLength(0);
        });

        it('treats tokens from another launcher as standard', () => {
            const env = setup();
            const foreign = launchToken(env.chain, 'FRGN', CREATOR, BOB);
            const handle = createPair(env, foreign, env.tokenA);
            addLiquidity(env, handle, ALICE, 1_000_000n, 1_000_000n);
            const zeroForOne = handle.token0 === foreign;
            const result = swapExactIn(env, handle, BOB, zeroForOne, 100_000n);

            expect(zeroForOne ? result.protocolFee0 : result.protocolFee1).toBe(50n);
            expect(zeroForOne ? result.creatorFee0 : result.creatorFee1).toBe(0n);
            expect(foreign.balanceOf(CREATOR)).toBe(0n);
        });
    });

    describe('flash swaps', () => {
        it('accepts a callback that repays principal plus fee', () => {
            const env = setup();
            const handle = seeded(env);
            const { pair, token0 } = handle;
            mintTo(env.chain, token0, BORROWER, 4n);
            const borrower = new Borrower(env.chain, (amount0) => {
                env.chain.call(BORROWER, () => token0.transfer(pair.address, amount0 + 4n));
            });

            const result = env.chain.call(ALICE, () => pair.swap(1_000n, 0n, BORROWER, FLAG));

            expect(borrower.calls).toBe(1);
            expect(result.amount0In).toBe(1_004n);
            expect(token0.balanceOf(BORROWER)).toBe(0n);
            expect(pair.getReserves()).toMatchObject({ reserve0: 10_004n, reserve1: 10_000n });
        });

        it('rejects a callback that repays too little', () => {
            const env = setup();
            const handle = seeded(env);
            const { pair, token0 } = handle;
            mintTo(env.chain, token0, BORROWER, 3n);
            new Borrower(env.chain, (amount0) => {
                env.chain.call(BORROWER, () => token0.transfer(pair.address, amount0 + 3n));
            });

            expectPairError(() => env.chain.call(ALICE, () => pair.swap(1_000n, 0n, BORROWER, FLAG)), 'KInvariant');
            expect(token0.balanceOf(BORROWER)).toBe(3n);
            expect(pair.getReserves()).toMatchObject({ reserve0: 10_000n, reserve1: 10_000n });
        });

        it('fails with Locked when the callback re-enters swap', () => {
            const env = setup();
            const handle = seeded(env);
            const { pair } = handle;
            new Borrower(env.chain, () => {
                env.chain.call(BORROWER, () => pair.swap(0n, 1n, BORROWER));
            });

            expectPairError(() => env.chain.call(ALICE, () => pair.swap(1_000n, 0n, BORROWER, FLAG)), 'Locked');
            expect(pair.locked).toBe(false);
            expect(pair.getReserves()).toMatchObject({ reserve0: 10_000n, reserve1: 10_000n });
        });

        it('fails with Locked when the callback calls sync', () => {
            const env = setup();
            const { pair } = seeded(env);
            new Borrower(env.chain, () => {
                env.chain.call(BORROWER, () => pair.sync());
            });
            expectPairError(() => env.chain.call(ALICE, () => pair.swap(1_000n, 0n, BORROWER, FLAG)), 'Locked');
        });

        it('rejects callback data for a recipient without ponderCall', () => {
            const env = setup();
            const { pair } = seeded(env);
            expectPairError(() => env.chain.call(ALICE, () => pair.swap(1_000n, 0n, BOB, FLAG)), 'InvalidCallee');
        });

        it('propagates errors thrown by the callee unchanged', () => {
            const env = setup();
            const { pair } = seeded(env);
            new Borrower(env.chain, () => {
                throw new Error('callee failed');
            });
            const error = catchError(() => env.chain.call(ALICE, () => pair.swap(1_000n, 0n, BORROWER, FLAG)));
            expect(error).toBeInstanceOf(Error);
            expect(error).not.toBeInstanceOf(PairError);
        });
    });

    describe('skim and sync', () => {
        it('skims exactly a 50-unit donation', () => {
            const env = setup();
            const handle = seeded(env);
            mintTo(env.chain, handle.token0, handle.pair.address, 50n);

            const result = env.chain.call(ALICE, () => handle.pair.skim(BOB));

            expect(result).toEqual({ amount0: 50n, amount1: 0n });
            expect(handle.token0.balanceOf(BOB)).toBe(50n);
            expect(handle.pair.getReserves()).toMatchObject({ reserve0: 10_000n, reserve1: 10_000n });
        });

        it('does not skim accumulated protocol fees', () => {
            const env = setup();
            const handle = seeded(env, 1_000_000n, 1_000_000n);
            swapExactIn(env, handle, BOB, true, 100_000n);

            const result = env.chain.call(ALICE, () => handle.pair.skim(ALICE));
            expect(result).toEqual({ amount0: 0n, amount1: 0n });
        });

        it('sync absorbs a donation into reserves', () => {
            const env = setup();
            const handle = seeded(env);
            mintTo(env.chain, handle.token1, handle.pair.address, 250n);

            env.chain.call(ALICE, () => handle.pair.sync());
            expect(handle.pair.getReserves()).toMatchObject({ reserve0: 10_000n, reserve1: 10_250n });
        });

        it('sync rejects balances past 112 bits and keeps the reserves', () => {
            const env = setup();
            const { pair, token0 } = seeded(env);
            env.chain.advanceTime(60);
            const before = pair.getReserves();
            mintTo(env.chain, token0, pair.address, MAX_UINT112);

            expectPairError(() => env.chain.call(ALICE, () => pair.sync()), 'ReserveOverflow');
            expect(pair.getReserves()).toEqual(before);
        });

        it('sync rejects an empty pair', () => {
            const env = setup();
            const { pair } = createPair(env, env.tokenA, env.tokenB);
            expectPairError(() => env.chain.call(ALICE, () => pair.sync()), 'InvalidReserveState');
        });
    });

    describe('protocol fees', () => {
        it('pays accumulated fees to feeTo', () => {
            const env = setup({ feeTo: FEE_TO });
            const handle = seeded(env, 1_000_000n, 1_000_000n);
            swapExactIn(env, handle, BOB, true, 100_000n);

            const result = env.chain.call(FEE_TO, () => handle.pair.collectProtocolFees());

            expect(result).toEqual({ amount0: 50n, amount1: 0n });
            expect(handle.token0.balanceOf(FEE_TO)).toBe(50n);
            expect(handle.pair.accumulatedFees()).toEqual({ accumulatedFee0: 0n, accumulatedFee1: 0n });
            expect(handle.token0.balanceOf(handle.pair.address)).toBe(1_099_950n);
        });

        it('rejects collection by anyone else', () => {
            const env = setup({ feeTo: FEE_TO });
            const handle = seeded(env);
            expectPairError(() => env.chain.call(ALICE, () => handle.pair.collectProtocolFees()), 'Forbidden');
        });

        it('rejects collection while feeTo is unset', () => {
            const env = setup();
            const handle = seeded(env);
            expectPairError(() => env.chain.call(ZERO_ADDRESS, () => handle.pair.collectProtocolFees()), 'Forbidden');
        });

        it('mints the liquidity-growth fee to feeTo on the next burn', () => {
            const env = setup({ feeTo: FEE_TO });
            const handle = seeded(env, 1_000_000n, 1_000_000n);
            const { pair } = handle;
            expect(pair.kLast).toBe(1_000_000_000_000n);

            swapExactIn(env, handle, BOB, true, 100_000n);
            const result = env.chain.call(ALICE, () => {
                pair.transfer(pair.address, 1_000n);
                return pair.burn(ALICE);
            });

            expect(pair.balanceOf(FEE_TO)).toBe(18n);
            expect(result).toEqual({ amount0: 1_099n, amount1: 909n });
            expect(pair.totalSupply()).toBe(999_018n);
            expect(pair.kLast).toBe(998_229_213_930n);
        });

        it('keeps kLast at zero while the fee is off', () => {
            const env = setup();
            const handle = seeded(env, 1_000_000n, 1_000_000n);
            swapExactIn(env, handle, BOB, true, 100_000n);
            expect(handle.pair.kLast).toBe(0n);
        });
    });

    describe('token failures', () => {
        function faultyPair() {
            const env = setup();
            const faulty = env.chain.call(ADMIN, () => new FaultyToken(env.chain, { name: 'Faulty', symbol: 'FLT' }));
            const handle = createPair(env, faulty, env.tokenA);
            addLiquidity(env, handle, ALICE, 10_000n, 10_000n);
            return { env, faulty, handle };
        }

        it('aborts when a transfer returns false', () => {
            const { env, faulty, handle } = faultyPair();
            faulty.mode = 'false';
            const lp = handle.pair.balanceOf(ALICE);

            expectPairError(() => env.chain.call(ALICE, () => {
                handle.pair.transfer(handle.pair.address, 1_000n);
                handle.pair.burn(ALICE);
            }), 'TransferFailed');
            expect(handle.pair.balanceOf(ALICE)).toBe(lp);
        });

        it('aborts when a transfer throws', () => {
            const { env, faulty, handle } = faultyPair();
            faulty.mode = 'throw';
            mintTo(env.chain, faulty, handle.pair.address, 1n);

            const error = catchError(() => env.chain.call(ALICE, () => handle.pair.skim(ALICE)));
            expect(error).toMatchObject({ code: 'TransferFailed', message: 'FLT transfer failed: token paused' });
            expect(faulty.balanceOf(handle.pair.address)).toBe(10_001n);
        });
    });

    describe('price accumulators', () => {
        it('accumulate the previous price over elapsed time', () => {
            const env = setup();
            const handle = seeded(env, 10_000n, 20_000n);
            const q112 = 1n << 112n;
            const { pair } = handle;

            env.chain.advanceTime(100);
            env.chain.call(ALICE, () => pair.sync());

            expect(pair.price0CumulativeLast).toBe(200n * q112);
            expect(pair.price1CumulativeLast).toBe(50n * q112);
            expect(pair.getReserves().blockTimestampLast).toBe(env.chain.now);
        });

        it('do not move within the same second', () => {
            const env = setup();
            const { pair } = seeded(env, 10_000n, 20_000n);
            env.chain.call(ALICE, () => pair.sync());
            expect(pair.price0CumulativeLast).toBe(0n);
        });
    });
});
