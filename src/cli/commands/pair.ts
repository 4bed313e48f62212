/**
 * Pair CLI Command
 * Create pairs, provide and remove liquidity, swap, reconcile balances
 *
 * Every state-changing command runs as one call from --from, so a
 * deposit followed by a failing mint leaves no trace.
 */

import { Command } from 'commander';
import { pairView, pairsView, quoteView, type PairView } from '../../api/views.js';
import { PairError } from '../../errors/index.js';
import type { Pair } from '../../pair/Pair.js';
import { getAmountOut } from '../../pair/library.js';
import type { Token } from '../../token/Token.js';
import { sameAddress } from '../../utils/address.js';
import * as ui from '../../utils/cli.js';
import {
    loadDeployment,
    parseAddress,
    parseAmount,
    persist,
    requirePair,
    requireToken,
    runAction,
    type InitializedDeployment,
} from '../context.js';

export const pairCommand = new Command('pair')
    .description('Pair operations');

function pairTokens(deployment: InitializedDeployment, pair: Pair): [Token, Token] {
    return [requireToken(deployment, pair.token0), requireToken(deployment, pair.token1)];
}

function renderPair(view: PairView): string {
    return ui.rows([
        ['Address', view.address],
        ['Token0', `${view.token0.symbol} ${view.token0.address}`],
        ['Token1', `${view.token1.symbol} ${view.token1.address}`],
        ['Reserve0', view.reserve0],
        ['Reserve1', view.reserve1],
        ['Price0', view.price0 === null ? '-' : view.price0.toPrecision(8)],
        ['Price1', view.price1 === null ? '-' : view.price1.toPrecision(8)],
        ['LP supply', view.totalSupply],
        ['kLast', view.kLast],
        ['Fees owed', `${view.accumulatedFee0} / ${view.accumulatedFee1}`],
        ['Last update', view.blockTimestampLast],
    ]);
}

// ========== CREATE ==========

pairCommand
    .command('create')
    .description('Create the pair for two tokens')
    .requiredOption('--from <address>', 'Caller')
    .requiredOption('--token-a <address>', 'First token')
    .requiredOption('--token-b <address>', 'Second token')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const from = parseAddress(options.from, 'caller');
        const pair = deployment.chain.call(from, () => deployment.factory.createPair(options.tokenA, options.tokenB));
        persist(deployment);
        console.log(ui.successBox(renderPair(pairView(deployment.chain, pair)), `${ui.sym.drop} Pair created`));
    }));

// ========== INFO ==========

pairCommand
    .command('list')
    .description('List all pairs')
    .action(() => runAction(() => {
        const deployment = loadDeployment();
        const views = pairsView(deployment.chain, deployment.factory);
        if (views.length === 0) {
            ui.info("No pairs yet. Use 'amm pair create'");
            return;
        }
        for (const view of views) {
            console.log(`${ui.sym.bullet} ${view.token0.symbol}/${view.token1.symbol} ${ui.c.dim(view.address)} reserves ${view.reserve0}/${view.reserve1}`);
        }
    }));

pairCommand
    .command('info')
    .description('Show pair state')
    .requiredOption('--pair <address>', 'Pair address')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const pair = requirePair(deployment, options.pair);
        console.log(ui.box(renderPair(pairView(deployment.chain, pair)), `${ui.sym.drop} Pair`));
    }));

pairCommand
    .command('quote')
    .description('Exact-input quote at current reserves')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--token-in <address>', 'Input token')
    .requiredOption('--amount-in <amount>', 'Input amount')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const pair = requirePair(deployment, options.pair);
        const view = quoteView(pair, parseAddress(options.tokenIn, 'token'), parseAmount(options.amountIn, 'amount-in'));
        console.log(ui.box(ui.rows([
            ['Input', `${view.amountIn} ${view.tokenIn}`],
            ['Output', `${view.amountOut} ${view.tokenOut}`],
            ['Reserves', `${view.reserveIn} ${ui.sym.arrow} ${view.reserveOut}`],
        ]), `${ui.sym.swap} Quote`));
    }));

// ========== LIQUIDITY ==========

pairCommand
    .command('add-liquidity')
    .description('Deposit both tokens and mint LP tokens')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Provider')
    .requiredOption('--amount0 <amount>', 'Token0 amount')
    .requiredOption('--amount1 <amount>', 'Token1 amount')
    .option('--to <address>', 'LP recipient (defaults to provider)')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const pair = requirePair(deployment, options.pair);
        const [token0, token1] = pairTokens(deployment, pair);
        const from = parseAddress(options.from, 'provider');
        const to = options.to ? parseAddress(options.to, 'recipient') : from;
        const amount0 = parseAmount(options.amount0, 'amount0');
        const amount1 = parseAmount(options.amount1, 'amount1');

        const liquidity = deployment.chain.call(from, () => {
            token0.transfer(pair.address, amount0);
            token1.transfer(pair.address, amount1);
            return pair.mint(to);
        });
        persist(deployment);

        console.log(ui.successBox(ui.rows([
            [`${token0.symbol} added`, amount0],
            [`${token1.symbol} added`, amount1],
            ['LP minted', liquidity],
            ['LP recipient', to],
        ]), `${ui.sym.drop} Liquidity added`));
    }));

pairCommand
    .command('remove-liquidity')
    .description('Return LP tokens and withdraw both tokens')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'LP holder')
    .requiredOption('--liquidity <amount>', 'LP tokens to burn')
    .option('--to <address>', 'Token recipient (defaults to holder)')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const pair = requirePair(deployment, options.pair);
        const [token0, token1] = pairTokens(deployment, pair);
        const from = parseAddress(options.from, 'holder');
        const to = options.to ? parseAddress(options.to, 'recipient') : from;
        const liquidity = parseAmount(options.liquidity, 'liquidity');

        const result = deployment.chain.call(from, () => {
            pair.transfer(pair.address, liquidity);
            return pair.burn(to);
        });
        persist(deployment);

        console.log(ui.successBox(ui.rows([
            ['LP burned', liquidity],
            [`${token0.symbol} out`, result.amount0],
            [`${token1.symbol} out`, result.amount1],
        ]), `${ui.sym.drop} Liquidity removed`));
    }));

// ========== SWAP ==========

pairCommand
    .command('swap')
    .description('Exact-input swap')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Trader')
    .requiredOption('--token-in <address>', 'Input token')
    .requiredOption('--amount-in <amount>', 'Input amount')
    .option('--min-out <amount>', 'Minimum output', '0')
    .option('--to <address>', 'Output recipient (defaults to trader)')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const pair = requirePair(deployment, options.pair);
        const [token0, token1] = pairTokens(deployment, pair);
        const from = parseAddress(options.from, 'trader');
        const to = options.to ? parseAddress(options.to, 'recipient') : from;
        const tokenIn = parseAddress(options.tokenIn, 'token');
        const amountIn = parseAmount(options.amountIn, 'amount-in');
        const minOut = parseAmount(options.minOut, 'min-out');

        const zeroForOne = sameAddress(tokenIn, token0.address);
        if (!zeroForOne && !sameAddress(tokenIn, token1.address)) {
            throw new PairError('InvalidAddress', `${tokenIn} is not a token of pair ${pair.address}`);
        }
        const { reserve0, reserve1 } = pair.getReserves();
        const amountOut = zeroForOne
            ? getAmountOut(amountIn, reserve0, reserve1)
            : getAmountOut(amountIn, reserve1, reserve0);
        if (amountOut < minOut) {
            throw new PairError('InsufficientOutputAmount', `Output ${amountOut} below minimum ${minOut}`);
        }

        const result = deployment.chain.call(from, () => {
            (zeroForOne ? token0 : token1).transfer(pair.address, amountIn);
            return zeroForOne ? pair.swap(0n, amountOut, to) : pair.swap(amountOut, 0n, to);
        });
        persist(deployment);

        const [symbolIn, symbolOut] = zeroForOne ? [token0.symbol, token1.symbol] : [token1.symbol, token0.symbol];
        console.log(ui.successBox(ui.rows([
            ['Input', `${amountIn} ${symbolIn}`],
            ['Output', `${amountOut} ${symbolOut}`],
            ['Protocol fee', `${zeroForOne ? result.protocolFee0 : result.protocolFee1} ${symbolIn}`],
            ['Creator fee', `${zeroForOne ? result.creatorFee0 : result.creatorFee1} ${symbolIn}`],
        ]), `${ui.sym.swap} Swap executed`));
    }));

// ========== RECONCILIATION ==========

pairCommand
    .command('skim')
    .description('Send balances above reserves + owed fees to a recipient')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Caller')
    .requiredOption('--to <address>', 'Recipient')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const pair = requirePair(deployment, options.pair);
        const from = parseAddress(options.from, 'caller');
        const to = parseAddress(options.to, 'recipient');
        const { amount0, amount1 } = deployment.chain.call(from, () => pair.skim(to));
        persist(deployment);
        ui.success(`Skimmed ${amount0} / ${amount1} to ${to}`);
    }));

pairCommand
    .command('sync')
    .description('Force reserves to match balances net of owed fees')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--from <address>', 'Caller')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const pair = requirePair(deployment, options.pair);
        const from = parseAddress(options.from, 'caller');
        const { reserve0, reserve1 } = deployment.chain.call(from, () => pair.sync());
        persist(deployment);
        ui.success(`Reserves synced: ${reserve0} / ${reserve1}`);
    }));

pairCommand
    .command('collect-fees')
    .description('Pay accumulated protocol fees to the fee collector')
    .requiredOption('--pair <address>', 'Pair address')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const pair = requirePair(deployment, options.pair);
        const feeTo = deployment.factory.getFeeTo();
        const { amount0, amount1 } = deployment.chain.call(feeTo, () => pair.collectProtocolFees());
        persist(deployment);
        console.log(ui.successBox(ui.rows([
            ['Collector', feeTo],
            ['Amount0', amount0],
            ['Amount1', amount1],
        ]), `${ui.sym.money} Protocol fees collected`));
    }));
