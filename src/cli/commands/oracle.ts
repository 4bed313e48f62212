/**
 * Oracle CLI Command
 * Record observations and read time-weighted average prices
 */

import { Command } from 'commander';
import { DEFAULT_PERIOD } from '../../oracle/PriceOracle.js';
import * as ui from '../../utils/cli.js';
import { loadDeployment, parseAddress, parseAmount, parseSeconds, persist, requirePair, runAction } from '../context.js';

export const oracleCommand = new Command('oracle')
    .description('TWAP oracle');

oracleCommand
    .command('update')
    .description('Record an observation (tracks the pair on first use)')
    .requiredOption('--pair <address>', 'Pair address')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const { oracle } = deployment;
        const pair = requirePair(deployment, options.pair);

        if (!oracle.isPairInitialized(pair.address)) {
            oracle.initializePair(pair.address);
            ui.success(`Now tracking ${pair.address}`);
        } else {
            const observation = oracle.update(pair.address);
            ui.success(`Observation recorded at ${observation.timestamp}`);
        }
        persist(deployment);
    }));

oracleCommand
    .command('consult')
    .description('Average output for an input over a period')
    .requiredOption('--pair <address>', 'Pair address')
    .requiredOption('--token-in <address>', 'Input token')
    .requiredOption('--amount-in <amount>', 'Input amount')
    .option('--period <seconds>', 'Averaging period', String(DEFAULT_PERIOD))
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const pair = requirePair(deployment, options.pair);
        const tokenIn = parseAddress(options.tokenIn, 'token');
        const amountIn = parseAmount(options.amountIn, 'amount-in');
        const period = parseSeconds(options.period, 'period');

        const average = deployment.oracle.consult(pair.address, tokenIn, amountIn, period);
        const spot = deployment.oracle.getCurrentPrice(pair.address, tokenIn, amountIn);
        console.log(ui.box(ui.rows([
            ['Input', `${amountIn} ${tokenIn}`],
            ['TWAP output', average],
            ['Spot output', spot],
            ['Period', `${period}s`],
            ['Observations', deployment.oracle.observationLength(pair.address)],
        ]), `${ui.sym.chart} Oracle`));
    }));

oracleCommand
    .command('stable-price')
    .description('Spot value of an amount in the stablecoin')
    .requiredOption('--token-in <address>', 'Input token')
    .requiredOption('--amount-in <amount>', 'Input amount')
    .action((options) => runAction(() => {
        const { oracle } = loadDeployment();
        const tokenIn = parseAddress(options.tokenIn, 'token');
        const amountIn = parseAmount(options.amountIn, 'amount-in');

        const value = oracle.getPriceInStablecoin(tokenIn, amountIn);
        console.log(ui.box(ui.rows([
            ['Input', `${amountIn} ${tokenIn}`],
            ['Stablecoin', oracle.stablecoin ?? '-'],
            ['Base token', oracle.baseToken],
            ['Value', value],
        ]), `${ui.sym.chart} Stablecoin price`));
    }));
