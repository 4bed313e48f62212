/**
 * Token CLI Command
 * Create, mint and inspect tokens
 */

import { Command } from 'commander';
import { findPair } from '../../storage/index.js';
import { LaunchToken } from '../../token/LaunchToken.js';
import { StandardToken } from '../../token/StandardToken.js';
import type { Token } from '../../token/Token.js';
import * as ui from '../../utils/cli.js';
import {
    loadDeployment,
    parseAddress,
    parseAmount,
    persist,
    requireToken,
    runAction,
    type InitializedDeployment,
} from '../context.js';

export const tokenCommand = new Command('token')
    .description('Token operations');

// ========== CREATE ==========

tokenCommand
    .command('create')
    .description('Deploy a standard token, or a launch token with --launch')
    .requiredOption('--owner <address>', 'Token owner (may mint)')
    .requiredOption('--name <name>', 'Token name')
    .requiredOption('--symbol <symbol>', 'Token symbol')
    .option('--decimals <number>', 'Token decimals', '18')
    .option('--launch', 'Issue through the launcher (launch fee schedule applies)')
    .option('--creator <address>', 'Creator receiving the creator share of swap fees (launch tokens)')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const { chain, factory } = deployment;
        const owner = parseAddress(options.owner, 'owner');
        const meta = { name: options.name, symbol: options.symbol, decimals: Number(options.decimals) };

        const token = options.launch === true
            ? chain.call(owner, () => new LaunchToken(chain, meta, {
                launcher: factory.getLauncher(),
                creator: options.creator ? parseAddress(options.creator, 'creator') : undefined,
            }))
            : chain.call(owner, () => new StandardToken(chain, meta));
        persist(deployment);

        const entries: Array<[string, string]> = [
            ['Address', token.address],
            ['Name', token.name],
            ['Symbol', token.symbol],
            ['Owner', token.owner],
        ];
        if (token instanceof LaunchToken) {
            entries.push(['Launcher', token.launchInfo.launcher]);
            entries.push(['Creator', token.launchInfo.creator ?? 'none']);
        }
        console.log(ui.successBox(ui.rows(entries), `${ui.sym.coin} Token created`));
    }));

// ========== MINT ==========

tokenCommand
    .command('mint')
    .description('Mint tokens as the token owner')
    .requiredOption('--token <address>', 'Token address')
    .requiredOption('--to <address>', 'Recipient')
    .requiredOption('--amount <amount>', 'Amount in base units')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const token = requireToken(deployment, options.token);
        const to = parseAddress(options.to, 'recipient');
        const amount = parseAmount(options.amount, 'amount');

        deployment.chain.call(token.owner, () => token.mint(to, amount));
        persist(deployment);

        ui.success(`Minted ${amount} ${token.symbol} to ${to}`);
    }));

// ========== BALANCE ==========

tokenCommand
    .command('balance')
    .description('Show a token balance (pairs are LP tokens too)')
    .requiredOption('--token <address>', 'Token or pair address')
    .requiredOption('--account <address>', 'Account')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const account = parseAddress(options.account, 'account');
        const token = requireLedger(deployment, options.token);
        console.log(ui.box(ui.rows([
            ['Token', `${token.symbol} ${token.address}`],
            ['Account', account],
            ['Balance', token.balanceOf(account)],
            ['Total supply', token.totalSupply()],
        ]), `${ui.sym.money} Balance`));
    }));

function requireLedger(deployment: InitializedDeployment, address: string): Token {
    const pair = findPair(deployment.chain, parseAddress(address, 'token'));
    return pair ?? requireToken(deployment, address);
}
