/**
 * Init CLI Command
 * Deploys the protocol token, the pair factory and the price oracle
 */

import { Command } from 'commander';
import { Chain } from '../../chain/Chain.js';
import { config } from '../../config.js';
import { PairError } from '../../errors/index.js';
import { PairFactory } from '../../factory/PairFactory.js';
import { PriceOracle } from '../../oracle/PriceOracle.js';
import { storage } from '../../storage/index.js';
import { StandardToken } from '../../token/StandardToken.js';
import * as ui from '../../utils/cli.js';
import { parseAddress, parseAmount, persist, runAction } from '../context.js';

export const initCommand = new Command('init')
    .description('Create a fresh deployment: protocol token, factory and oracle')
    .requiredOption('--admin <address>', 'Account that owns the protocol token and may change factory settings')
    .option('--launcher <address>', 'Launcher whose tokens get the launch fee schedule (defaults to admin)')
    .option('--symbol <symbol>', 'Protocol token symbol', 'PROTO')
    .option('--supply <amount>', 'Protocol token supply minted to admin', '0')
    .option('--stable-symbol <symbol>', 'Also create a stablecoin the oracle prices against')
    .option('--force', 'Overwrite an existing deployment')
    .action((options) => runAction(() => {
        if (storage.exists() && options.force !== true) {
            throw new PairError('AlreadyInitialized', `Deployment already exists at ${storage.path}. Use --force to overwrite`);
        }
        if (storage.exists()) ui.warn(`Overwriting deployment at ${storage.path}`);

        const admin = parseAddress(options.admin, 'admin');
        const launcher = options.launcher ? parseAddress(options.launcher, 'launcher') : admin;
        const supply = parseAmount(options.supply, 'supply');
        const chain = new Chain();

        const protocolToken = chain.call(admin, () => new StandardToken(chain, { name: 'Protocol Token', symbol: options.symbol }));
        if (supply > 0n) chain.call(admin, () => protocolToken.mint(admin, supply));

        const factory = chain.call(admin, () => new PairFactory(chain, {
            protocolToken: protocolToken.address,
            feeToSetter: config.protocolFee.feeToSetter ?? admin,
            feeTo: config.protocolFee.feeTo,
            launcher,
            retroactiveProtocolFee: config.protocolFee.retroactive,
        }));
        const stablecoin = options.stableSymbol
            ? chain.call(admin, () => new StandardToken(chain, { name: 'Stablecoin', symbol: options.stableSymbol }))
            : undefined;
        const oracle = chain.call(admin, () => new PriceOracle(chain, factory, { stablecoin: stablecoin?.address }));

        persist({ chain, factory, oracle });

        console.log(ui.successBox(ui.rows([
            ['Network', config.network_mode],
            ['Protocol token', `${protocolToken.symbol} ${protocolToken.address}`],
            ['Factory', factory.address],
            ['Oracle', oracle.address],
            ['Stablecoin', stablecoin ? `${stablecoin.symbol} ${stablecoin.address}` : '-'],
            ['Launcher', factory.getLauncher()],
            ['Fee setter', factory.getFeeToSetter()],
            ['State file', storage.path],
        ]), `${ui.sym.factory} Deployment created`));
    }));
