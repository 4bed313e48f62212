/**
 * Factory CLI Command
 * Inspect and change protocol-wide settings
 */

import { Command } from 'commander';
import * as ui from '../../utils/cli.js';
import { loadDeployment, parseAddress, persist, runAction } from '../context.js';

export const factoryCommand = new Command('factory')
    .description('Factory settings');

factoryCommand
    .command('info')
    .description('Show factory settings')
    .action(() => runAction(() => {
        const { factory } = loadDeployment();
        console.log(ui.box(ui.rows([
            ['Address', factory.address],
            ['Protocol token', factory.getProtocolToken()],
            ['Launcher', factory.getLauncher()],
            ['Fee collector', factory.getFeeTo()],
            ['Fee setter', factory.getFeeToSetter()],
            ['Retroactive fee', factory.retroactiveProtocolFee ? 'yes' : 'no'],
            ['Pairs', factory.allPairsLength],
        ]), `${ui.sym.factory} Factory`));
    }));

factoryCommand
    .command('set-fee-to')
    .description('Set the protocol fee collector (zero address turns the fee off)')
    .requiredOption('--from <address>', 'Current fee setter')
    .requiredOption('--fee-to <address>', 'New fee collector')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const from = parseAddress(options.from, 'caller');
        deployment.chain.call(from, () => deployment.factory.setFeeTo(parseAddress(options.feeTo, 'fee-to')));
        persist(deployment);
        ui.success(`Fee collector set to ${deployment.factory.getFeeTo()}`);
    }));

factoryCommand
    .command('set-fee-to-setter')
    .description('Hand over the right to change factory settings')
    .requiredOption('--from <address>', 'Current fee setter')
    .requiredOption('--setter <address>', 'New fee setter')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const from = parseAddress(options.from, 'caller');
        deployment.chain.call(from, () => deployment.factory.setFeeToSetter(parseAddress(options.setter, 'setter')));
        persist(deployment);
        ui.success(`Fee setter set to ${deployment.factory.getFeeToSetter()}`);
    }));

factoryCommand
    .command('set-launcher')
    .description('Set the launcher whose tokens get the launch fee schedule')
    .requiredOption('--from <address>', 'Current fee setter')
    .requiredOption('--launcher <address>', 'New launcher')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const from = parseAddress(options.from, 'caller');
        deployment.chain.call(from, () => deployment.factory.setLauncher(parseAddress(options.launcher, 'launcher')));
        persist(deployment);
        ui.success(`Launcher set to ${deployment.factory.getLauncher()}`);
    }));
