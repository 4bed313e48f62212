/**
 * Time CLI Command
 * Moves the deployment clock forward
 */

import { Command } from 'commander';
import * as ui from '../../utils/cli.js';
import { loadDeployment, parseSeconds, persist, runAction } from '../context.js';

export const timeCommand = new Command('time')
    .description('Block clock');

timeCommand
    .command('advance')
    .description('Advance the clock')
    .requiredOption('--seconds <number>', 'Seconds to advance')
    .action((options) => runAction(() => {
        const deployment = loadDeployment();
        const now = deployment.chain.advanceTime(parseSeconds(options.seconds, 'seconds'));
        persist(deployment);
        ui.info(`${ui.sym.clock} Clock at ${now} (${new Date(now * 1000).toISOString()})`);
    }));

timeCommand
    .command('show')
    .description('Show the clock')
    .action(() => runAction(() => {
        const { chain } = loadDeployment();
        ui.info(`${ui.sym.clock} Clock at ${chain.now} (${new Date(chain.now * 1000).toISOString()})`);
    }));
