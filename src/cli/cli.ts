#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { factoryCommand } from './commands/factory.js';
import { initCommand } from './commands/init.js';
import { oracleCommand } from './commands/oracle.js';
import { pairCommand } from './commands/pair.js';
import { timeCommand } from './commands/time.js';
import { tokenCommand } from './commands/token.js';

const program = new Command();

program
    .name('amm')
    .description('Constant-product AMM pairs with launch-token fees, flash swaps and TWAP')
    .version('1.0.0');

program.addCommand(initCommand);
program.addCommand(tokenCommand);
program.addCommand(factoryCommand);
program.addCommand(pairCommand);
program.addCommand(oracleCommand);
program.addCommand(timeCommand);

program.parse();
