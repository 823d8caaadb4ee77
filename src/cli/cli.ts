#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { marketsCommand } from './commands/markets';
import { futuresCommand } from './commands/futures';
import { ordersCommand } from './commands/orders';

const program = new Command();

program
  .name('ftx-client')
  .description('Signed REST client for the FTX trading API')
  .version('1.0.0');

program.addCommand(marketsCommand);
program.addCommand(futuresCommand);
program.addCommand(ordersCommand);

program.exitOverride((err: CommanderError) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red(`Unknown command: ${err.message}`));
    console.log(chalk.yellow('Run "ftx-client --help" to see available commands'));
    process.exit(1);
  }
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  throw err;
});

if (process.argv.length === 2) {
  program.help();
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
