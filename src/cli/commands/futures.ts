import { Command } from 'commander';
import chalk from 'chalk';
import { ClientFactory } from '../client-factory';
import { validateUnderlying } from '../utils/validation';
import { displayTable, executeCommand, formatCell, printJson } from '../utils/error-handler';

interface FuturesOptions {
  underlying?: string;
  next?: boolean;
  json?: boolean;
}

export const futuresCommand = new Command('futures')
  .description('List enabled, non-expired futures')
  .option('-u, --underlying <asset>', 'Only futures on this underlying asset (e.g., BTC)')
  .option('--next', 'Only the future that expires first (defaults --underlying to BTC)')
  .option('--json', 'Output in JSON format')
  .action(async (options: FuturesOptions) => {
    await executeCommand(async () => {
      const client = ClientFactory.getClient();
      const underlying = options.underlying ? validateUnderlying(options.underlying) : undefined;

      if (options.next) {
        const future = await client.getNextUnderlyingFuture(underlying);
        if (options.json) {
          printJson(future);
        } else {
          console.log(
            `Next ${chalk.bold(future.underlying)} future: ${chalk.bold.cyan(future.name)} ` +
              `(expires ${formatCell(future.expiry)})`
          );
        }
        return;
      }

      const futures = underlying
        ? await client.getAllUnderlyingFutures(underlying)
        : await client.getAllFutures();

      if (options.json) {
        printJson(futures);
        return;
      }

      console.log(
        `\n${chalk.bold.cyan('Active Futures')}${underlying ? ` for ${underlying}` : ''} (${futures.length}):`
      );
      displayTable(
        futures.map(future => ({
          Name: future.name,
          Underlying: future.underlying,
          Expiry: formatCell(future.expiry),
          Last: formatCell(future.last),
          Mark: formatCell(future.mark),
        }))
      );
    }, 'futures');
  });

futuresCommand.addHelpText(
  'after',
  `
Examples:
  $ ftx-client futures                       # All active futures
  $ ftx-client futures --underlying ETH      # Active ETH futures
  $ ftx-client futures --underlying BTC --next
`
);
