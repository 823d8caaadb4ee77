import { Command } from 'commander';
import chalk from 'chalk';
import { ClientFactory } from '../client-factory';
import { validateMarket } from '../utils/validation';
import { displayTable, executeCommand, formatCell, printJson } from '../utils/error-handler';

interface MarketsOptions {
  market?: string;
  price?: boolean;
  json?: boolean;
}

export const marketsCommand = new Command('markets')
  .description('List all markets, or show a single market')
  .option('-m, --market <market>', 'Single market to show (e.g., BTC-PERP, BTC/USD)')
  .option('--price', 'Only print the current price (requires --market)')
  .option('--json', 'Output in JSON format')
  .action(async (options: MarketsOptions) => {
    await executeCommand(async () => {
      if (options.price && !options.market) {
        throw new Error('--price requires --market');
      }

      const client = ClientFactory.getClient();

      if (options.market) {
        const market = validateMarket(options.market);

        if (options.price) {
          const price = await client.getSingleMarketPrice(market);
          if (options.json) {
            printJson({ market, price });
          } else {
            console.log(`${chalk.bold.cyan(market)}: ${chalk.bold.green(formatCell(price) || 'n/a')}`);
          }
          return;
        }

        const details = await client.getSingleMarket(market);
        if (options.json) {
          printJson(details);
        } else {
          console.log(`\n${chalk.bold.cyan(`${details.name} Market`)}:`);
          Object.entries(details).forEach(([key, value]) => {
            console.log(`  ${`${key}:`.padEnd(24)}${formatCell(value)}`);
          });
        }
        return;
      }

      const markets = await client.getAllMarkets();
      if (options.json) {
        printJson(markets);
        return;
      }

      console.log(`\n${chalk.bold.cyan('Markets')} (${markets.length}):`);
      displayTable(
        markets.map(market => ({
          Name: formatCell(market.name),
          Type: formatCell(market.type),
          Price: formatCell(market.price),
          Bid: formatCell(market.bid),
          Ask: formatCell(market.ask),
          Enabled: formatCell(market.enabled),
        }))
      );
    }, 'markets');
  });

marketsCommand.addHelpText(
  'after',
  `
Examples:
  $ ftx-client markets                              # List all markets
  $ ftx-client markets --market BTC-PERP            # Show one market
  $ ftx-client markets --market BTC-PERP --price    # Show only its price
`
);
