import { Command } from 'commander';
import chalk from 'chalk';
import { FtxOrder, OrderHistoryFilters } from '../../types';
import { ClientFactory } from '../client-factory';
import {
  validateMarket,
  validateOrderSide,
  validateOrderType,
  validatePositiveNumber,
  validateTimestamp,
} from '../utils/validation';
import {
  displayTable,
  executeCommand,
  formatCell,
  printJson,
  showSuccess,
} from '../utils/error-handler';

interface ListOptions {
  market?: string;
  json?: boolean;
}

interface HistoryOptions {
  market?: string;
  side?: string;
  type?: string;
  start?: string;
  end?: string;
  json?: boolean;
}

interface CreateOptions {
  market: string;
  side: string;
  size: string;
  price?: string;
  type: string;
  reduceOnly?: boolean;
  ioc?: boolean;
  postOnly?: boolean;
  clientId?: string;
  json?: boolean;
}

function toOrderRow(order: FtxOrder) {
  return {
    ID: formatCell(order.id),
    Market: formatCell(order.market),
    Side: formatCell(order.side).toUpperCase(),
    Type: formatCell(order.type).toUpperCase(),
    Size: formatCell(order.size),
    Price: formatCell(order.price) || 'Market',
    Filled: formatCell(order.filledSize),
    Status: formatCell(order.status).toUpperCase(),
  };
}

export const ordersCommand = new Command('orders').description('Place and inspect orders');

ordersCommand
  .command('list')
  .description('List open orders')
  .option('-m, --market <market>', 'Filter by market (e.g., BTC-PERP)')
  .option('--json', 'Output in JSON format')
  .action(async (options: ListOptions) => {
    await executeCommand(async () => {
      const market = options.market ? validateMarket(options.market) : undefined;
      const orders = await ClientFactory.getClient().getOpenOrders(market);

      if (options.json) {
        printJson(orders);
        return;
      }

      if (orders.length === 0) {
        console.log(chalk.yellow('No open orders found'));
        return;
      }

      console.log(`\n${chalk.bold.cyan('Open Orders')}${market ? ` for ${market}` : ''}:`);
      displayTable(orders.map(toOrderRow));
    }, 'list orders');
  });

ordersCommand
  .command('history')
  .description('List order history')
  .option('-m, --market <market>', 'Filter by market')
  .option('--side <side>', 'Filter by side (buy/sell)')
  .option('--type <type>', 'Filter by order type (market/limit)', 'market')
  .option('--start <time>', 'Start time, unix seconds')
  .option('--end <time>', 'End time, unix seconds')
  .option('--json', 'Output in JSON format')
  .action(async (options: HistoryOptions) => {
    await executeCommand(async () => {
      const filters: OrderHistoryFilters = {
        market: options.market ? validateMarket(options.market) : undefined,
        side: options.side ? validateOrderSide(options.side) : undefined,
        orderType: options.type ? validateOrderType(options.type) : undefined,
        startTime: options.start ? validateTimestamp(options.start, 'Start time') : undefined,
        endTime: options.end ? validateTimestamp(options.end, 'End time') : undefined,
      };

      const orders = await ClientFactory.getClient().getOrderHistory(filters);

      if (options.json) {
        printJson(orders);
        return;
      }

      console.log(`\n${chalk.bold.cyan('Order History')} (${orders.length}):`);
      displayTable(orders.map(toOrderRow));
    }, 'order history');
  });

ordersCommand
  .command('create')
  .description('Place a new order')
  .requiredOption('-m, --market <market>', 'Market (e.g., BTC-PERP)')
  .requiredOption('--side <side>', 'Order side (buy/sell)')
  .requiredOption('--size <size>', 'Order size')
  .option('--price <price>', 'Limit price (omit for market orders)')
  .option('--type <type>', 'Order type (market/limit)', 'market')
  .option('--reduce-only', 'Only reduce an existing position')
  .option('--ioc', 'Immediate or cancel')
  .option('--post-only', 'Only add liquidity')
  .option('--client-id <id>', 'Client order ID')
  .option('--json', 'Output in JSON format')
  .action(async (options: CreateOptions) => {
    await executeCommand(async () => {
      const market = validateMarket(options.market);
      const side = validateOrderSide(options.side);
      const type = validateOrderType(options.type);
      const size = validatePositiveNumber(options.size, 'Size');

      if (type === 'limit' && !options.price) {
        throw new Error('Price is required for limit orders');
      }
      const price = options.price ? validatePositiveNumber(options.price, 'Price') : null;

      const order = await ClientFactory.getClient().placeOrder({
        market,
        side,
        size,
        price,
        type,
        reduceOnly: options.reduceOnly ?? false,
        ioc: options.ioc ?? false,
        postOnly: options.postOnly ?? false,
        clientId: options.clientId ?? null,
      });

      if (options.json) {
        printJson(order);
        return;
      }

      showSuccess('Order placed successfully!');
      const row = toOrderRow(order);
      console.log(`  Order ID:  ${chalk.bold(row.ID)}`);
      console.log(`  Market:    ${row.Market}`);
      console.log(`  Side:      ${chalk.bold(row.Side)}`);
      console.log(`  Type:      ${row.Type}`);
      console.log(`  Size:      ${row.Size}`);
      console.log(`  Price:     ${row.Price}`);
      console.log(`  Status:    ${chalk.green(row.Status)}`);
    }, 'create order');
  });

ordersCommand.addHelpText(
  'after',
  `
Examples:
  $ ftx-client orders list                                   # All open orders
  $ ftx-client orders list --market BTC-PERP                 # Open orders on BTC-PERP
  $ ftx-client orders history --market BTC-PERP --side buy --start 1640995200
  $ ftx-client orders create --market BTC-PERP --side buy --size 0.01
  $ ftx-client orders create --market BTC-PERP --side sell --size 0.01 --type limit --price 50000 --post-only
`
);
