import {
  FtxClientConfig,
  FtxFuture,
  FtxMarket,
  FtxOrder,
  FtxRecord,
  OrderHistoryFilters,
  PlaceOrderParams,
} from '../../types';
import { Logger, createLogger } from '../../utils';
import { DEFAULT_FTX_ENDPOINT, FtxAuth } from './ftx-auth';
import {
  ftxFutureListSchema,
  ftxMarketSchema,
  ftxRecordListSchema,
  ftxRecordSchema,
} from './ftx-schemas';
import { FtxUtils } from './ftx-utils';

const DEFAULT_UNDERLYING = 'BTC';

/**
 * FTX REST Client
 *
 * Each method is one signed round trip. Nothing is cached between calls.
 */
export class FtxClient {
  readonly config: Readonly<FtxClientConfig>;
  private readonly auth: FtxAuth;
  private readonly logger: Logger;

  constructor(config: FtxClientConfig) {
    this.config = Object.freeze({ ...config, endpoint: config.endpoint ?? DEFAULT_FTX_ENDPOINT });
    this.auth = new FtxAuth(
      {
        apiKey: config.apiKey,
        secret: config.apiSecret,
        subaccountName: config.subaccountName,
      },
      this.config.endpoint,
      config.logLevel
    );
    this.logger = createLogger('ftx-client', undefined, config.logLevel);
  }

  /**
   * Get all enabled and non-expired futures
   */
  async getAllFutures(): Promise<FtxFuture[]> {
    const futures = await this.auth.makeRequest(ftxFutureListSchema, 'GET', 'futures');
    return FtxUtils.filterActiveFutures(futures);
  }

  /**
   * Get all enabled and non-expired futures for an underlying asset
   */
  async getAllUnderlyingFutures(underlying: string = DEFAULT_UNDERLYING): Promise<FtxFuture[]> {
    const futures = await this.getAllFutures();
    return FtxUtils.filterByUnderlying(futures, underlying);
  }

  /**
   * Get the enabled, non-expired future for an underlying asset that expires first
   *
   * @throws FtxNoFutureError when the underlying has no such future
   */
  async getNextUnderlyingFuture(underlying: string = DEFAULT_UNDERLYING): Promise<FtxFuture> {
    const futures = await this.getAllUnderlyingFutures(underlying);
    const next = FtxUtils.selectNextExpiring(futures, underlying);

    this.logger.debug('Selected next future', { underlying, name: next.name, expiry: next.expiry });
    return next;
  }

  async getNextUnderlyingFutureName(underlying: string = DEFAULT_UNDERLYING): Promise<string> {
    const future = await this.getNextUnderlyingFuture(underlying);
    return future.name;
  }

  /**
   * Get all markets (spot, perpetual futures, expiring futures and MOVE contracts)
   */
  async getAllMarkets(): Promise<FtxRecord[]> {
    return this.auth.makeRequest(ftxRecordListSchema, 'GET', 'markets');
  }

  /**
   * @param market - market name, e.g. BTC-PERP or BTC/USD
   */
  async getSingleMarket(market: string): Promise<FtxMarket> {
    return this.auth.makeRequest(
      ftxMarketSchema,
      'GET',
      `markets/${FtxUtils.encodeMarketPath(market)}`
    );
  }

  async getSingleMarketPrice(market: string): Promise<number | null> {
    const { price } = await this.getSingleMarket(market);
    return price;
  }

  /**
   * Place an order. Price stays null for market orders.
   */
  async placeOrder(params: PlaceOrderParams): Promise<FtxOrder> {
    const payload = FtxUtils.createOrderParams(params);

    this.logger.info('Placing order', {
      market: payload.market,
      side: payload.side,
      type: payload.type,
      size: payload.size,
      price: payload.price,
    });

    return this.auth.makeRequest(ftxRecordSchema, 'POST', 'orders', { body: payload });
  }

  /**
   * Get open orders, optionally for one market
   */
  async getOpenOrders(market?: string): Promise<FtxOrder[]> {
    return this.auth.makeRequest(ftxRecordListSchema, 'GET', 'orders', { params: { market } });
  }

  /**
   * Get open and closed orders. orderType defaults to 'market'.
   */
  async getOrderHistory(filters: OrderHistoryFilters = {}): Promise<FtxOrder[]> {
    return this.auth.makeRequest(ftxRecordListSchema, 'GET', 'orders/history', {
      params: FtxUtils.createOrderHistoryParams(filters),
    });
  }
}
