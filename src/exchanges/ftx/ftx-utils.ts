import { FtxFuture, FtxOrderPayload, OrderHistoryFilters, PlaceOrderParams, QueryParams } from '../../types';
import { FtxCredentialsError, FtxNoFutureError } from './ftx-errors';

/**
 * FTX Utility Functions
 * Pure helpers for query strings, order payloads and futures selection
 */
export class FtxUtils {
  /**
   * Validate API credentials before a client is built.
   * Takes unknown values so that plain JavaScript callers are checked too.
   *
   * @throws FtxCredentialsError on the first missing or non-string value, key before secret
   */
  static validateCredentials(apiKey: unknown, secret: unknown): void {
    if (!apiKey) {
      throw new FtxCredentialsError('API key cannot be empty.');
    }
    if (typeof apiKey !== 'string') {
      throw new FtxCredentialsError('API key must be in a valid string format.');
    }
    if (!secret) {
      throw new FtxCredentialsError('API secret cannot be empty.');
    }
    if (typeof secret !== 'string') {
      throw new FtxCredentialsError('API secret must be in a valid string format.');
    }
  }

  /**
   * URL-encode query parameters, leaving out null and undefined values
   */
  static buildQueryString(params: QueryParams = {}): string {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value === null || value === undefined) continue;
      search.append(key, String(value));
    }
    return search.toString();
  }

  /**
   * Map order arguments onto the POST /orders body.
   * Unset optionals are sent as null rather than omitted.
   */
  static createOrderParams(params: PlaceOrderParams): FtxOrderPayload {
    return {
      market: params.market,
      side: params.side,
      price: params.price ?? null,
      size: params.size,
      type: params.type ?? 'market',
      reduceOnly: params.reduceOnly ?? false,
      ioc: params.ioc ?? false,
      postOnly: params.postOnly ?? false,
      clientId: params.clientId ?? null,
    };
  }

  /**
   * Map history filters onto the GET /orders/history query.
   * Key names follow the exchange: camelCase orderType, snake_case times.
   */
  static createOrderHistoryParams(filters: OrderHistoryFilters = {}): QueryParams {
    return {
      market: filters.market,
      side: filters.side,
      orderType: filters.orderType ?? 'market',
      start_time: filters.startTime,
      end_time: filters.endTime,
    };
  }

  static isActiveFuture(future: FtxFuture): boolean {
    return future.type === 'future' && future.enabled === true && future.expired === false;
  }

  static filterActiveFutures(futures: FtxFuture[]): FtxFuture[] {
    return futures.filter(future => this.isActiveFuture(future));
  }

  static filterByUnderlying(futures: FtxFuture[], underlying: string): FtxFuture[] {
    return futures.filter(future => future.underlying === underlying);
  }

  /**
   * Expiry as a comparable number: numeric expiries as-is, ISO strings as epoch milliseconds.
   * Missing or unparseable expiries sort last.
   */
  static expiryRank(future: FtxFuture): number {
    const { expiry } = future;
    if (typeof expiry === 'number') {
      return Number.isNaN(expiry) ? Number.POSITIVE_INFINITY : expiry;
    }
    if (typeof expiry === 'string') {
      const parsed = Date.parse(expiry);
      return Number.isNaN(parsed) ? Number.POSITIVE_INFINITY : parsed;
    }
    return Number.POSITIVE_INFINITY;
  }

  /**
   * Future with the earliest expiry; the first one wins on ties
   *
   * @throws FtxNoFutureError when the list is empty
   */
  static selectNextExpiring(futures: FtxFuture[], underlying: string): FtxFuture {
    if (futures.length === 0) {
      throw new FtxNoFutureError(underlying);
    }

    return futures.reduce((next, future) =>
      this.expiryRank(future) < this.expiryRank(next) ? future : next
    );
  }

  /**
   * Percent-encode a market name for use as a path, keeping the slash of spot markets
   */
  static encodeMarketPath(market: string): string {
    return market.split('/').map(encodeURIComponent).join('/');
  }

  /**
   * Percent-encode a subaccount name for the FTX-SUBACCOUNT header
   */
  static encodeSubaccount(name: string): string {
    return encodeURIComponent(name);
  }
}
