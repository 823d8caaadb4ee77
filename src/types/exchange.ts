/**
 * Basic order enums for trading operations
 */
export type OrderSide = 'buy' | 'sell';
export type OrderType = 'market' | 'limit';

export type HttpMethod = 'GET' | 'POST';

/**
 * Query parameters for read requests. Null and undefined values are left out of the query string
 */
export type QueryParams = Record<string, string | number | boolean | null | undefined>;

/**
 * JSON body for write requests
 */
export type RequestBody = Record<string, string | number | boolean | null>;

export interface RequestOptions {
  params?: QueryParams;
  body?: RequestBody;
}
