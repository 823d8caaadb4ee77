/**
 * FTX Exchange Specific Types
 *
 * Record types are inferred from the response schemas so that unknown fields pass through unchanged
 */

import { z } from 'zod';
import { ftxFutureSchema, ftxMarketSchema, ftxRecordSchema } from '../exchanges/ftx/ftx-schemas';
import { OrderSide, OrderType } from './exchange';

export type FtxRecord = z.infer<typeof ftxRecordSchema>;
export type FtxFuture = z.infer<typeof ftxFutureSchema>;
export type FtxMarket = z.infer<typeof ftxMarketSchema>;
export type FtxOrder = FtxRecord;

export interface PlaceOrderParams {
  market: string;
  side: OrderSide;
  size: number;
  price?: number | null;
  type?: OrderType;
  reduceOnly?: boolean;
  ioc?: boolean;
  postOnly?: boolean;
  clientId?: string | null;
}

/**
 * Body of POST /orders. Every field is always present; unset optionals are null
 */
export interface FtxOrderPayload {
  [key: string]: string | number | boolean | null;
  market: string;
  side: OrderSide;
  price: number | null;
  size: number;
  type: OrderType;
  reduceOnly: boolean;
  ioc: boolean;
  postOnly: boolean;
  clientId: string | null;
}

export interface OrderHistoryFilters {
  market?: string;
  side?: OrderSide;
  orderType?: OrderType;
  startTime?: number;
  endTime?: number;
}
