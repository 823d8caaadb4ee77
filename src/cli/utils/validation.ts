import { OrderSide, OrderType } from '../../types';

const ORDER_SIDES: readonly OrderSide[] = ['buy', 'sell'];
const ORDER_TYPES: readonly OrderType[] = ['market', 'limit'];

/**
 * Validate market name (e.g., BTC-PERP, BTC/USD, BTC-0628)
 * @returns Upper-cased market name
 */
export function validateMarket(market: string): string {
  const trimmed = market.trim();
  if (!trimmed) {
    throw new Error('Market is required');
  }

  if (!/^[A-Za-z0-9]+([-/][A-Za-z0-9]+)*$/.test(trimmed)) {
    throw new Error(`Invalid market format: ${market}. Expected format: BTC-PERP or BTC/USD`);
  }

  return trimmed.toUpperCase();
}

export function validateUnderlying(underlying: string): string {
  const trimmed = underlying.trim();
  if (!/^[A-Za-z0-9]+$/.test(trimmed)) {
    throw new Error(`Invalid underlying asset: ${underlying}`);
  }
  return trimmed.toUpperCase();
}

export function validateOrderSide(side: string): OrderSide {
  const normalized = side.toLowerCase();
  const match = ORDER_SIDES.find(candidate => candidate === normalized);
  if (!match) {
    throw new Error(`Invalid order side: ${side}. Must be one of: ${ORDER_SIDES.join(', ')}`);
  }
  return match;
}

export function validateOrderType(type: string): OrderType {
  const normalized = type.toLowerCase();
  const match = ORDER_TYPES.find(candidate => candidate === normalized);
  if (!match) {
    throw new Error(`Invalid order type: ${type}. Must be one of: ${ORDER_TYPES.join(', ')}`);
  }
  return match;
}

/**
 * @param name Field name used in the error message
 */
export function validatePositiveNumber(value: string, name: string): number {
  const num = Number(value);
  if (value.trim() === '' || !Number.isFinite(num) || num <= 0) {
    throw new Error(`${name} must be a positive number, got: ${value}`);
  }
  return num;
}

/**
 * Unix time in seconds, as the order history endpoint takes it
 */
export function validateTimestamp(value: string, name: string): number {
  const num = Number(value);
  if (value.trim() === '' || !Number.isFinite(num) || num < 0) {
    throw new Error(`${name} must be a non-negative unix timestamp, got: ${value}`);
  }
  return num;
}
