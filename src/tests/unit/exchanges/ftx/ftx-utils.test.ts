import { FtxUtils } from '../../../../exchanges/ftx/ftx-utils';
import { FtxCredentialsError, FtxNoFutureError } from '../../../../exchanges/ftx/ftx-errors';
import { createMockFuture } from '../../../fixtures/test-helpers';

describe('FtxUtils', () => {
  describe('validateCredentials', () => {
    it('should accept non-empty string credentials', () => {
      expect(() => FtxUtils.validateCredentials('test-api-key', 'test-secret')).not.toThrow();
    });

    it.each([
      { label: 'an empty key', apiKey: '', secret: 'test-secret', message: 'API key cannot be empty.' },
      {
        label: 'a non-string key',
        apiKey: 12345,
        secret: 'test-secret',
        message: 'API key must be in a valid string format.',
      },
      { label: 'an empty secret', apiKey: 'test-api-key', secret: '', message: 'API secret cannot be empty.' },
      {
        label: 'a non-string secret',
        apiKey: 'test-api-key',
        secret: { value: 'x' },
        message: 'API secret must be in a valid string format.',
      },
    ])('should reject $label', ({ apiKey, secret, message }) => {
      expect(() => FtxUtils.validateCredentials(apiKey, secret)).toThrow(FtxCredentialsError);
      expect(() => FtxUtils.validateCredentials(apiKey, secret)).toThrow(message);
    });

    it('should treat a missing key as empty', () => {
      expect(() => FtxUtils.validateCredentials(undefined, 'test-secret')).toThrow(
        'API key cannot be empty.'
      );
    });

    it('should check the key before the secret', () => {
      expect(() => FtxUtils.validateCredentials('', '')).toThrow('API key cannot be empty.');
    });
  });

  describe('buildQueryString', () => {
    it('should omit null and undefined values', () => {
      expect(
        FtxUtils.buildQueryString({ market: 'BTC-PERP', side: null, orderType: undefined, limit: 10 })
      ).toBe('market=BTC-PERP&limit=10');
    });

    it('should return an empty string when nothing is set', () => {
      expect(FtxUtils.buildQueryString({ market: undefined })).toBe('');
      expect(FtxUtils.buildQueryString()).toBe('');
    });

    it('should URL-encode reserved characters', () => {
      expect(FtxUtils.buildQueryString({ market: 'BTC/USD', note: 'a b&c' })).toBe(
        'market=BTC%2FUSD&note=a+b%26c'
      );
    });

    it('should keep false and zero', () => {
      expect(FtxUtils.buildQueryString({ start_time: 0, reduceOnly: false })).toBe(
        'start_time=0&reduceOnly=false'
      );
    });
  });

  describe('createOrderParams', () => {
    it('should send unset optionals as null and default to a market order', () => {
      expect(FtxUtils.createOrderParams({ market: 'BTC-PERP', side: 'buy', size: 1.5 })).toEqual({
        market: 'BTC-PERP',
        side: 'buy',
        price: null,
        size: 1.5,
        type: 'market',
        reduceOnly: false,
        ioc: false,
        postOnly: false,
        clientId: null,
      });
    });

    it('should keep every key present so nulls are serialized', () => {
      const json = JSON.stringify(
        FtxUtils.createOrderParams({ market: 'BTC-PERP', side: 'buy', size: 1.5 })
      );
      expect(json).toBe(
        '{"market":"BTC-PERP","side":"buy","price":null,"size":1.5,"type":"market","reduceOnly":false,"ioc":false,"postOnly":false,"clientId":null}'
      );
    });

    it('should pass provided fields through verbatim', () => {
      expect(
        FtxUtils.createOrderParams({
          market: 'ETH-PERP',
          side: 'sell',
          size: 2,
          price: 3200.5,
          type: 'limit',
          reduceOnly: true,
          ioc: true,
          postOnly: true,
          clientId: 'my-order-1',
        })
      ).toEqual({
        market: 'ETH-PERP',
        side: 'sell',
        price: 3200.5,
        size: 2,
        type: 'limit',
        reduceOnly: true,
        ioc: true,
        postOnly: true,
        clientId: 'my-order-1',
      });
    });
  });

  describe('createOrderHistoryParams', () => {
    it('should default orderType to market', () => {
      expect(FtxUtils.createOrderHistoryParams()).toEqual({
        market: undefined,
        side: undefined,
        orderType: 'market',
        start_time: undefined,
        end_time: undefined,
      });
    });

    it('should map filters onto exchange parameter names', () => {
      expect(
        FtxUtils.createOrderHistoryParams({
          market: 'BTC-PERP',
          side: 'sell',
          orderType: 'limit',
          startTime: 1600000000,
          endTime: 1600003600,
        })
      ).toEqual({
        market: 'BTC-PERP',
        side: 'sell',
        orderType: 'limit',
        start_time: 1600000000,
        end_time: 1600003600,
      });
    });
  });

  describe('filterActiveFutures', () => {
    it('should keep only enabled, non-expired futures of type future', () => {
      const active = createMockFuture({ name: 'BTC-0624' });
      const futures = [
        active,
        createMockFuture({ name: 'BTC-0325', expired: true }),
        createMockFuture({ name: 'BTC-0930', enabled: false }),
        createMockFuture({ name: 'BTC-PERP', type: 'perpetual', expiry: null }),
        createMockFuture({ name: 'BTC-MOVE-0101', type: 'move' }),
      ];

      expect(FtxUtils.filterActiveFutures(futures)).toEqual([active]);
    });
  });

  describe('filterByUnderlying', () => {
    it('should match the underlying exactly', () => {
      const btc = createMockFuture({ name: 'BTC-0624', underlying: 'BTC' });
      const eth = createMockFuture({ name: 'ETH-0624', underlying: 'ETH' });

      expect(FtxUtils.filterByUnderlying([btc, eth], 'ETH')).toEqual([eth]);
      expect(FtxUtils.filterByUnderlying([btc, eth], 'btc')).toEqual([]);
    });
  });

  describe('selectNextExpiring', () => {
    it('should pick the smallest numeric expiry', () => {
      const futures = [
        createMockFuture({ name: 'BTC-A', expiry: 3000 }),
        createMockFuture({ name: 'BTC-B', expiry: 1000 }),
        createMockFuture({ name: 'BTC-C', expiry: 2000 }),
      ];

      expect(FtxUtils.selectNextExpiring(futures, 'BTC').name).toBe('BTC-B');
    });

    it('should compare ISO expiries by instant', () => {
      const futures = [
        createMockFuture({ name: 'BTC-0930', expiry: '2022-09-30T03:00:00+00:00' }),
        createMockFuture({ name: 'BTC-0624', expiry: '2022-06-24T03:00:00+00:00' }),
        createMockFuture({ name: 'BTC-1230', expiry: '2022-12-30T03:00:00+00:00' }),
      ];

      expect(FtxUtils.selectNextExpiring(futures, 'BTC').name).toBe('BTC-0624');
    });

    it('should rank missing expiries last', () => {
      const futures = [
        createMockFuture({ name: 'BTC-NONE', expiry: null }),
        createMockFuture({ name: 'BTC-BAD', expiry: 'soon' }),
        createMockFuture({ name: 'BTC-0624', expiry: '2022-06-24T03:00:00+00:00' }),
      ];

      expect(FtxUtils.selectNextExpiring(futures, 'BTC').name).toBe('BTC-0624');
    });

    it('should keep the first future on equal expiries', () => {
      const futures = [
        createMockFuture({ name: 'BTC-FIRST', expiry: 1000 }),
        createMockFuture({ name: 'BTC-SECOND', expiry: 1000 }),
      ];

      expect(FtxUtils.selectNextExpiring(futures, 'BTC').name).toBe('BTC-FIRST');
    });

    it('should throw FtxNoFutureError for an empty list', () => {
      expect(() => FtxUtils.selectNextExpiring([], 'DOGE')).toThrow(FtxNoFutureError);
      expect(() => FtxUtils.selectNextExpiring([], 'DOGE')).toThrow(
        'No enabled and non-expired future found for underlying DOGE'
      );
    });
  });

  describe('encodeMarketPath', () => {
    it('should leave plain market names unchanged', () => {
      expect(FtxUtils.encodeMarketPath('BTC-PERP')).toBe('BTC-PERP');
      expect(FtxUtils.encodeMarketPath('BTC/USD')).toBe('BTC/USD');
    });

    it('should encode query and fragment characters inside each segment', () => {
      expect(FtxUtils.encodeMarketPath('BTC?x=1/USD#top')).toBe('BTC%3Fx%3D1/USD%23top');
    });
  });

  describe('encodeSubaccount', () => {
    it.each(['my sub', 'sub/ü', 'Ärger & Co', '子账户'])('should round-trip %s', name => {
      const encoded = FtxUtils.encodeSubaccount(name);

      expect(encoded).toMatch(/^[A-Za-z0-9%\-_.!~*'()]*$/);
      expect(decodeURIComponent(encoded)).toBe(name);
    });

    it('should encode a space as %20', () => {
      expect(FtxUtils.encodeSubaccount('my sub')).toBe('my%20sub');
    });
  });
});
