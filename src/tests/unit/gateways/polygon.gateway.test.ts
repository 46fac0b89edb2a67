import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { PolygonGateway } from '@/gateways/polygon.gateway';
import { FetchRequest } from '@/models';
import { ConfigurationError, ProviderUnavailableError } from '@/errors';
import { buildInstrument, createMockLogger, utc } from '@/tests/utils/mockCapabilities';

type Reply = { status: number; data: unknown };

/**
 * In-process stand-in for the Polygon API: replies are served in order,
 * the last one repeating, and every request is recorded.
 */
function createStubClient(replies: Reply[]) {
  const requests: Array<{ url?: string; params: unknown }> = [];

  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      requests.push({ url: config.url, params: config.params });
      const reply = replies[Math.min(requests.length - 1, replies.length - 1)] ?? {
        status: 500,
        data: {},
      };
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${reply.status}`,
          'ERR_BAD_RESPONSE',
          config,
          null,
          response
        );
      }
      return response;
    },
  });

  return { http, requests };
}

function request(overrides: Partial<FetchRequest> = {}): FetchRequest {
  return {
    instrument: buildInstrument(),
    resolution: 'Minute',
    tickType: 'Trade',
    rangeStart: utc('2024-01-02T00:00:00Z'),
    rangeEnd: utc('2024-01-03T00:00:00Z'),
    ...overrides,
  };
}

function gatewayFor(replies: Reply[], maxRetries = 3) {
  const stub = createStubClient(replies);
  const gateway = new PolygonGateway({
    apiKey: 'test-key',
    logger: createMockLogger(),
    http: stub.http,
    maxRetries,
    retryDelayMs: 0,
  });
  return { gateway, requests: stub.requests };
}

const minuteBar = { t: 1704205800000, o: 185.1, h: 185.5, l: 184.9, c: 185.2, v: 12000 };

describe('PolygonGateway', () => {
  it('should require an API key when no client is given', () => {
    expect(() => new PolygonGateway({ apiKey: ' ', logger: createMockLogger() })).toThrow(
      ConfigurationError
    );
  });

  describe('aggregates', () => {
    it('should map minute aggregates to trade bars', async () => {
      const { gateway, requests } = gatewayFor([
        { status: 200, data: { status: 'OK', resultsCount: 1, results: [minuteBar] } },
      ]);

      const observations = await gateway.fetch(request());

      expect(requests).toEqual([
        {
          url: '/v2/aggs/ticker/AAPL/range/1/minute/1704153600000/1704240000000',
          params: { adjusted: true, sort: 'asc', limit: 50000 },
        },
      ]);
      expect(observations).toHaveLength(1);
      const [bar] = observations ?? [];
      expect(bar?.kind).toBe('TradeBar');
      expect(bar?.time.toISO()).toBe('2024-01-02T14:30:00.000Z');
      expect(bar?.endTime.toISO()).toBe('2024-01-02T14:31:00.000Z');
      if (bar?.kind === 'TradeBar') {
        expect(bar.open.toString()).toBe('185.1');
        expect(bar.close.toString()).toBe('185.2');
        expect(bar.volume.toString()).toBe('12000');
      }
    });

    it('should map forex aggregates to quote bars with both sides set', async () => {
      const { gateway, requests } = gatewayFor([
        {
          status: 200,
          data: { results: [{ t: 1704153600000, o: 1.095, h: 1.096, l: 1.094, c: 1.0952, v: 5 }] },
        },
      ]);

      const observations = await gateway.fetch(
        request({
          instrument: buildInstrument({ ticker: 'EURUSD', securityType: 'Forex' }),
          resolution: 'Daily',
          tickType: 'Quote',
        })
      );

      expect(requests[0]?.url).toBe('/v2/aggs/ticker/C:EURUSD/range/1/day/1704153600000/1704240000000');
      const [bar] = observations ?? [];
      expect(bar?.kind).toBe('QuoteBar');
      expect(bar?.endTime.toISO()).toBe('2024-01-03T00:00:00.000Z');
      if (bar?.kind === 'QuoteBar') {
        expect(bar.bid?.close.toString()).toBe('1.0952');
        expect(bar.ask?.close.toString()).toBe('1.0952');
      }
    });

    it('should follow next_url until the last page', async () => {
      const nextUrl = 'https://api.polygon.io/v2/aggs/ticker/AAPL/range/1/minute/1704153600000/1704240000000?cursor=page2';
      const { gateway, requests } = gatewayFor([
        { status: 200, data: { results: [minuteBar], next_url: nextUrl } },
        { status: 200, data: { results: [{ ...minuteBar, t: minuteBar.t + 60000 }] } },
      ]);

      const observations = await gateway.fetch(request());

      expect(observations).toHaveLength(2);
      expect(requests).toHaveLength(2);
      expect(requests[1]).toEqual({ url: nextUrl, params: undefined });
    });

    it('should return null when there are no results', async () => {
      const { gateway } = gatewayFor([{ status: 200, data: { status: 'OK', resultsCount: 0 } }]);

      await expect(gateway.fetch(request())).resolves.toBeNull();
    });

    it('should return null on 404', async () => {
      const { gateway } = gatewayFor([{ status: 404, data: {} }]);

      await expect(gateway.fetch(request())).resolves.toBeNull();
    });

    it('should fail when a later page answers 404', async () => {
      const nextUrl = 'https://api.polygon.io/v2/aggs/ticker/AAPL/range/1/minute/1704153600000/1704240000000?cursor=page2';
      const { gateway, requests } = gatewayFor([
        { status: 200, data: { results: [minuteBar], next_url: nextUrl } },
        { status: 404, data: {} },
      ]);

      await expect(gateway.fetch(request())).rejects.toThrow(
        'Polygon lost the next page for AAPL after 1 page(s) (HTTP 404)'
      );
      expect(requests).toHaveLength(2);
    });

    it('should return an empty list when results are empty', async () => {
      const { gateway } = gatewayFor([{ status: 200, data: { results: [] } }]);

      await expect(gateway.fetch(request())).resolves.toEqual([]);
    });

    it('should reject malformed pages', async () => {
      const { gateway } = gatewayFor([{ status: 200, data: { results: [{ t: 'soon' }] } }]);

      await expect(gateway.fetch(request())).rejects.toThrow(/^Malformed Polygon response/);
    });
  });

  describe('ticks', () => {
    it('should map trades with nanosecond timestamps', async () => {
      const { gateway, requests } = gatewayFor([
        {
          status: 200,
          data: {
            results: [
              {
                sip_timestamp: 1704205800123456789,
                price: 185.12,
                size: 100,
                exchange: 4,
                conditions: [12, 37],
              },
            ],
          },
        },
      ]);

      const observations = await gateway.fetch(request({ resolution: 'Tick' }));

      expect(requests[0]).toEqual({
        url: '/v3/trades/AAPL',
        params: {
          'timestamp.gte': '1704153600000000000',
          'timestamp.lte': '1704240000000000000',
          order: 'asc',
          sort: 'timestamp',
          limit: 50000,
        },
      });
      const [tick] = observations ?? [];
      expect(tick?.time.toISO()).toBe('2024-01-02T14:30:00.123Z');
      expect(tick?.endTime.toMillis()).toBe(tick?.time.toMillis());
      if (tick?.kind === 'Tick' && tick.tickType === 'Trade') {
        expect(tick.price.toString()).toBe('185.12');
        expect(tick.quantity.toString()).toBe('100');
        expect(tick.exchange).toBe('4');
        expect(tick.conditions).toBe('12;37');
      } else {
        throw new Error('expected a trade tick');
      }
    });

    it('should keep nanosecond timestamps exact when parsing the raw body', async () => {
      const { gateway } = gatewayFor([
        {
          status: 200,
          data: '{"results":[{"sip_timestamp":1704205800123999999,"price":185.12,"size":100}]}',
        },
      ]);

      const [tick] = (await gateway.fetch(request({ resolution: 'Tick' }))) ?? [];

      expect(tick?.time.toMillis()).toBe(1704205800123);
      expect(tick?.time.toISO()).toBe('2024-01-02T14:30:00.123Z');
    });

    it('should map quotes for quote requests', async () => {
      const { gateway, requests } = gatewayFor([
        {
          status: 200,
          data: {
            results: [
              {
                sip_timestamp: 1704205800123456789,
                bid_price: 1.0951,
                bid_size: 3,
                ask_price: 1.0953,
                ask_size: 2,
                bid_exchange: 48,
              },
            ],
          },
        },
      ]);

      const observations = await gateway.fetch(
        request({
          instrument: buildInstrument({ ticker: 'EURUSD', securityType: 'Forex' }),
          resolution: 'Tick',
          tickType: 'Quote',
        })
      );

      expect(requests[0]?.url).toBe('/v3/quotes/C:EURUSD');
      const [tick] = observations ?? [];
      if (tick?.kind === 'Tick' && tick.tickType === 'Quote') {
        expect(tick.bidPrice.toString()).toBe('1.0951');
        expect(tick.askPrice.toString()).toBe('1.0953');
        expect(tick.exchange).toBe('48');
        expect(tick.conditions).toBe('');
      } else {
        throw new Error('expected a quote tick');
      }
    });
  });

  describe('failures', () => {
    it('should retry server errors and then succeed', async () => {
      const { gateway, requests } = gatewayFor([
        { status: 503, data: {} },
        { status: 200, data: { results: [minuteBar] } },
      ]);

      const observations = await gateway.fetch(request());

      expect(requests).toHaveLength(2);
      expect(observations).toHaveLength(1);
    });

    it('should give up after the configured retries', async () => {
      const { gateway, requests } = gatewayFor([{ status: 429, data: {} }], 2);

      await expect(gateway.fetch(request())).rejects.toThrow(ProviderUnavailableError);
      expect(requests).toHaveLength(3);
    });

    it('should not retry an authentication failure', async () => {
      const { gateway, requests } = gatewayFor([{ status: 401, data: {} }]);

      await expect(gateway.fetch(request())).rejects.toThrow(
        'Polygon rejected the API key (HTTP 401)'
      );
      expect(requests).toHaveLength(1);
    });

    it('should refuse security types Polygon does not serve', async () => {
      const { gateway, requests } = gatewayFor([{ status: 200, data: {} }]);

      await expect(
        gateway.fetch(request({ instrument: buildInstrument({ ticker: 'ES', securityType: 'Future' }) }))
      ).rejects.toThrow('Polygon does not serve Future data (ES)');
      expect(requests).toHaveLength(0);
    });
  });
});
