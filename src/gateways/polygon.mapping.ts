import Decimal from 'decimal.js';
import { DateTime, DurationLikeObject } from 'luxon';
import { z } from 'zod';
import { Resolution, SECURITY_TYPES, SecurityType, TICK_TYPES } from '@/constants/market';
import { Bar, FetchRequest, Instrument, Observation, QuoteTick, TradeTick } from '@/models';
import { ProviderUnavailableError } from '@/errors';

/**
 * Polygon REST payloads and their mapping onto observations.
 *
 * Endpoints:
 * - /v2/aggs/ticker/{ticker}/range/1/{timespan}/{from}/{to}  bars
 * - /v3/trades/{ticker}                                      trade ticks
 * - /v3/quotes/{ticker}                                      quote ticks
 *
 * A page without a `results` array means Polygon has no data for the request.
 */

export type BarResolution = Exclude<Resolution, 'Tick'>;

export const AGGREGATE_TIMESPANS: Record<BarResolution, string> = {
  Second: 'second',
  Minute: 'minute',
  Hour: 'hour',
  Daily: 'day',
};

const BAR_PERIODS: Record<BarResolution, DurationLikeObject> = {
  Second: { seconds: 1 },
  Minute: { minutes: 1 },
  Hour: { hours: 1 },
  Daily: { days: 1 },
};

/**
 * Ticker prefixes per security type. Types without an entry are not served.
 */
const TICKER_PREFIXES: Partial<Record<SecurityType, string>> = {
  [SECURITY_TYPES.EQUITY]: '',
  [SECURITY_TYPES.FOREX]: 'C:',
  [SECURITY_TYPES.CRYPTO]: 'X:',
  [SECURITY_TYPES.OPTION]: 'O:',
  [SECURITY_TYPES.INDEX]: 'I:',
};

export function polygonTicker(instrument: Instrument): string {
  const prefix = TICKER_PREFIXES[instrument.securityType];
  if (prefix === undefined) {
    throw new ProviderUnavailableError(
      `Polygon does not serve ${instrument.securityType} data (${instrument.ticker})`
    );
  }
  return instrument.ticker.startsWith(prefix) ? instrument.ticker : `${prefix}${instrument.ticker}`;
}

/**
 * Nanosecond timestamp fields. Their 19-digit values do not fit a double,
 * so they are quoted before the body is parsed and read as bigint.
 */
const NANOSECOND_FIELDS = /"(sip_timestamp|participant_timestamp|trf_timestamp)"\s*:\s*(\d+)/g;

/**
 * Parse a raw Polygon response body, keeping nanosecond timestamps exact.
 * Non-string bodies and bodies that are not JSON are returned unchanged.
 */
export function parsePolygonBody(data: unknown): unknown {
  if (typeof data !== 'string' || data.trim() === '') {
    return data;
  }
  try {
    return JSON.parse(data.replace(NANOSECOND_FIELDS, '"$1":"$2"'));
  } catch {
    return data;
  }
}

const nanoseconds = z
  .union([z.string().regex(/^\d+$/), z.number().int().nonnegative()])
  .transform((value) => BigInt(value));

const aggregatePageSchema = z.object({
  results: z
    .array(
      z.object({
        t: z.number(),
        o: z.number(),
        h: z.number(),
        l: z.number(),
        c: z.number(),
        v: z.number(),
      })
    )
    .optional(),
  next_url: z.string().optional(),
});

const tradePageSchema = z.object({
  results: z
    .array(
      z.object({
        sip_timestamp: nanoseconds,
        price: z.number(),
        size: z.number(),
        exchange: z.number().optional(),
        conditions: z.array(z.number()).optional(),
      })
    )
    .optional(),
  next_url: z.string().optional(),
});

const quotePageSchema = z.object({
  results: z
    .array(
      z.object({
        sip_timestamp: nanoseconds,
        bid_price: z.number().default(0),
        bid_size: z.number().default(0),
        ask_price: z.number().default(0),
        ask_size: z.number().default(0),
        bid_exchange: z.number().optional(),
        ask_exchange: z.number().optional(),
        conditions: z.array(z.number()).optional(),
      })
    )
    .optional(),
  next_url: z.string().optional(),
});

/**
 * One mapped page. observations is null when the page carried no results array.
 */
export interface MappedPage {
  observations: Observation[] | null;
  nextUrl?: string;
}

function parsePage<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape';
    throw new ProviderUnavailableError(`Malformed Polygon response (${where})`);
  }
  return result.data;
}

function fromSipTimestamp(timestamp: bigint): DateTime {
  return DateTime.fromMillis(Number(timestamp / 1_000_000n), { zone: 'utc' });
}

export function mapAggregatePage(
  body: unknown,
  request: FetchRequest,
  resolution: BarResolution
): MappedPage {
  const page = parsePage(aggregatePageSchema, body);
  if (!page.results) {
    return { observations: null, nextUrl: page.next_url };
  }

  const period = BAR_PERIODS[resolution];
  const observations = page.results.map((item): Observation => {
    const time = DateTime.fromMillis(item.t, { zone: 'utc' });
    const endTime = time.plus(period);
    const bar: Bar = {
      open: new Decimal(item.o),
      high: new Decimal(item.h),
      low: new Decimal(item.l),
      close: new Decimal(item.c),
    };

    if (request.tickType === TICK_TYPES.QUOTE) {
      // Forex and crypto aggregates are built from quotes; both sides carry the same bar
      return {
        kind: 'QuoteBar',
        time,
        endTime,
        bid: bar,
        ask: bar,
        lastBidSize: new Decimal(0),
        lastAskSize: new Decimal(0),
      };
    }

    return { kind: 'TradeBar', time, endTime, ...bar, volume: new Decimal(item.v) };
  });

  return { observations, nextUrl: page.next_url };
}

export function mapTradePage(body: unknown): MappedPage {
  const page = parsePage(tradePageSchema, body);
  if (!page.results) {
    return { observations: null, nextUrl: page.next_url };
  }

  const observations = page.results.map((item): TradeTick => {
    const time = fromSipTimestamp(item.sip_timestamp);
    return {
      kind: 'Tick',
      tickType: 'Trade',
      time,
      endTime: time,
      price: new Decimal(item.price),
      quantity: new Decimal(item.size),
      exchange: item.exchange === undefined ? '' : String(item.exchange),
      conditions: (item.conditions ?? []).join(';'),
      suspicious: false,
    };
  });

  return { observations, nextUrl: page.next_url };
}

export function mapQuotePage(body: unknown): MappedPage {
  const page = parsePage(quotePageSchema, body);
  if (!page.results) {
    return { observations: null, nextUrl: page.next_url };
  }

  const observations = page.results.map((item): QuoteTick => {
    const time = fromSipTimestamp(item.sip_timestamp);
    const exchange = item.bid_exchange ?? item.ask_exchange;
    return {
      kind: 'Tick',
      tickType: 'Quote',
      time,
      endTime: time,
      bidPrice: new Decimal(item.bid_price),
      bidSize: new Decimal(item.bid_size),
      askPrice: new Decimal(item.ask_price),
      askSize: new Decimal(item.ask_size),
      exchange: exchange === undefined ? '' : String(exchange),
      conditions: (item.conditions ?? []).join(';'),
      suspicious: false,
    };
  });

  return { observations, nextUrl: page.next_url };
}
