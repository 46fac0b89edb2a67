import Decimal from 'decimal.js';
import { DateTime } from 'luxon';
import {
  RESOLUTIONS,
  Resolution,
  SECURITY_TYPES,
  SecurityType,
  TickType,
} from '@/constants/market';
import { Bar, Instrument, Observation } from '@/models';

/**
 * Lean-style CSV layout for the local partitioned store.
 *
 * Intraday resolutions (Tick, Second, Minute) get one file per UTC day,
 * keyed by the observation's start time, with the time column holding
 * milliseconds since midnight. Hour and Daily series live in one file per
 * ticker with `yyyyMMdd HH:mm` times.
 */

/** Equity and option prices are stored as integers of 1/10000 */
export const PRICE_SCALE = 10_000;

const SCALED_SECURITY_TYPES: ReadonlySet<SecurityType> = new Set([
  SECURITY_TYPES.EQUITY,
  SECURITY_TYPES.OPTION,
]);

const INTRADAY_RESOLUTIONS: ReadonlySet<Resolution> = new Set([
  RESOLUTIONS.TICK,
  RESOLUTIONS.SECOND,
  RESOLUTIONS.MINUTE,
]);

export function isIntraday(resolution: Resolution): boolean {
  return INTRADAY_RESOLUTIONS.has(resolution);
}

function pathSegment(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9._-]/g, '_');
}

/**
 * Relative file path of the partition holding an observation that starts at `time`
 */
export function partitionPath(
  instrument: Instrument,
  resolution: Resolution,
  tickType: TickType,
  time: DateTime
): string {
  const base = [
    pathSegment(instrument.securityType),
    pathSegment(instrument.market),
    pathSegment(resolution),
  ];
  const ticker = pathSegment(instrument.ticker);
  const suffix = pathSegment(tickType);

  if (isIntraday(resolution)) {
    return [...base, ticker, `${time.toUTC().toFormat('yyyyMMdd')}_${suffix}.csv`].join('/');
  }
  return [...base, `${ticker}_${suffix}.csv`].join('/');
}

export function formatTime(time: DateTime, resolution: Resolution): string {
  const utc = time.toUTC();
  if (isIntraday(resolution)) {
    return String(utc.toMillis() - utc.startOf('day').toMillis());
  }
  return utc.toFormat('yyyyMMdd HH:mm');
}

export function formatPrice(value: Decimal, securityType: SecurityType): string {
  if (SCALED_SECURITY_TYPES.has(securityType)) {
    return value.times(PRICE_SCALE).toDecimalPlaces(0, Decimal.ROUND_HALF_EVEN).toFixed(0);
  }
  return value.toFixed();
}

function formatBar(bar: Bar | null, securityType: SecurityType): string[] {
  if (!bar) {
    return ['', '', '', ''];
  }
  return [bar.open, bar.high, bar.low, bar.close].map((price) => formatPrice(price, securityType));
}

/**
 * One CSV row for an observation
 */
export function formatRow(
  observation: Observation,
  securityType: SecurityType,
  resolution: Resolution
): string[] {
  const time = formatTime(observation.time, resolution);
  const price = (value: Decimal) => formatPrice(value, securityType);

  switch (observation.kind) {
    case 'TradeBar':
      return [time, ...formatBar(observation, securityType), observation.volume.toFixed()];
    case 'QuoteBar':
      return [
        time,
        ...formatBar(observation.bid, securityType),
        observation.lastBidSize.toFixed(),
        ...formatBar(observation.ask, securityType),
        observation.lastAskSize.toFixed(),
      ];
    case 'Tick':
      if (observation.tickType === 'Trade') {
        return [
          time,
          price(observation.price),
          observation.quantity.toFixed(),
          observation.exchange,
          observation.conditions,
          observation.suspicious ? '1' : '0',
        ];
      }
      return [
        time,
        price(observation.bidPrice),
        observation.bidSize.toFixed(),
        price(observation.askPrice),
        observation.askSize.toFixed(),
        observation.exchange,
        observation.conditions,
        observation.suspicious ? '1' : '0',
      ];
  }
}
