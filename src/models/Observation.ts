import Decimal from 'decimal.js';
import { DateTime } from 'luxon';
import { TickType } from '@/constants/market';

/**
 * Observation model
 * One market data point as returned by a provider gateway.
 *
 * All variants carry:
 * - time: start of the period the point covers
 * - endTime: end of that period (equal to time for ticks); the sort key
 *
 * Prices and sizes are Decimal to keep the provider's exact values
 * until the writer encodes them.
 */
interface ObservationBase {
  readonly time: DateTime;
  readonly endTime: DateTime;
}

/**
 * Open/high/low/close of one side of the book, or of trades
 */
export interface Bar {
  readonly open: Decimal;
  readonly high: Decimal;
  readonly low: Decimal;
  readonly close: Decimal;
}

export interface TradeBar extends ObservationBase, Bar {
  readonly kind: 'TradeBar';
  readonly volume: Decimal;
}

export interface QuoteBar extends ObservationBase {
  readonly kind: 'QuoteBar';
  readonly bid: Bar | null;
  readonly ask: Bar | null;
  readonly lastBidSize: Decimal;
  readonly lastAskSize: Decimal;
}

export interface TradeTick extends ObservationBase {
  readonly kind: 'Tick';
  readonly tickType: 'Trade';
  readonly price: Decimal;
  readonly quantity: Decimal;
  readonly exchange: string;
  readonly conditions: string;
  readonly suspicious: boolean;
}

export interface QuoteTick extends ObservationBase {
  readonly kind: 'Tick';
  readonly tickType: 'Quote';
  readonly bidPrice: Decimal;
  readonly bidSize: Decimal;
  readonly askPrice: Decimal;
  readonly askSize: Decimal;
  readonly exchange: string;
  readonly conditions: string;
  readonly suspicious: boolean;
}

export type Tick = TradeTick | QuoteTick;

export type Observation = TradeBar | QuoteBar | Tick;

export type ObservationKind = Observation['kind'];

/**
 * Tick type an observation represents
 */
export function tickTypeOf(observation: Observation): TickType {
  switch (observation.kind) {
    case 'TradeBar':
      return 'Trade';
    case 'QuoteBar':
      return 'Quote';
    case 'Tick':
      return observation.tickType;
  }
}
