import { SecurityType } from '@/constants/market';

/**
 * Canonical instrument identity
 * Created once per input ticker by the InstrumentResolver and never mutated.
 *
 * - ticker: upper case, trimmed (e.g. 'AAPL', 'EURUSD')
 * - market: lower case market identifier (e.g. 'usa', 'oanda')
 */
export interface Instrument {
  readonly ticker: string;
  readonly securityType: SecurityType;
  readonly market: string;
}

/**
 * Value key for an instrument. Two instruments are equal when their keys are.
 */
export function instrumentKey(instrument: Instrument): string {
  return `${instrument.securityType}|${instrument.market}|${instrument.ticker}`;
}

