import { DEFAULT_MARKET, matchEnumValue, SecurityType, SECURITY_TYPES } from '@/constants/market';
import { Instrument } from '@/models';
import { ConfigurationError } from '@/errors';

/**
 * Instrument Resolver
 * Turns a raw ticker plus run-level hints into a canonical instrument.
 * Pure: no I/O, no logging.
 */
export class InstrumentResolver {
  /**
   * Parse the run's security type. A blank value means Equity.
   *
   * @throws ConfigurationError when the token is not a known security type
   */
  parseSecurityType(raw: string | undefined): SecurityType {
    if (raw === undefined || raw.trim() === '') {
      return SECURITY_TYPES.EQUITY;
    }

    const securityType = matchEnumValue(SECURITY_TYPES, raw);
    if (!securityType) {
      throw new ConfigurationError(`Unsupported security-type '${raw}'.`);
    }
    return securityType;
  }

  /**
   * Canonical market: lower case, or the home market when unset
   */
  normalizeMarket(raw: string | undefined): string {
    if (raw === undefined || raw.trim() === '') {
      return DEFAULT_MARKET;
    }
    return raw.trim().toLowerCase();
  }

  /**
   * Resolve one ticker. Callers skip blank tickers before getting here.
   */
  resolve(ticker: string, securityType: SecurityType, market?: string): Instrument {
    return Object.freeze({
      ticker: ticker.trim().toUpperCase(),
      securityType,
      market: this.normalizeMarket(market),
    });
  }
}
