/**
 * Market vocabulary shared by every stage of the download pipeline.
 *
 * Values double as the canonical spelling used in logs, reports and
 * partition paths. Parsing from user input is case-insensitive (see
 * `matchEnumValue`).
 */

/**
 * Home market used when a run does not name one
 */
export const DEFAULT_MARKET = 'usa';

/**
 * Security types the toolbox understands
 */
export const SECURITY_TYPES = {
  EQUITY: 'Equity',
  OPTION: 'Option',
  FUTURE: 'Future',
  FOREX: 'Forex',
  CFD: 'Cfd',
  CRYPTO: 'Crypto',
  INDEX: 'Index',
  FUTURE_OPTION: 'FutureOption',
  INDEX_OPTION: 'IndexOption',
  CRYPTO_FUTURE: 'CryptoFuture',
} as const;

/**
 * Data resolutions, finest first
 */
export const RESOLUTIONS = {
  TICK: 'Tick',
  SECOND: 'Second',
  MINUTE: 'Minute',
  HOUR: 'Hour',
  DAILY: 'Daily',
} as const;

/**
 * Kind of market event a series is made of
 */
export const TICK_TYPES = {
  TRADE: 'Trade',
  QUOTE: 'Quote',
} as const;

/**
 * Terminal states of one instrument within a run
 */
export const OUTCOME_STATUSES = {
  WRITTEN: 'Written',
  NO_DATA: 'NoData',
  REJECTED: 'Rejected',
  FAILED: 'Failed',
} as const;

// Type exports
export type SecurityType = (typeof SECURITY_TYPES)[keyof typeof SECURITY_TYPES];
export type Resolution = (typeof RESOLUTIONS)[keyof typeof RESOLUTIONS];
export type TickType = (typeof TICK_TYPES)[keyof typeof TICK_TYPES];
export type OutcomeStatus = (typeof OUTCOME_STATUSES)[keyof typeof OUTCOME_STATUSES];

/**
 * Case-insensitive lookup of a raw token in one of the constant maps above.
 * Returns undefined when the token is not a member.
 */
export function matchEnumValue<T extends string>(
  values: Record<string, T>,
  raw: string
): T | undefined {
  const needle = raw.trim().toLowerCase();
  return Object.values(values).find((value) => value.toLowerCase() === needle);
}
