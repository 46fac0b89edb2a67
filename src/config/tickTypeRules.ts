import {
  Resolution,
  RESOLUTIONS,
  SecurityType,
  SECURITY_TYPES,
  TickType,
  TICK_TYPES,
} from '@/constants/market';

/**
 * Tick type inference table
 *
 * Keyed by security type, then by resolution class:
 * - tick: Resolution.Tick
 * - bar:  every aggregated resolution
 *
 * Security types without a row fall back to DEFAULT_TICK_TYPE.
 * New security types are added here; the planner never branches on them.
 *
 * The Option row keeps Trade for both classes. It is listed explicitly so
 * the tick case stays visible if the provider mapping ever changes.
 */
export type ResolutionClass = 'tick' | 'bar';

export type TickTypeRule = Readonly<Record<ResolutionClass, TickType>>;

export const DEFAULT_TICK_TYPE: TickType = TICK_TYPES.TRADE;

export const TICK_TYPE_RULES: Readonly<Partial<Record<SecurityType, TickTypeRule>>> = {
  [SECURITY_TYPES.FOREX]: { tick: TICK_TYPES.QUOTE, bar: TICK_TYPES.QUOTE },
  [SECURITY_TYPES.CFD]: { tick: TICK_TYPES.QUOTE, bar: TICK_TYPES.QUOTE },
  [SECURITY_TYPES.CRYPTO]: { tick: TICK_TYPES.QUOTE, bar: TICK_TYPES.QUOTE },
  [SECURITY_TYPES.OPTION]: { tick: TICK_TYPES.TRADE, bar: TICK_TYPES.TRADE },
};

export function resolutionClassOf(resolution: Resolution): ResolutionClass {
  return resolution === RESOLUTIONS.TICK ? 'tick' : 'bar';
}
