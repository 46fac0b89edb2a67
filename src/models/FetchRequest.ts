import { DateTime } from 'luxon';
import { Resolution, TickType } from '@/constants/market';
import { Instrument } from './Instrument';

/**
 * Concrete provider request for one instrument
 * Built by the RequestPlanner, consumed once by a provider gateway.
 *
 * Invariant: rangeStart <= rangeEnd, both in the UTC zone.
 */
export interface FetchRequest {
  readonly instrument: Instrument;
  readonly resolution: Resolution;
  readonly tickType: TickType;
  readonly rangeStart: DateTime;
  readonly rangeEnd: DateTime;
}
