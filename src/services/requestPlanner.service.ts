import { DateTime } from 'luxon';
import { matchEnumValue, Resolution, RESOLUTIONS, SecurityType, TickType } from '@/constants/market';
import {
  DEFAULT_TICK_TYPE,
  resolutionClassOf,
  TICK_TYPE_RULES,
  TickTypeRule,
} from '@/config/tickTypeRules';
import { FetchRequest, Instrument } from '@/models';
import { ConfigurationError, UnsupportedCombinationError } from '@/errors';
import { asUtcKind, toIsoUtc } from '@/utils/time';

/**
 * Request Planner
 * Derives the concrete provider request for one instrument.
 *
 * The tick type comes from a lookup table (config/tickTypeRules.ts); the
 * range end defaults to the moment the planner was created, so every
 * instrument of a run shares the same "now".
 */
export class RequestPlanner {
  private readonly startedAt: DateTime;

  constructor(
    private readonly rules: Readonly<Partial<Record<SecurityType, TickTypeRule>>> = TICK_TYPE_RULES,
    startedAt: DateTime = DateTime.utc()
  ) {
    this.startedAt = startedAt.toUTC();
  }

  /**
   * Parse the run's resolution. A blank value means Minute.
   *
   * @throws UnsupportedCombinationError when the token is not a known resolution
   */
  parseResolution(raw: string | undefined): Resolution {
    if (raw === undefined || raw.trim() === '') {
      return RESOLUTIONS.MINUTE;
    }

    const resolution = matchEnumValue(RESOLUTIONS, raw);
    if (!resolution) {
      throw new UnsupportedCombinationError(`Unsupported resolution '${raw}'.`);
    }
    return resolution;
  }

  inferTickType(securityType: SecurityType, resolution: Resolution): TickType {
    const rule = this.rules[securityType];
    return rule ? rule[resolutionClassOf(resolution)] : DEFAULT_TICK_TYPE;
  }

  /**
   * Normalize a run's date range: UTC designation attached to both ends,
   * end defaulting to the planner's start time.
   *
   * @throws ConfigurationError when the start is after the end
   */
  normalizeRange(rangeStart: DateTime, rangeEnd?: DateTime): { rangeStart: DateTime; rangeEnd: DateTime } {
    const start = asUtcKind(rangeStart);
    const end = rangeEnd ? asUtcKind(rangeEnd) : this.startedAt;

    if (!start.isValid || !end.isValid) {
      throw new ConfigurationError('Date range contains an invalid timestamp.');
    }
    if (start.toMillis() > end.toMillis()) {
      throw new ConfigurationError(
        `from-date ${toIsoUtc(start)} is after to-date ${toIsoUtc(end)}.`
      );
    }
    return { rangeStart: start, rangeEnd: end };
  }

  plan(
    instrument: Instrument,
    resolution: string,
    rangeStart: DateTime,
    rangeEnd?: DateTime
  ): FetchRequest {
    const parsedResolution = this.parseResolution(resolution);
    const range = this.normalizeRange(rangeStart, rangeEnd);

    return Object.freeze({
      instrument,
      resolution: parsedResolution,
      tickType: this.inferTickType(instrument.securityType, parsedResolution),
      rangeStart: range.rangeStart,
      rangeEnd: range.rangeEnd,
    });
  }
}
