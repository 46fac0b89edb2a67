import { DateTime } from 'luxon';
import { RequestPlanner } from '@/services/requestPlanner.service';
import { ConfigurationError, UnsupportedCombinationError } from '@/errors';
import { buildInstrument, utc } from '@/tests/utils/mockCapabilities';

describe('RequestPlanner', () => {
  const startedAt = utc('2024-01-05T00:00:00Z');
  let planner: RequestPlanner;

  beforeEach(() => {
    planner = new RequestPlanner(undefined, startedAt);
  });

  describe('parseResolution', () => {
    it('should default to Minute', () => {
      expect(planner.parseResolution(undefined)).toBe('Minute');
      expect(planner.parseResolution('')).toBe('Minute');
    });

    it('should match resolutions case-insensitively', () => {
      expect(planner.parseResolution('daily')).toBe('Daily');
      expect(planner.parseResolution('TICK')).toBe('Tick');
    });

    it('should throw UnsupportedCombinationError for an unknown resolution', () => {
      expect(() => planner.parseResolution('weekly')).toThrow(UnsupportedCombinationError);
      expect(() => planner.parseResolution('weekly')).toThrow("Unsupported resolution 'weekly'.");
    });
  });

  describe('inferTickType', () => {
    it.each([
      ['Forex', 'Minute', 'Quote'],
      ['Cfd', 'Daily', 'Quote'],
      ['Crypto', 'Tick', 'Quote'],
      ['Option', 'Tick', 'Trade'],
      ['Option', 'Hour', 'Trade'],
      ['Equity', 'Tick', 'Trade'],
      ['Future', 'Minute', 'Trade'],
    ] as const)('%s at %s resolution uses %s', (securityType, resolution, expected) => {
      expect(planner.inferTickType(securityType, resolution)).toBe(expected);
    });

    it('should follow a custom rule table', () => {
      const custom = new RequestPlanner({ Equity: { tick: 'Quote', bar: 'Trade' } }, startedAt);

      expect(custom.inferTickType('Equity', 'Tick')).toBe('Quote');
      expect(custom.inferTickType('Equity', 'Second')).toBe('Trade');
    });
  });

  describe('normalizeRange', () => {
    it('should keep wall-clock fields and mark them as UTC', () => {
      const start = DateTime.fromObject(
        { year: 2024, month: 1, day: 2, hour: 9, minute: 30 },
        { zone: 'America/New_York' }
      );

      const range = planner.normalizeRange(start, utc('2024-01-03T00:00:00Z'));

      expect(range.rangeStart.toISO()).toBe('2024-01-02T09:30:00.000Z');
      expect(range.rangeEnd.toISO()).toBe('2024-01-03T00:00:00.000Z');
    });

    it('should default the end to the planner start time', () => {
      const range = planner.normalizeRange(utc('2024-01-02T00:00:00Z'));

      expect(range.rangeEnd.toISO()).toBe('2024-01-05T00:00:00.000Z');
    });

    it('should accept an empty range', () => {
      const at = utc('2024-01-02T00:00:00Z');

      const range = planner.normalizeRange(at, at);

      expect(range.rangeStart.toMillis()).toBe(range.rangeEnd.toMillis());
    });

    it('should reject a start after the end', () => {
      const call = () =>
        planner.normalizeRange(utc('2024-01-03T00:00:00Z'), utc('2024-01-02T00:00:00Z'));

      expect(call).toThrow(ConfigurationError);
      expect(call).toThrow(
        'from-date 2024-01-03T00:00:00.000Z is after to-date 2024-01-02T00:00:00.000Z.'
      );
    });
  });

  describe('plan', () => {
    it('should build a frozen request with the inferred tick type', () => {
      const instrument = buildInstrument({ ticker: 'EURUSD', securityType: 'Forex' });

      const request = planner.plan(
        instrument,
        'hour',
        utc('2024-01-02T00:00:00Z'),
        utc('2024-01-03T00:00:00Z')
      );

      expect(request.instrument).toBe(instrument);
      expect(request.resolution).toBe('Hour');
      expect(request.tickType).toBe('Quote');
      expect(request.rangeStart.toISO()).toBe('2024-01-02T00:00:00.000Z');
      expect(request.rangeEnd.toISO()).toBe('2024-01-03T00:00:00.000Z');
      expect(Object.isFrozen(request)).toBe(true);
    });
  });
});
