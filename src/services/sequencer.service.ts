import { RESOLUTIONS, TICK_TYPES } from '@/constants/market';
import { BatchTarget, Observation, ObservationKind, OrderedBatch, tickTypeOf } from '@/models';
import { BatchRejectedError, EmptyResultError } from '@/errors';
import { isUtc } from '@/utils/time';

/**
 * Sequencer
 * Turns a provider's raw observations into a batch a writer can accept:
 * non-empty, sorted by endTime, UTC timestamps, one observation kind.
 *
 * The input array is never mutated. Array.prototype.sort is stable, so
 * observations sharing an endTime keep the provider's order.
 */
export class Sequencer {
  /**
   * @throws EmptyResultError when there is nothing to write
   * @throws BatchRejectedError when an observation cannot be written for this target
   */
  sequence(observations: readonly Observation[], target: BatchTarget): OrderedBatch {
    if (observations.length === 0) {
      throw new EmptyResultError(`Empty data set for ${target.instrument.ticker}`);
    }

    const expectedKind = this.expectedKind(target);
    const normalized = observations.map((observation, index) => {
      this.validate(observation, index, expectedKind, target);
      return this.toUtc(observation);
    });

    normalized.sort((a, b) => a.endTime.toMillis() - b.endTime.toMillis());

    const [first, ...rest] = normalized;
    if (!first) {
      throw new EmptyResultError(`Empty data set for ${target.instrument.ticker}`);
    }

    return {
      instrument: target.instrument,
      resolution: target.resolution,
      tickType: target.tickType,
      observations: [first, ...rest],
    };
  }

  private expectedKind(target: BatchTarget): ObservationKind {
    if (target.resolution === RESOLUTIONS.TICK) {
      return 'Tick';
    }
    return target.tickType === TICK_TYPES.QUOTE ? 'QuoteBar' : 'TradeBar';
  }

  private validate(
    observation: Observation,
    index: number,
    expectedKind: ObservationKind,
    target: BatchTarget
  ): void {
    if (!observation.time.isValid || !observation.endTime.isValid) {
      throw new BatchRejectedError(`Observation #${index} has an invalid timestamp`);
    }
    if (observation.endTime.toMillis() < observation.time.toMillis()) {
      throw new BatchRejectedError(`Observation #${index} ends before it starts`);
    }
    if (observation.kind !== expectedKind || tickTypeOf(observation) !== target.tickType) {
      throw new BatchRejectedError(
        `Expected ${target.tickType} ${expectedKind} data for ${target.resolution} resolution, ` +
          `got ${tickTypeOf(observation)} ${observation.kind} at #${index}`
      );
    }
  }

  private toUtc(observation: Observation): Observation {
    if (isUtc(observation.time) && isUtc(observation.endTime)) {
      return observation;
    }
    return { ...observation, time: observation.time.toUTC(), endTime: observation.endTime.toUTC() };
  }
}
