import { Resolution, TickType } from '@/constants/market';
import { Instrument } from './Instrument';
import { Observation } from './Observation';

/**
 * Array type that holds at least one element
 */
export type NonEmptyArray<T> = readonly [T, ...T[]];

/**
 * Ordered, validated batch handed to a store writer
 *
 * Invariants (established by the Sequencer):
 * - observations is non-empty
 * - observations are non-decreasing by endTime
 * - every timestamp is in the UTC zone
 */
export interface OrderedBatch {
  readonly instrument: Instrument;
  readonly resolution: Resolution;
  readonly tickType: TickType;
  readonly observations: NonEmptyArray<Observation>;
}

/**
 * What a batch is being sequenced for
 */
export type BatchTarget = Omit<OrderedBatch, 'observations'>;
