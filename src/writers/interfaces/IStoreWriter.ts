import { OrderedBatch } from '@/models';

/**
 * What a writer reports after persisting a batch
 */
export interface WriteResult {
  /** Partitions created or overwritten (file paths, table keys) */
  partitions: string[];
  observationCount: number;
}

/**
 * Store Writer Interface
 * Defines the contract for persisting an ordered batch into the partitioned store.
 * Writers own layout and encoding; callers only hand over validated batches.
 */
export interface IStoreWriter {
  /**
   * Persist one instrument/resolution/tick-type batch, creating or
   * overwriting the partitions it covers.
   *
   * @throws WriteFailureError when the batch could not be persisted
   */
  write(batch: OrderedBatch): Promise<WriteResult>;
}
