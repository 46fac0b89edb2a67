/**
 * Central export point for all models
 * Allows clean imports: import { Instrument, OrderedBatch } from '@/models'
 */

export * from './Instrument';
export * from './FetchRequest';
export * from './Observation';
export * from './OrderedBatch';
export * from './Outcome';
export * from './RunParameters';
