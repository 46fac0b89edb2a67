import { DateTime } from 'luxon';
import { OutcomeStatus } from '@/constants/market';
import { Instrument } from './Instrument';

/**
 * Result of processing one instrument
 * Appended to the run's outcome log in completion order.
 */
export interface Outcome {
  ticker: string;
  instrument: Instrument;
  status: OutcomeStatus;
  detail: string;
  observationCount: number;
  durationMs: number;
  completedAt: DateTime;
}

/**
 * Outcome counts per status
 */
export type OutcomeTotals = Record<OutcomeStatus, number>;

/**
 * Everything a run hands back to its caller
 */
export interface DownloadReport {
  startedAt: DateTime;
  completedAt: DateTime;
  /** True when the run stopped early because its signal was aborted */
  cancelled: boolean;
  outcomes: Outcome[];
  totals: OutcomeTotals;
}
