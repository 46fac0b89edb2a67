import { DateTime } from 'luxon';

/**
 * Run parameters as supplied by the CLI/config layer
 *
 * securityType and resolution stay raw tokens here; they are parsed once
 * per run by the orchestrator so that a bad token fails the whole run.
 */
export interface DownloadRunParameters {
  tickers: string[];
  securityType?: string;
  resolution?: string;
  market?: string;
  rangeStart: DateTime;
  rangeEnd?: DateTime;
}
