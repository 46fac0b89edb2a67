import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { OUTCOME_STATUSES } from '@/constants/market';
import { DownloadReport } from '@/models';
import { renderCsv } from '@/utils/csv';
import { toIsoUtc } from '@/utils/time';

export const REPORT_FILE = 'download-report.json';
export const OUTCOMES_FILE = 'outcomes.csv';

const OUTCOME_COLUMNS = [
  'ticker',
  'securityType',
  'market',
  'status',
  'observationCount',
  'durationMs',
  'completedAt',
  'detail',
];

/**
 * Aligned outcome table followed by a totals line
 *
 * ```
 * TICKER  STATUS   DETAIL
 * AAPL    Written  Wrote 390 trade observations to 1 partition(s)
 * MSFT    NoData   No data returned for MSFT
 * Written: 1, NoData: 1, Rejected: 0, Failed: 0
 * ```
 */
export function formatOutcomeTable(report: DownloadReport): string {
  const tickerWidth = Math.max('TICKER'.length, ...report.outcomes.map((o) => o.ticker.length));
  const statusWidth = Math.max('STATUS'.length, ...report.outcomes.map((o) => o.status.length));

  const line = (ticker: string, status: string, detail: string) =>
    `${ticker.padEnd(tickerWidth)}  ${status.padEnd(statusWidth)}  ${detail}`;

  const totals = Object.values(OUTCOME_STATUSES)
    .map((status) => `${status}: ${report.totals[status]}`)
    .join(', ');

  return [
    line('TICKER', 'STATUS', 'DETAIL'),
    ...report.outcomes.map((o) => line(o.ticker, o.status, o.detail)),
    report.cancelled ? `${totals} (cancelled)` : totals,
  ].join('\n');
}

/**
 * Plain JSON shape of a report
 */
export function serializeReport(report: DownloadReport) {
  return {
    startedAt: toIsoUtc(report.startedAt),
    completedAt: toIsoUtc(report.completedAt),
    cancelled: report.cancelled,
    totals: report.totals,
    outcomes: report.outcomes.map((outcome) => ({
      ticker: outcome.ticker,
      securityType: outcome.instrument.securityType,
      market: outcome.instrument.market,
      status: outcome.status,
      detail: outcome.detail,
      observationCount: outcome.observationCount,
      durationMs: outcome.durationMs,
      completedAt: toIsoUtc(outcome.completedAt),
    })),
  };
}

/**
 * Write download-report.json and outcomes.csv into a folder
 *
 * @returns Paths of the written files
 */
export async function writeOutcomeReport(folder: string, report: DownloadReport): Promise<string[]> {
  await mkdir(folder, { recursive: true });

  const serialized = serializeReport(report);
  const reportPath = path.join(folder, REPORT_FILE);
  const outcomesPath = path.join(folder, OUTCOMES_FILE);

  const csv = await renderCsv(serialized.outcomes, { header: true, columns: OUTCOME_COLUMNS });

  await writeFile(reportPath, `${JSON.stringify(serialized, null, 2)}\n`, 'utf8');
  await writeFile(outcomesPath, csv, 'utf8');

  return [reportPath, outcomesPath];
}
