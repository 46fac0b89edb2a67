import { DateTime } from 'luxon';
import { OUTCOME_STATUSES, OutcomeStatus, Resolution, SecurityType } from '@/constants/market';
import { DOWNLOAD_LIMITS } from '@/config/downloadRules';
import {
  DownloadReport,
  DownloadRunParameters,
  Instrument,
  instrumentKey,
  Outcome,
  OutcomeTotals,
} from '@/models';
import {
  AppError,
  BatchRejectedError,
  ConfigurationError,
  EmptyResultError,
} from '@/errors';
import { IProviderGateway } from '@/gateways/interfaces';
import { IStoreWriter } from '@/writers/interfaces';
import { ILogger } from '@/interfaces/ILogger';
import { IMetrics } from '@/interfaces/IMetrics';
import { NoOpMetrics } from '@/adapters/metrics/NoOpMetrics';
import { toIsoUtc } from '@/utils/time';
import { InstrumentResolver } from './instrument.service';
import { RequestPlanner } from './requestPlanner.service';
import { Sequencer } from './sequencer.service';

export interface BatchDownloadOptions {
  /** Instruments processed in parallel (default 1) */
  concurrency?: number;
  metrics?: IMetrics;
  resolver?: InstrumentResolver;
  planner?: RequestPlanner;
  sequencer?: Sequencer;
  clock?: () => DateTime;
}

export interface RunOptions {
  /** Once aborted, no further instrument is started; finished outcomes are kept */
  signal?: AbortSignal;
}

interface RunContext {
  resolution: Resolution;
  rangeStart: DateTime;
  rangeEnd: DateTime;
}

/**
 * Batch Download Service
 * Drives Resolver → Planner → Gateway → Sequencer → Writer for every
 * ticker of a run and reports one outcome per instrument.
 *
 * Business Rules:
 * - Invalid global parameters fail the whole run before any instrument starts
 * - Blank tickers are skipped and get no outcome
 * - A failure for one instrument is recorded and the run moves on
 * - Absent and empty provider results are both NoData
 * - Nothing is retried here; retries belong to the gateway
 */
export class BatchDownloadService {
  private readonly concurrency: number;
  private readonly metrics: IMetrics;
  private readonly resolver: InstrumentResolver;
  private readonly planner: RequestPlanner;
  private readonly sequencer: Sequencer;
  private readonly clock: () => DateTime;

  constructor(
    private readonly gateway: IProviderGateway,
    private readonly writer: IStoreWriter,
    private readonly logger: ILogger,
    options: BatchDownloadOptions = {}
  ) {
    const concurrency = options.concurrency ?? DOWNLOAD_LIMITS.DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`Concurrency must be a positive integer, got ${concurrency}`);
    }

    this.concurrency = Math.min(concurrency, DOWNLOAD_LIMITS.MAX_CONCURRENCY);
    this.metrics = options.metrics ?? new NoOpMetrics();
    this.resolver = options.resolver ?? new InstrumentResolver();
    this.planner = options.planner ?? new RequestPlanner();
    this.sequencer = options.sequencer ?? new Sequencer();
    this.clock = options.clock ?? (() => DateTime.utc());
  }

  /**
   * Download every ticker of a run
   *
   * @throws ConfigurationError / UnsupportedCombinationError for invalid run parameters
   * @returns Report with outcomes in completion order
   */
  async run(parameters: DownloadRunParameters, options: RunOptions = {}): Promise<DownloadReport> {
    const startedAt = this.clock();

    // 1. Global parameters: any failure here ends the run
    if (parameters.tickers.length === 0) {
      throw new ConfigurationError('--tickers is required');
    }
    const securityType = this.resolver.parseSecurityType(parameters.securityType);
    const resolution = this.planner.parseResolution(parameters.resolution);
    const range = this.planner.normalizeRange(parameters.rangeStart, parameters.rangeEnd);
    const market = this.resolver.normalizeMarket(parameters.market);

    // 2. One pending entry per distinct non-blank ticker
    const pending = this.collectInstruments(parameters.tickers, securityType, market);
    const context: RunContext = { resolution, ...range };

    this.logger.info(
      {
        instruments: pending.length,
        securityType,
        resolution,
        market,
        from: toIsoUtc(range.rangeStart),
        to: toIsoUtc(range.rangeEnd),
        provider: this.gateway.name,
      },
      'Download run started'
    );
    this.metrics.recordGauge('download.instruments_pending', pending.length);
    const stopTimer = this.metrics.startTimer('download.run_duration');

    // 3. Bounded worker pool over a shared cursor
    const outcomes: Outcome[] = [];
    let cursor = 0;
    let cancelled = false;

    const worker = async (): Promise<void> => {
      for (;;) {
        const instrument = pending[cursor];
        if (!instrument) return;

        if (options.signal?.aborted) {
          cancelled = true;
          return;
        }
        cursor += 1;

        outcomes.push(await this.processInstrument(instrument, context));
      }
    };

    const workerCount = Math.min(this.concurrency, pending.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    stopTimer();

    const report: DownloadReport = {
      startedAt,
      completedAt: this.clock(),
      cancelled,
      outcomes,
      totals: this.totals(outcomes),
    };

    this.logger.info(
      { ...report.totals, cancelled, skipped: pending.length - outcomes.length },
      cancelled ? 'Download run cancelled' : 'Download run completed'
    );

    return report;
  }

  /**
   * Trim, drop blanks, resolve, and drop repeated instruments
   */
  private collectInstruments(
    tickers: string[],
    securityType: SecurityType,
    market: string
  ): Instrument[] {
    const seen = new Set<string>();
    const pending: Instrument[] = [];

    for (const rawTicker of tickers) {
      const ticker = rawTicker.trim();
      if (ticker.length === 0) {
        continue;
      }

      const instrument = this.resolver.resolve(ticker, securityType, market);
      const key = instrumentKey(instrument);
      if (seen.has(key)) {
        this.logger.debug({ ticker }, 'Duplicate ticker skipped');
        continue;
      }

      seen.add(key);
      pending.push(instrument);
    }

    return pending;
  }

  /**
   * Run one instrument to a terminal outcome. Per-instrument errors are
   * converted into outcomes here and never leave this method.
   */
  private async processInstrument(instrument: Instrument, context: RunContext): Promise<Outcome> {
    const startedMs = Date.now();
    const request = this.planner.plan(
      instrument,
      context.resolution,
      context.rangeStart,
      context.rangeEnd
    );

    this.logger.debug(
      {
        ticker: instrument.ticker,
        resolution: request.resolution,
        tickType: request.tickType,
      },
      'Planned fetch request'
    );

    try {
      const observations = await this.gateway.fetch(request);
      if (observations === null) {
        return this.record(
          instrument,
          OUTCOME_STATUSES.NO_DATA,
          `No data returned for ${instrument.ticker}`,
          0,
          startedMs
        );
      }

      const batch = this.sequencer.sequence(observations, {
        instrument,
        resolution: request.resolution,
        tickType: request.tickType,
      });

      const result = await this.writer.write(batch);

      return this.record(
        instrument,
        OUTCOME_STATUSES.WRITTEN,
        `Wrote ${result.observationCount} ${request.tickType.toLowerCase()} observations to ${result.partitions.length} partition(s)`,
        result.observationCount,
        startedMs
      );
    } catch (error) {
      return this.recordError(instrument, error, startedMs);
    }
  }

  private recordError(instrument: Instrument, error: unknown, startedMs: number): Outcome {
    if (error instanceof EmptyResultError) {
      return this.record(instrument, OUTCOME_STATUSES.NO_DATA, error.message, 0, startedMs);
    }
    if (error instanceof BatchRejectedError) {
      return this.record(instrument, OUTCOME_STATUSES.REJECTED, error.message, 0, startedMs);
    }
    if (error instanceof AppError) {
      return this.record(instrument, OUTCOME_STATUSES.FAILED, error.message, 0, startedMs);
    }

    const message = error instanceof Error ? error.message : String(error);
    return this.record(
      instrument,
      OUTCOME_STATUSES.FAILED,
      `Unexpected error: ${message}`,
      0,
      startedMs
    );
  }

  private record(
    instrument: Instrument,
    status: OutcomeStatus,
    detail: string,
    observationCount: number,
    startedMs: number
  ): Outcome {
    const durationMs = Date.now() - startedMs;
    const outcome: Outcome = {
      ticker: instrument.ticker,
      instrument,
      status,
      detail,
      observationCount,
      durationMs,
      completedAt: this.clock(),
    };

    const metadata = { ticker: instrument.ticker, status, detail, durationMs };
    switch (status) {
      case OUTCOME_STATUSES.WRITTEN:
        this.logger.info({ ...metadata, observationCount }, 'Batch written');
        this.metrics.recordDistribution('download.observations', observationCount);
        break;
      case OUTCOME_STATUSES.NO_DATA:
        this.logger.warn(metadata, 'No data for instrument');
        break;
      case OUTCOME_STATUSES.REJECTED:
        this.logger.warn(metadata, 'Batch rejected');
        break;
      case OUTCOME_STATUSES.FAILED:
        this.logger.error(metadata, 'Instrument failed');
        break;
    }

    this.metrics.incrementCounter('download.outcomes', 1, { status });
    this.metrics.recordHistogram('download.instrument_duration', durationMs, { status });

    return outcome;
  }

  private totals(outcomes: Outcome[]): OutcomeTotals {
    const totals: OutcomeTotals = {
      [OUTCOME_STATUSES.WRITTEN]: 0,
      [OUTCOME_STATUSES.NO_DATA]: 0,
      [OUTCOME_STATUSES.REJECTED]: 0,
      [OUTCOME_STATUSES.FAILED]: 0,
    };
    for (const outcome of outcomes) {
      totals[outcome.status] += 1;
    }
    return totals;
  }
}
