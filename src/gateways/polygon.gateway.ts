import axios, { AxiosInstance } from 'axios';
import { RESOLUTIONS, TICK_TYPES } from '@/constants/market';
import { PROVIDER_LIMITS } from '@/config/downloadRules';
import { FetchRequest, Observation } from '@/models';
import { ConfigurationError, ProviderUnavailableError } from '@/errors';
import { ILogger } from '@/interfaces/ILogger';
import { IProviderGateway } from './interfaces';
import {
  AGGREGATE_TIMESPANS,
  MappedPage,
  mapAggregatePage,
  mapQuotePage,
  mapTradePage,
  parsePolygonBody,
  polygonTicker,
} from './polygon.mapping';

export const DEFAULT_POLYGON_BASE_URL = 'https://api.polygon.io';

export interface PolygonGatewayOptions {
  apiKey: string;
  logger: ILogger;
  baseURL?: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** First backoff delay; doubled per attempt */
  retryDelayMs?: number;
  /** Preconfigured client, mainly for tests */
  http?: AxiosInstance;
}

interface PageRequest {
  url: string;
  params?: Record<string, string | number | boolean>;
}

const RETRYABLE_STATUSES: readonly number[] = PROVIDER_LIMITS.RETRYABLE_STATUSES;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Polygon.io gateway
 *
 * Returns null (Absent) when Polygon has no results for the request or
 * answers 404. Transport failures are retried with exponential backoff and
 * surface as ProviderUnavailableError once retries run out.
 */
export class PolygonGateway implements IProviderGateway {
  public readonly name = 'polygon';

  private readonly http: AxiosInstance;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly logger: ILogger;

  constructor(options: PolygonGatewayOptions) {
    if (!options.http && options.apiKey.trim().length === 0) {
      throw new ConfigurationError(
        'Polygon API key is not configured (POLYGON_API_KEY or polygon-api-key)'
      );
    }

    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseURL ?? DEFAULT_POLYGON_BASE_URL,
        timeout: options.timeoutMs ?? 30_000,
        headers: { Authorization: `Bearer ${options.apiKey}` },
      });
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? PROVIDER_LIMITS.RETRY_BASE_DELAY_MS;
    this.logger = options.logger;
  }

  async fetch(request: FetchRequest): Promise<Observation[] | null> {
    const ticker = polygonTicker(request.instrument);
    const { first, mapPage } = this.describe(request, ticker);

    const observations: Observation[] = [];
    let sawResults = false;
    let next: PageRequest | undefined = first;
    let pages = 0;

    while (next) {
      const body = await this.get(next, ticker);
      if (body === null) {
        // A cursor that vanished mid-series would leave the batch truncated
        if (pages > 0) {
          throw new ProviderUnavailableError(
            `Polygon lost the next page for ${ticker} after ${pages} page(s) (HTTP 404)`,
            { statusCode: 404 }
          );
        }
        break;
      }

      const page = mapPage(body);
      pages += 1;
      if (page.observations) {
        sawResults = true;
        observations.push(...page.observations);
      }

      // next_url carries its own query string
      next = page.nextUrl ? { url: page.nextUrl } : undefined;
    }

    this.logger.debug(
      { ticker, pages, observations: observations.length, absent: !sawResults },
      'Polygon fetch finished'
    );

    return sawResults ? observations : null;
  }

  private describe(
    request: FetchRequest,
    ticker: string
  ): { first: PageRequest; mapPage: (body: unknown) => MappedPage } {
    if (request.resolution === RESOLUTIONS.TICK) {
      const params = {
        'timestamp.gte': `${request.rangeStart.toMillis()}000000`,
        'timestamp.lte': `${request.rangeEnd.toMillis()}000000`,
        order: 'asc',
        sort: 'timestamp',
        limit: PROVIDER_LIMITS.PAGE_LIMIT,
      };
      return request.tickType === TICK_TYPES.QUOTE
        ? { first: { url: `/v3/quotes/${ticker}`, params }, mapPage: mapQuotePage }
        : { first: { url: `/v3/trades/${ticker}`, params }, mapPage: mapTradePage };
    }

    const resolution = request.resolution;
    const timespan = AGGREGATE_TIMESPANS[resolution];
    const from = request.rangeStart.toMillis();
    const to = request.rangeEnd.toMillis();

    return {
      first: {
        url: `/v2/aggs/ticker/${ticker}/range/1/${timespan}/${from}/${to}`,
        params: { adjusted: true, sort: 'asc', limit: PROVIDER_LIMITS.PAGE_LIMIT },
      },
      mapPage: (body) => mapAggregatePage(body, request, resolution),
    };
  }

  /**
   * GET one page. Returns null on 404.
   * Bodies are parsed by parsePolygonBody so nanosecond timestamps stay exact.
   */
  private async get(page: PageRequest, ticker: string): Promise<unknown> {
    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.http.get<unknown>(page.url, {
          params: page.params,
          responseType: 'text',
          transformResponse: parsePolygonBody,
        });
        return response.data;
      } catch (error) {
        const status = axios.isAxiosError(error) ? error.response?.status : undefined;

        if (status === 404) {
          return null;
        }
        if (status === 401 || status === 403) {
          throw new ProviderUnavailableError(`Polygon rejected the API key (HTTP ${status})`, {
            statusCode: status,
            cause: error,
          });
        }

        const retryable =
          status === undefined ? axios.isAxiosError(error) : RETRYABLE_STATUSES.includes(status);

        if (retryable && attempt < this.maxRetries) {
          const delayMs = this.retryDelayMs * 2 ** attempt;
          this.logger.warn(
            { ticker, status, attempt: attempt + 1, delayMs },
            'Polygon request failed, retrying'
          );
          await sleep(delayMs);
          continue;
        }

        const message = error instanceof Error ? error.message : String(error);
        throw new ProviderUnavailableError(
          `Polygon request for ${ticker} failed: ${message}`,
          { statusCode: status, cause: error }
        );
      }
    }
  }
}
