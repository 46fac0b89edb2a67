import { z } from 'zod';
import { DownloadRunParameters } from '@/models';
import { ConfigurationError } from '@/errors';
import { DOWNLOAD_LIMITS, RUN_TIMESTAMP_FORMAT } from '@/config/downloadRules';
import { parseRunTimestamp } from '@/utils/time';

const timestamp = (flag: string) =>
  z.string({ required_error: `${flag} is required` }).transform((value, ctx) => {
    const parsed = parseRunTimestamp(value);
    if (!parsed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${flag} '${value}' does not match ${RUN_TIMESTAMP_FORMAT}`,
      });
      return z.NEVER;
    }
    return parsed;
  });

/**
 * Raw command-line options of a download run
 *
 * - --app and --tickers are required; tickers are comma separated
 * - --from-date is required, --to-date defaults to the run's start time
 * - security type, resolution and market stay raw; the orchestrator parses them
 */
export const runOptionsSchema = z.object({
  app: z.string({ required_error: '--app is required' }),
  tickers: z
    .string({ required_error: '--tickers is required' })
    .transform((value) => value.split(',')),
  securityType: z.string().optional(),
  resolution: z.string().optional(),
  market: z.string().optional(),
  fromDate: timestamp('--from-date'),
  toDate: timestamp('--to-date').optional(),
  config: z.string().optional(),
  concurrency: z.coerce
    .number()
    .int()
    .min(1, { message: '--concurrency must be at least 1' })
    .max(DOWNLOAD_LIMITS.MAX_CONCURRENCY, {
      message: `--concurrency cannot exceed ${DOWNLOAD_LIMITS.MAX_CONCURRENCY}`,
    })
    .optional(),
});

export interface ValidatedRunOptions {
  app: string;
  configPath?: string;
  concurrency?: number;
  parameters: DownloadRunParameters;
}

/**
 * Validate CLI options and map them onto run parameters
 *
 * @throws ConfigurationError with the first issue as message and all issues as details
 */
export function validateRunOptions(raw: unknown): ValidatedRunOptions {
  const result = runOptionsSchema.safeParse(raw);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new ConfigurationError(first ? first.message : 'Invalid options', result.error.issues);
  }

  const options = result.data;
  return {
    app: options.app,
    configPath: options.config,
    concurrency: options.concurrency,
    parameters: {
      tickers: options.tickers,
      securityType: options.securityType,
      resolution: options.resolution,
      market: options.market,
      rangeStart: options.fromDate,
      rangeEnd: options.toDate,
    },
  };
}
