import { Command, CommanderError } from 'commander';
import { OUTCOME_STATUSES } from '@/constants/market';
import { DOWNLOAD_LIMITS, RUN_TIMESTAMP_FORMAT } from '@/config/downloadRules';
import { DownloadSettings, loadConfigFile, resolveSettings } from '@/config/settings';
import { DownloadReport } from '@/models';
import { AppError } from '@/errors';
import { ILoggerFactory } from '@/interfaces/ILogger';
import { BatchDownloadService } from '@/services/download.service';
import { validateRunOptions } from '@/validators/runParameters.validator';
import { formatOutcomeTable, writeOutcomeReport } from '@/reporting/outcomeReport';

/**
 * Names accepted by --app for the Polygon downloader
 */
export const APP_ALIASES: ReadonlySet<string> = new Set([
  'polygondatadownloader',
  'polygondl',
  'polygon',
]);

export const EXIT_CODES = {
  SUCCESS: 0,
  FATAL: 1,
  INSTRUMENT_ERRORS: 2,
} as const;

/**
 * Everything the program needs from its host process
 */
export interface ToolboxRuntime {
  out: (text: string) => void;
  err: (text: string) => void;
  env: SettingsEnv;
  createLoggerFactory: (settings: DownloadSettings) => ILoggerFactory;
  buildService: (settings: DownloadSettings, loggerFactory: ILoggerFactory) => BatchDownloadService;
  /** Aborted on SIGINT/SIGTERM */
  signal?: AbortSignal;
}

export type SettingsEnv = Parameters<typeof resolveSettings>[0];

export function buildProgram(): Command {
  return new Command()
    .name('toolbox')
    .description('Download historical market data into the local store')
    .option('--app <name>', `application to run (${[...APP_ALIASES].join(', ')})`)
    .option('--tickers <list>', 'comma separated tickers, e.g. AAPL,MSFT')
    .option('--security-type <type>', 'security type (default Equity)')
    .option('--resolution <resolution>', 'Tick, Second, Minute, Hour or Daily (default Minute)')
    .option('--market <market>', 'market identifier (default usa)')
    .option('--from-date <timestamp>', `range start, ${RUN_TIMESTAMP_FORMAT}`)
    .option('--to-date <timestamp>', `range end, ${RUN_TIMESTAMP_FORMAT} (default now)`)
    .option('--config <path>', 'YAML or JSON settings file')
    .option(
      '--concurrency <n>',
      `instruments downloaded in parallel (1-${DOWNLOAD_LIMITS.MAX_CONCURRENCY})`
    );
}

/**
 * 0 when every outcome is Written or NoData, 2 otherwise
 */
export function exitCodeFor(report: DownloadReport): number {
  const failed =
    report.totals[OUTCOME_STATUSES.FAILED] + report.totals[OUTCOME_STATUSES.REJECTED];
  return failed > 0 ? EXIT_CODES.INSTRUMENT_ERRORS : EXIT_CODES.SUCCESS;
}

/**
 * Parse arguments, run the downloader and print its outcomes
 *
 * @returns Process exit code
 */
export async function runToolbox(argv: string[], runtime: ToolboxRuntime): Promise<number> {
  const program = buildProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => runtime.out(text.trimEnd()),
      writeErr: (text) => runtime.err(text.trimEnd()),
    });

  if (argv.length === 0) {
    runtime.out(program.helpInformation().trimEnd());
    return EXIT_CODES.SUCCESS;
  }

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.FATAL;
    }
    throw error;
  }

  try {
    const options = validateRunOptions(program.opts());
    if (!APP_ALIASES.has(options.app.trim().toLowerCase())) {
      runtime.err(`ERROR: Unrecognized --app value '${options.app}'`);
      return EXIT_CODES.FATAL;
    }

    const fileSettings = options.configPath ? loadConfigFile(options.configPath) : {};
    const resolved = resolveSettings(runtime.env, fileSettings);
    const settings: DownloadSettings = {
      ...resolved,
      concurrency: options.concurrency ?? resolved.concurrency,
    };

    const service = runtime.buildService(settings, runtime.createLoggerFactory(settings));
    const report = await service.run(options.parameters, { signal: runtime.signal });

    runtime.out(formatOutcomeTable(report));

    if (settings.resultsDestinationFolder) {
      const files = await writeOutcomeReport(settings.resultsDestinationFolder, report);
      runtime.out(`Report written to ${files.join(', ')}`);
    }

    return exitCodeFor(report);
  } catch (error) {
    if (error instanceof AppError) {
      runtime.err(`ERROR: ${error.message}`);
      return error.exitCode;
    }

    const message = error instanceof Error ? error.message : String(error);
    runtime.err(`ERROR: Unexpected error: ${message}`);
    return EXIT_CODES.FATAL;
  }
}
