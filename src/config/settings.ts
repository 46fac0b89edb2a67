import { readFileSync } from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from '@/errors';
import { DOWNLOAD_LIMITS } from './downloadRules';
import { Env } from './env';

/**
 * Config file accepted by `--config <path>` (YAML or JSON)
 *
 * ```yaml
 * data-folder: /srv/market-data
 * debug-mode: true
 * results-destination-folder: ./results
 * store-type: disk
 * concurrency: 4
 * ```
 */
export const configFileSchema = z
  .object({
    'data-folder': z.string().min(1).optional(),
    'debug-mode': z.boolean().optional(),
    'results-destination-folder': z.string().optional(),
    'store-type': z.enum(['disk', 'postgres']).optional(),
    concurrency: z.number().int().min(1).max(DOWNLOAD_LIMITS.MAX_CONCURRENCY).optional(),
    'polygon-api-key': z.string().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Effective download settings for one CLI invocation
 */
export interface DownloadSettings {
  dataFolder: string;
  debugMode: boolean;
  resultsDestinationFolder: string | null;
  storeType: 'disk' | 'postgres';
  concurrency: number;
  polygonApiKey: string;
}

/**
 * Parse config file contents. YAML is a superset of JSON, so one parser covers both.
 */
export function parseConfigFile(contents: string, source: string = 'config file'): ConfigFile {
  let raw: unknown;
  try {
    raw = yaml.load(contents);
  } catch (error) {
    throw new ConfigurationError(
      `Could not parse ${source}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty file means "no overrides"
  const result = configFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${source}`, result.error.issues);
  }
  return result.data;
}

export function loadConfigFile(configPath: string): ConfigFile {
  let contents: string;
  try {
    contents = readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Could not read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseConfigFile(contents, configPath);
}

/**
 * Merge environment and config file; file values win
 */
export function resolveSettings(
  environment: Pick<
    Env,
    'DATA_FOLDER' | 'RESULTS_DESTINATION_FOLDER' | 'STORE_TYPE' | 'DOWNLOAD_CONCURRENCY' | 'POLYGON_API_KEY'
  >,
  file: ConfigFile = {}
): DownloadSettings {
  const resultsFolder =
    file['results-destination-folder'] ?? environment.RESULTS_DESTINATION_FOLDER;
  const storeType = file['store-type'] ?? environment.STORE_TYPE;

  return {
    dataFolder: file['data-folder'] ?? environment.DATA_FOLDER,
    debugMode: file['debug-mode'] ?? false,
    resultsDestinationFolder: resultsFolder.trim() === '' ? null : resultsFolder,
    storeType: storeType === 'postgres' ? 'postgres' : 'disk',
    concurrency: file.concurrency ?? environment.DOWNLOAD_CONCURRENCY,
    polygonApiKey: file['polygon-api-key'] ?? environment.POLYGON_API_KEY,
  };
}
