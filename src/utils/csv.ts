import { stringify, Options } from 'csv-stringify';

/**
 * Render records as CSV text (callback API wrapped in a promise)
 */
export function renderCsv(records: unknown[], options: Options = {}): Promise<string> {
  return new Promise((resolve, reject) => {
    stringify(records, options, (err, output) => {
      if (err) reject(err);
      else resolve(output);
    });
  });
}
