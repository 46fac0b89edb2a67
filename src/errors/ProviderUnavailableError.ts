import { AppError } from './AppError';

/**
 * Provider Unavailable Error (per instrument)
 * The data provider could not be asked: network failure, auth failure,
 * exhausted retries, or a security type the provider does not serve.
 */
export class ProviderUnavailableError extends AppError {
  public readonly statusCode?: number;

  constructor(message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.statusCode = options.statusCode;
    Object.setPrototypeOf(this, ProviderUnavailableError.prototype);
  }
}
