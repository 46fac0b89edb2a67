import { AppError } from './AppError';

/**
 * Configuration Error (fatal)
 * Thrown when a global run parameter is invalid
 * Examples: unknown security type, start date after end date, empty ticker list
 */
export class ConfigurationError extends AppError {
  public readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message, { exitCode: 1, isFatal: true });
    this.details = details;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
