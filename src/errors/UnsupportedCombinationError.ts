import { AppError } from './AppError';

/**
 * Unsupported Combination Error (fatal)
 * Thrown when the requested resolution cannot be used for the run
 */
export class UnsupportedCombinationError extends AppError {
  constructor(message: string) {
    super(message, { exitCode: 1, isFatal: true });
    Object.setPrototypeOf(this, UnsupportedCombinationError.prototype);
  }
}
