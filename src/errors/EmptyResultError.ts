import { AppError } from './AppError';

/**
 * Empty Result Error (per instrument, not a failure)
 * The provider answered but there is nothing to write.
 */
export class EmptyResultError extends AppError {
  constructor(message = 'Empty data set') {
    super(message);
    Object.setPrototypeOf(this, EmptyResultError.prototype);
  }
}
