import { AppError } from './AppError';

/**
 * Write Failure Error (per instrument)
 * The store writer could not persist a batch.
 */
export class WriteFailureError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    Object.setPrototypeOf(this, WriteFailureError.prototype);
  }
}
