import { AppError } from './AppError';

/**
 * Batch Rejected Error (per instrument)
 * Observations came back that cannot be written as requested,
 * e.g. an invalid timestamp or quote data for a trade request.
 */
export class BatchRejectedError extends AppError {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, BatchRejectedError.prototype);
  }
}
