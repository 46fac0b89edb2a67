/**
 * Central export point for all custom errors
 */
export * from './AppError';
export * from './ConfigurationError';
export * from './UnsupportedCombinationError';
export * from './ProviderUnavailableError';
export * from './EmptyResultError';
export * from './BatchRejectedError';
export * from './WriteFailureError';
