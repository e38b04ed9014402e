/**
 * Central export point for all custom errors
 */
export * from './AppError';
export * from './MalformedBodyError';
export * from './UserErrors';
export * from './DatabaseTransactionError';
export * from './NotFoundError';
