import { AppError } from './AppError';

/**
 * Database Transaction Error (500)
 * Any database failure that has no more specific meaning. The cause is
 * kept for logging and never sent to the client.
 */
export class DatabaseTransactionError extends AppError {
  constructor(message = 'transaction error', cause?: unknown) {
    super(message, 500);
    this.cause = cause;
    Object.setPrototypeOf(this, DatabaseTransactionError.prototype);
  }
}
