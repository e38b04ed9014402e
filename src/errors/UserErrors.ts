import { AppError } from './AppError';

/**
 * User Not Inserted Error (500)
 * The insert statement completed without writing a row
 */
export class UserNotInsertedError extends AppError {
  constructor(message = 'failed to insert the user') {
    super(message, 500);
    Object.setPrototypeOf(this, UserNotInsertedError.prototype);
  }
}

/**
 * User Already Exists Error (409 Conflict)
 * The userName collides with the unique constraint on user_table
 */
export class UserAlreadyExistsError extends AppError {
  constructor(message = 'user already exists') {
    super(message, 409);
    Object.setPrototypeOf(this, UserAlreadyExistsError.prototype);
  }
}

/**
 * User Already Deleted Error (400 Bad Request)
 * The delete statement matched no row
 */
export class UserAlreadyDeletedError extends AppError {
  constructor(message = 'already deleted') {
    super(message, 400);
    Object.setPrototypeOf(this, UserAlreadyDeletedError.prototype);
  }
}
