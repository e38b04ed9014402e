/**
 * JSON body sent to clients for every handled error
 */
export interface ErrorResponseBody {
  name?: string;
  message: string;
}

/**
 * Base class for all application errors
 * Carries the HTTP status the error handler responds with
 */
export abstract class AppError extends Error {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toResponseBody(): ErrorResponseBody {
    return { message: this.message };
  }
}
