import { AppError, ErrorResponseBody } from './AppError';

/**
 * Malformed Body Error (400 Bad Request)
 * Thrown when a request body cannot be decoded into the expected payload
 */
export class MalformedBodyError extends AppError {
  static readonly responseName = 'MalformedBody';

  constructor(details: string) {
    super(`Malformed request body failed to decode: ${details}`, 400);
    Object.setPrototypeOf(this, MalformedBodyError.prototype);
  }

  override toResponseBody(): ErrorResponseBody {
    return { name: MalformedBodyError.responseName, message: this.message };
  }
}
