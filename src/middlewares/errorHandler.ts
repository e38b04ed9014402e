import { Request, Response, NextFunction } from 'express';
import { AppError, ErrorResponseBody, MalformedBodyError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Error raised by express.json() (body-parser)
 * `type` identifies the failure, e.g. 'entity.parse.failed' or 'entity.too.large'
 */
interface BodyParserError extends Error {
  type: string;
  status: number;
}

function isBodyParserError(err: Error): err is BodyParserError {
  return (
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number'
  );
}

// Address is personal data; user names are kept for tracing
const REDACTED_FIELDS = ['address'];

/**
 * Sanitize request body for logging
 * Creates a shallow copy with personal fields redacted
 */
function sanitizeRequestBody(body: unknown): unknown {
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    return body;
  }

  return Object.fromEntries(
    Object.entries(body).map(([key, value]) => [
      key,
      REDACTED_FIELDS.includes(key) ? '[REDACTED]' : value,
    ])
  );
}

/**
 * Turn body-parser failures into application errors
 * Unparseable JSON is a malformed body; other client errors keep their status.
 */
function fromBodyParserError(err: BodyParserError): AppError | null {
  if (err.type === 'entity.parse.failed') {
    return new MalformedBodyError(err.message);
  }
  return null;
}

/**
 * Global error handler middleware
 * The only place errors become HTTP responses
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  logger.error(
    {
      error: {
        name: err.name,
        message: err.message,
        stack: err.stack,
        cause: err.cause,
      },
      request: {
        method: req.method,
        url: req.url,
        body: sanitizeRequestBody(req.body),
      },
    },
    'Error occurred'
  );

  const appError =
    err instanceof AppError ? err : isBodyParserError(err) ? fromBodyParserError(err) : null;

  // Handle known application errors
  if (appError) {
    res.status(appError.statusCode).json(appError.toResponseBody());
    return;
  }

  // Other body-parser client errors (payload too large, unsupported charset)
  if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
    const body: ErrorResponseBody = { message: err.message };
    res.status(err.status).json(body);
    return;
  }

  // Handle unknown errors
  const body: ErrorResponseBody = { message: 'Internal server error' };
  res.status(500).json(body);
}
