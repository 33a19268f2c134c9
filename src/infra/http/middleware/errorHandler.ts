import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { InvalidTransitionError } from '../../../domain/flows/errors.js';
import {
  AuthFailure,
  ConflictError,
  InvalidCredentialsError,
  NotFoundOrForbiddenError,
  StoreUnavailableError,
} from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

function send(res: Response, status: number, body: ErrorResponse): void {
  res.status(status).json(body);
}

/**
 * Client errors raised by express.json() (size limit, charset, encoding)
 * come with a numeric 4xx `status` and a string `type`.
 */
function bodyParserFailure(err: Error): { status: number; type: string } | null {
  if (!('status' in err) || !('type' in err)) {
    return null;
  }
  const { status, type } = err;
  if (typeof status !== 'number' || typeof type !== 'string' || status < 400 || status >= 500) {
    return null;
  }
  return { status, type };
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    send(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    });
    return;
  }

  if (err instanceof AuthFailure) {
    send(res, 401, { code: err.kind, message: err.message });
    return;
  }

  if (err instanceof InvalidCredentialsError) {
    send(res, 401, { code: 'INVALID_CREDENTIALS', message: err.message });
    return;
  }

  if (err instanceof NotFoundOrForbiddenError) {
    send(res, 404, { code: 'NOT_FOUND', message: err.message });
    return;
  }

  if (err instanceof InvalidTransitionError) {
    send(res, 409, {
      code: 'INVALID_TRANSITION',
      message: err.message,
      details: { from: err.from, to: err.to },
    });
    return;
  }

  if (err instanceof ConflictError) {
    send(res, 409, { code: 'CONFLICT', message: err.message });
    return;
  }

  if (err instanceof StoreUnavailableError) {
    console.error('[http] Store unavailable:', err.cause ?? err);
    send(res, 503, { code: 'STORE_UNAVAILABLE', message: err.message });
    return;
  }

  // express.json() parse failures carry a status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    send(res, 400, { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' });
    return;
  }

  const bodyError = bodyParserFailure(err);
  if (bodyError?.type === 'entity.too.large') {
    send(res, 413, { code: 'PAYLOAD_TOO_LARGE', message: 'Request body too large' });
    return;
  }
  if (bodyError) {
    send(res, 400, { code: 'VALIDATION_ERROR', message: 'Unreadable request body' });
    return;
  }

  console.error('[http] Unhandled error:', err);
  send(res, 500, { code: 'INTERNAL_ERROR', message: 'Internal server error' });
}
